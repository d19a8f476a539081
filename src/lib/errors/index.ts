/**
 * Errors Module
 *
 * Provides:
 * - Input validation errors (format, empty)
 * - Per-URL checker invocation errors
 * - Startup error for a missing checker
 */

export {
  AuditError,
  InputFormatError,
  EmptyInputError,
  CheckInvocationError,
  ToolNotFoundError,
  type CheckFailureKind,
} from './errors.js';
