/**
 * Checker Module
 *
 * Provides:
 * - pa11y CLI invocation with JSON output parsing
 * - Startup check for the checker executable
 * - Injectable process executor
 * - Bounded, order-preserving worker pool
 */

export {
  Pa11yChecker,
  createPa11yChecker,
  parsePa11yOutput,
  type Pa11yCheckerOptions,
  type Pa11yIssue,
} from './pa11y.js';
export { resolveChecker, PA11Y_REMEDIATION, type CheckerInfo } from './locator.js';
export {
  execFileExecutor,
  MAX_OUTPUT_BYTES,
  type ProcessExecutor,
  type ProcessOptions,
  type ProcessOutput,
} from './process.js';
export { runWithConcurrency } from './pool.js';
export {
  ISSUE_SEVERITIES,
  type IssueSeverity,
  type CheckIssue,
  type CheckFailure,
  type CheckResult,
  type Checker,
} from './types.js';
