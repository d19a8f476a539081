/**
 * Error Types
 *
 * Input problems abort a run before any checker is launched. Per-URL checker
 * failures are caught by the audit pipeline and become flagged rows.
 */

export class AuditError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuditError';
  }
}

/**
 * The uploaded file is not parseable or lacks the columns we need.
 */
export class InputFormatError extends AuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputFormatError';
  }
}

/**
 * Nothing usable was left after validation.
 */
export class EmptyInputError extends AuditError {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export type CheckFailureKind =
  | 'timeout'
  | 'exit'
  | 'unparsable'
  | 'spawn'
  | 'cancelled'
  | 'unknown';

/**
 * A single checker invocation failed. Never aborts a batch.
 */
export class CheckInvocationError extends AuditError {
  readonly url: string;
  readonly kind: CheckFailureKind;

  constructor(url: string, kind: CheckFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CheckInvocationError';
    this.url = url;
    this.kind = kind;
  }
}

/**
 * The checker executable could not be run at all.
 */
export class ToolNotFoundError extends AuditError {
  readonly command: string;
  readonly remediation: string;

  constructor(command: string, remediation: string, options?: { cause?: unknown }) {
    super(`Accessibility checker "${command}" is not installed or not on PATH`, options);
    this.name = 'ToolNotFoundError';
    this.command = command;
    this.remediation = remediation;
  }
}
