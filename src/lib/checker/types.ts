/**
 * Checker types
 */

import type { CheckFailureKind } from '../errors/index.js';

export type IssueSeverity = 'error' | 'warning' | 'notice';

export const ISSUE_SEVERITIES: readonly IssueSeverity[] = ['error', 'warning', 'notice'];

export interface CheckIssue {
  /** Rule classifier, e.g. WCAG2AA.Principle1.Guideline1_4.1_4_3.G18.Fail */
  code: string;
  type: IssueSeverity;
  message: string;
  selector: string;
  context: string;
}

export interface CheckFailure {
  kind: CheckFailureKind;
  message: string;
}

/**
 * Outcome of checking one URL. Exactly one per URL per run.
 */
export interface CheckResult {
  readonly url: string;
  readonly issueCount: number;
  readonly issues: readonly CheckIssue[];
  readonly failure?: CheckFailure;
  readonly durationMs: number;
}

/**
 * Anything that can audit a single URL. Throws CheckInvocationError on failure.
 */
export interface Checker {
  check(url: string, signal?: AbortSignal): Promise<CheckIssue[]>;
}
