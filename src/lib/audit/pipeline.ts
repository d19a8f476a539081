/**
 * Audit Pipeline
 *
 * Checks every URL through a bounded pool. A failure on one URL is recorded
 * on that URL's result and never stops the batch.
 */

import { CheckInvocationError } from '../errors/index.js';
import { runWithConcurrency, type Checker, type CheckFailure, type CheckResult } from '../checker/index.js';

export interface AuditProgress {
  completed: number;
  total: number;
  result: CheckResult;
}

export interface RunAuditOptions {
  checker: Checker;
  /** Parallel checker invocations (default 4) */
  concurrency?: number;
  /** Aborting stops new checks and kills running ones */
  signal?: AbortSignal;
  onProgress?: (progress: AuditProgress) => void;
}

const DEFAULT_CONCURRENCY = 4;

function failed(url: string, failure: CheckFailure, durationMs: number): CheckResult {
  return Object.freeze({ url, issueCount: 0, issues: Object.freeze([]), failure, durationMs });
}

function toFailure(error: unknown): CheckFailure {
  if (error instanceof CheckInvocationError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'unknown', message: error instanceof Error ? error.message : String(error) };
}

/**
 * Check a single URL, folding any error into the result.
 */
export async function checkUrl(checker: Checker, url: string, signal?: AbortSignal): Promise<CheckResult> {
  const started = Date.now();
  try {
    const issues = await checker.check(url, signal);
    return Object.freeze({
      url,
      issueCount: issues.length,
      issues: Object.freeze([...issues]),
      durationMs: Date.now() - started,
    });
  } catch (error) {
    const failure = toFailure(error);
    console.warn(`[Checker] ${url}: ${failure.message}`);
    return failed(url, failure, Date.now() - started);
  }
}

/**
 * Run the checker over `urls`. Results are returned in the order of `urls`.
 */
export async function runAudit(urls: readonly string[], options: RunAuditOptions): Promise<CheckResult[]> {
  const { checker, signal, onProgress } = options;

  return runWithConcurrency({
    items: urls,
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    signal,
    worker: url => checkUrl(checker, url, signal),
    onCancelled: url => failed(url, { kind: 'cancelled', message: 'Run cancelled before this URL was checked' }, 0),
    onProgress: ({ completed, total, result }) => onProgress?.({ completed, total, result }),
  });
}
