/**
 * pa11y Checker
 *
 * Runs the pa11y CLI for one URL with the JSON reporter and maps its issues.
 */

import { z } from 'zod';
import { CheckInvocationError } from '../errors/index.js';
import { DEFAULT_CONFIG, type CheckerSettings } from '../config/index.js';
import { execFileExecutor, MAX_OUTPUT_BYTES, type ProcessExecutor } from './process.js';
import type { Checker, CheckIssue, IssueSeverity } from './types.js';

// ============================================================================
// Output schema
// ============================================================================

const Pa11yIssueSchema = z.object({
  code: z.string().nullish(),
  type: z.string().nullish(),
  typeCode: z.number().nullish(),
  message: z.string().nullish(),
  context: z.string().nullish(),
  selector: z.string().nullish(),
});

const Pa11yOutputSchema = z.array(Pa11yIssueSchema);

export type Pa11yIssue = z.infer<typeof Pa11yIssueSchema>;

/**
 * Extra time the process gets beyond pa11y's own page timeout.
 */
const PROCESS_GRACE_MS = 5000;

// ============================================================================
// Parsing
// ============================================================================

function toSeverity(type: string | null | undefined, typeCode: number | null | undefined): IssueSeverity {
  const t = (type ?? '').toLowerCase();
  if (t === 'error' || typeCode === 1) return 'error';
  if (t === 'warning' || typeCode === 2) return 'warning';
  return 'notice';
}

/**
 * Parse pa11y JSON reporter output. Returns null when stdout is not a
 * JSON array of issues.
 */
export function parsePa11yOutput(stdout: string): CheckIssue[] | null {
  const text = stdout.trim();
  if (!text) return null;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const parsed = Pa11yOutputSchema.safeParse(json);
  if (!parsed.success) return null;

  return parsed.data.map(issue => ({
    code: (issue.code ?? '').trim(),
    type: toSeverity(issue.type, issue.typeCode),
    message: (issue.message ?? '').trim(),
    selector: issue.selector ?? '',
    context: issue.context ?? '',
  }));
}

function firstLine(text: string): string {
  const line = text.split('\n').map(l => l.trim()).find(l => l.length > 0);
  return line ?? 'no output';
}

// ============================================================================
// Checker
// ============================================================================

export type Pa11yCheckerOptions = Partial<Pick<
  CheckerSettings,
  'command' | 'standard' | 'timeout_ms' | 'include_warnings' | 'include_notices'
>> & {
  executor?: ProcessExecutor;
};

export class Pa11yChecker implements Checker {
  private settings: Omit<CheckerSettings, 'concurrency'>;
  private executor: ProcessExecutor;

  constructor(options: Pa11yCheckerOptions = {}) {
    const { executor, ...settings } = options;
    this.settings = {
      command: DEFAULT_CONFIG.checker.command,
      standard: DEFAULT_CONFIG.checker.standard,
      timeout_ms: DEFAULT_CONFIG.checker.timeout_ms,
      include_warnings: DEFAULT_CONFIG.checker.include_warnings,
      include_notices: DEFAULT_CONFIG.checker.include_notices,
      ...settings,
    };
    this.executor = executor ?? execFileExecutor;
  }

  get command(): string {
    return this.settings.command;
  }

  /**
   * CLI arguments for one URL
   */
  buildArgs(url: string): string[] {
    const args = [
      '--reporter', 'json',
      '--standard', this.settings.standard,
      '--timeout', String(this.settings.timeout_ms),
    ];
    if (this.settings.include_warnings) args.push('--include-warnings');
    if (this.settings.include_notices) args.push('--include-notices');
    args.push(url);
    return args;
  }

  async check(url: string, signal?: AbortSignal): Promise<CheckIssue[]> {
    if (signal?.aborted) {
      throw new CheckInvocationError(url, 'cancelled', 'Run cancelled before this URL was checked');
    }

    const output = await this.executor(this.settings.command, this.buildArgs(url), {
      timeoutMs: this.settings.timeout_ms + PROCESS_GRACE_MS,
      signal,
    });

    if (output.aborted) {
      throw new CheckInvocationError(url, 'cancelled', 'Run cancelled while this URL was being checked');
    }
    if (output.timedOut) {
      const seconds = Math.round((this.settings.timeout_ms + PROCESS_GRACE_MS) / 1000);
      throw new CheckInvocationError(url, 'timeout', `Timed out after ${seconds} seconds`);
    }
    if (output.overflowed) {
      throw new CheckInvocationError(
        url,
        'unparsable',
        `Output from ${this.settings.command} exceeded ${MAX_OUTPUT_BYTES / (1024 * 1024)} MB`
      );
    }
    if (output.spawnError) {
      throw new CheckInvocationError(
        url,
        'spawn',
        `Could not start ${this.settings.command}: ${output.spawnError}`
      );
    }

    // pa11y exits 2 when it found issues, so the exit code alone is not a failure
    const issues = parsePa11yOutput(output.stdout);
    if (issues) return issues;

    if (output.exitCode !== 0) {
      throw new CheckInvocationError(
        url,
        'exit',
        `${this.settings.command} exited with code ${output.exitCode ?? 'unknown'}: ${firstLine(output.stderr || output.stdout)}`
      );
    }
    throw new CheckInvocationError(url, 'unparsable', `Unparsable output from ${this.settings.command}`);
  }
}

export function createPa11yChecker(options?: Pa11yCheckerOptions): Pa11yChecker {
  return new Pa11yChecker(options);
}
