/**
 * Test doubles for the checker process.
 */

import type { ProcessExecutor, ProcessOptions, ProcessOutput } from '../src/lib/checker/index.js';

export interface ExecutorCall {
  command: string;
  args: string[];
  options: ProcessOptions;
}

export function output(partial: Partial<ProcessOutput> = {}): ProcessOutput {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    timedOut: false,
    aborted: false,
    ...partial,
  };
}

export function pa11yIssue(message: string, code: string, type: 'error' | 'warning' | 'notice' = 'error', selector = 'html > body') {
  return { code, type, typeCode: type === 'error' ? 1 : type === 'warning' ? 2 : 3, message, context: '<div></div>', selector, runner: 'htmlcs' };
}

/**
 * pa11y output for a page with issues (exit code 2) or without (exit code 0).
 */
export function pa11yOutput(issues: ReturnType<typeof pa11yIssue>[]): ProcessOutput {
  return output({ exitCode: issues.length > 0 ? 2 : 0, stdout: JSON.stringify(issues) });
}

/**
 * Executor that answers `--version` and routes each check by its URL
 * (the last argument).
 */
export function fakeExecutor(
  byUrl: Record<string, ProcessOutput | ((options: ProcessOptions) => Promise<ProcessOutput>)>,
  version: ProcessOutput = output({ stdout: '8.0.0\n' })
): ProcessExecutor & { calls: ExecutorCall[] } {
  const calls: ExecutorCall[] = [];
  const executor = async (command: string, args: readonly string[], options: ProcessOptions): Promise<ProcessOutput> => {
    calls.push({ command, args: [...args], options });
    if (args[0] === '--version') return version;

    const url = args[args.length - 1];
    const answer = byUrl[url];
    if (answer === undefined) return output({ exitCode: 1, stderr: `Error: no canned output for ${url}` });
    return typeof answer === 'function' ? answer(options) : answer;
  };
  return Object.assign(executor, { calls });
}

/**
 * Behaves like a pa11y process that never finishes until the run is aborted.
 */
export function hangUntilAborted(options: ProcessOptions): Promise<ProcessOutput> {
  return new Promise(resolve => {
    const done = () => resolve(output({ exitCode: null, aborted: true }));
    if (options.signal?.aborted) {
      done();
      return;
    }
    options.signal?.addEventListener('abort', done, { once: true });
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
