/**
 * Checker Locator
 *
 * Confirms at startup that the checker can be launched at all.
 */

import { ToolNotFoundError } from '../errors/index.js';
import { execFileExecutor, type ProcessExecutor } from './process.js';

export interface CheckerInfo {
  command: string;
  version: string;
}

export const PA11Y_REMEDIATION = 'Install it with: npm install -g pa11y';

const VERSION_TIMEOUT_MS = 15000;

/**
 * Run `<command> --version`. Any failure to start or a non-zero exit means
 * the tool is unusable and the app should not start.
 */
export async function resolveChecker(
  command: string,
  executor: ProcessExecutor = execFileExecutor
): Promise<CheckerInfo> {
  const output = await executor(command, ['--version'], { timeoutMs: VERSION_TIMEOUT_MS });

  if (output.spawnError || output.timedOut || output.exitCode !== 0) {
    const detail = output.spawnError ?? (output.timedOut ? 'timed out' : `exit code ${output.exitCode ?? 'unknown'}`);
    throw new ToolNotFoundError(command, PA11Y_REMEDIATION, { cause: detail });
  }

  return { command, version: output.stdout.trim() || 'unknown' };
}
