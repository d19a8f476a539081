/**
 * Process execution seam.
 *
 * Everything that launches the checker goes through a ProcessExecutor so the
 * pipeline can run against canned output in tests.
 */

import { execFile } from 'child_process';

export interface ProcessOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ProcessOutput {
  /** null when the process was killed or never started */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** errno-style code when the process could not be started (e.g. ENOENT) */
  spawnError?: string;
  /** stdout or stderr went past the output limit and the process was killed */
  overflowed?: boolean;
}

export type ProcessExecutor = (
  command: string,
  args: readonly string[],
  options: ProcessOptions
) => Promise<ProcessOutput>;

export const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

const MAX_BUFFER_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

/**
 * Default executor backed by child_process.execFile. Never rejects; every
 * outcome is described by the returned ProcessOutput.
 */
export const execFileExecutor: ProcessExecutor = (command, args, options) =>
  new Promise(resolve => {
    execFile(
      command,
      [...args],
      {
        timeout: options.timeoutMs,
        signal: options.signal,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf8',
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false, aborted: false });
          return;
        }

        const aborted = options.signal?.aborted ?? false;
        const code = error.code;
        const overflowed = !aborted && code === MAX_BUFFER_CODE;
        // Only system errors from spawn carry a syscall
        const spawnFailed = !aborted && typeof code === 'string' && typeof error.syscall === 'string';
        resolve({
          exitCode: typeof code === 'number' ? code : null,
          stdout,
          stderr,
          timedOut: !aborted && !overflowed && error.killed === true && typeof code !== 'number',
          aborted,
          spawnError: spawnFailed ? code : undefined,
          overflowed,
        });
      }
    );
  });
