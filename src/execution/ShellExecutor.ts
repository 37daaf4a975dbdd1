/**
 * ShellExecutor
 *
 * Process-execution collaborator: run one command in the host shell and
 * return its output. Non-zero exit codes and stderr are data; only a
 * timeout, an output overflow or a failure to start the shell is a fault
 * (rejected promise).
 */

import { execFile } from 'child_process';
import { ShellOutputLimitError, ShellTimeoutError } from '../core/errors.js';

export interface ShellOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ShellExecutor {
  execute(command: string, timeoutMs: number): Promise<ShellOutput>;
}

export type ShellKind = 'powershell' | 'sh';

export const MAX_BUFFER_BYTES = 10 * 1024 * 1024;
const MAX_BUFFER_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

type ExecFailure = Error & { killed?: boolean; code?: unknown };

/**
 * Turn an execFile callback into output or a fault. The child is also
 * killed on overflow, so the buffer check comes before the timeout check.
 */
export function settleExecution(
  command: string,
  timeoutMs: number,
  error: ExecFailure | null,
  stdout: string,
  stderr: string
): ShellOutput {
  if (!error) {
    return { stdout, stderr, exitCode: 0 };
  }
  if (error.code === MAX_BUFFER_CODE) {
    throw new ShellOutputLimitError(command, MAX_BUFFER_BYTES);
  }
  if (error.killed) {
    throw new ShellTimeoutError(command, timeoutMs);
  }
  if (typeof error.code === 'number') {
    return { stdout, stderr, exitCode: error.code };
  }
  throw error;
}

/**
 * Runs commands through PowerShell (Windows) or /bin/sh
 */
export class NodeShellExecutor implements ShellExecutor {
  private readonly shell: ShellKind;

  constructor(shell: ShellKind = process.platform === 'win32' ? 'powershell' : 'sh') {
    this.shell = shell;
  }

  execute(command: string, timeoutMs: number): Promise<ShellOutput> {
    const [file, args]: [string, string[]] = this.shell === 'powershell'
      ? ['powershell', ['-NoProfile', '-Command', command]]
      : ['/bin/sh', ['-c', command]];

    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        { timeout: timeoutMs, maxBuffer: MAX_BUFFER_BYTES, windowsHide: true, encoding: 'utf8' },
        (error, stdout, stderr) => {
          try {
            resolve(settleExecution(command, timeoutMs, error, stdout, stderr));
          } catch (fault) {
            reject(fault);
          }
        }
      );
    });
  }
}
