/**
 * CommandRunner
 *
 * Runs a single command behind the CommandFilter. A denied command is
 * returned as `allowed: false` without ever reaching the executor; a timeout
 * or executor fault is returned as `allowed: true` with the fault text in
 * `error` and no return code, so policy rejections and runtime failures stay
 * distinguishable.
 */

import type { CommandFilter } from '../policy/CommandFilter.js';
import type { CommandResult } from '../core/types.js';
import type { ShellExecutor } from './ShellExecutor.js';
import type { TranscriptSink } from './SessionTranscript.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 60000;

export interface CommandRunnerOptions {
  timeoutMs?: number;
  transcript?: TranscriptSink;
}

export class CommandRunner {
  readonly filter: CommandFilter;
  private readonly executor: ShellExecutor;
  private readonly timeoutMs: number;
  private readonly transcript: TranscriptSink | undefined;

  constructor(filter: CommandFilter, executor: ShellExecutor, options: CommandRunnerOptions = {}) {
    this.filter = filter;
    this.executor = executor;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.transcript = options.transcript;
  }

  async run(command: string): Promise<CommandResult> {
    const decision = this.filter.isAllowed(command);
    if (!decision.allowed) {
      console.log(`[CommandRunner] BLOCKED: ${command} | ${decision.reason}`);
      return this.record({ command, allowed: false, output: '', error: decision.reason, returnCode: null });
    }

    console.log(`[CommandRunner] RUN: ${command}`);
    try {
      const { stdout, stderr, exitCode } = await this.executor.execute(command, this.timeoutMs);
      console.log(`[CommandRunner] EXIT ${exitCode}`);
      return this.record({
        command,
        allowed: true,
        output: stdout.trim(),
        error: stderr.trim(),
        returnCode: exitCode
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.log(`[CommandRunner] ERROR: ${message}`);
      return this.record({ command, allowed: true, output: '', error: message, returnCode: null });
    }
  }

  /**
   * Append an attempt that never reached run() (preflight skip, filter block)
   */
  recordAttempt(result: CommandResult): void {
    this.transcript?.recordCommand(result);
  }

  private record(result: CommandResult): CommandResult {
    this.transcript?.recordCommand(result);
    return result;
  }
}
