/**
 * Custom Error Classes for Support Pilot
 */

/**
 * Error thrown when a caller cancels a pipeline run between steps
 */
export class PipelineCancelledError extends Error {
  public readonly phase: string;

  constructor(phase: string) {
    super(`Pipeline cancelled during ${phase}`);
    this.name = 'PipelineCancelledError';
    this.phase = phase;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineCancelledError);
    }
  }
}

/**
 * Error raised by a shell executor when a command exceeds its timeout
 */
export class ShellTimeoutError extends Error {
  public readonly command: string;
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'ShellTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error raised by a shell executor when a command writes more output than it buffers
 */
export class ShellOutputLimitError extends Error {
  public readonly command: string;
  public readonly limitBytes: number;

  constructor(command: string, limitBytes: number) {
    super(`Command output exceeded ${limitBytes} bytes: ${command}`);
    this.name = 'ShellOutputLimitError';
    this.command = command;
    this.limitBytes = limitBytes;
  }
}

/**
 * Error thrown at start-up when the environment configuration is invalid
 */
export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Error thrown when the playbook catalog does not match its schema
 */
export class PlaybookValidationError extends Error {
  public readonly source: string;

  constructor(source: string, detail: string) {
    super(`Playbook catalog ${source} is invalid: ${detail}`);
    this.name = 'PlaybookValidationError';
    this.source = source;
  }
}

/**
 * Throw if the signal has been aborted
 */
export function throwIfCancelled(signal: AbortSignal | undefined, phase: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(phase);
  }
}
