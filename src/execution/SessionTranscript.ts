/**
 * SessionTranscript
 *
 * Append-only audit log of a support session. One JSON line per command
 * attempt goes to transcript-YYYY-MM-DD.jsonl; generation exchanges go to
 * generation-YYYY-MM-DD.log. Write-only: nothing in the pipeline reads it back.
 *
 * SECURITY: All text is sanitized before it is written.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { getSanitizer } from '../core/OutputSanitizer.js';
import type { CommandResult } from '../core/types.js';
import type { GenerationRecorder } from '../providers/TextGenerator.js';

export interface TranscriptEntry {
  timestamp: string;
  sessionId: string;
  command: string;
  allowed: boolean;
  output: string;
  error: string;
  returnCode: number | null;
}

export interface TranscriptSink extends GenerationRecorder {
  recordCommand(result: CommandResult): void;
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

export class SessionTranscript implements TranscriptSink {
  private readonly logDir: string;
  readonly sessionId: string;

  constructor(logDir: string, sessionId: string = randomUUID()) {
    this.logDir = logDir;
    this.sessionId = sessionId;
    this.ensureLogDir();
  }

  private ensureLogDir(): void {
    if (!existsSync(this.logDir)) {
      mkdirSync(this.logDir, { recursive: true });
    }
  }

  get transcriptPath(): string {
    return join(this.logDir, `transcript-${today()}.jsonl`);
  }

  get generationLogPath(): string {
    return join(this.logDir, `generation-${today()}.log`);
  }

  recordCommand(result: CommandResult): void {
    const sanitizer = getSanitizer();
    const entry: TranscriptEntry = {
      timestamp: new Date().toISOString(),
      sessionId: this.sessionId,
      command: sanitizer.sanitize(result.command),
      allowed: result.allowed,
      output: sanitizer.sanitize(result.output),
      error: sanitizer.sanitize(result.error),
      returnCode: result.returnCode
    };

    try {
      appendFileSync(this.transcriptPath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      console.error(`[SessionTranscript] Failed to write transcript: ${err}`);
    }
  }

  recordGeneration(systemPrompt: string, userPrompt: string, response: string): void {
    const sanitizer = getSanitizer();
    const stamp = new Date().toISOString();
    const content = [
      `${stamp} SESSION: ${this.sessionId}`,
      `${stamp} SYSTEM: ${sanitizer.sanitize(systemPrompt)}`,
      `${stamp} USER: ${sanitizer.sanitize(userPrompt)}`,
      `${stamp} ASSISTANT: ${sanitizer.sanitize(response)}`,
      '-'.repeat(80)
    ].join('\n');

    try {
      appendFileSync(this.generationLogPath, content + '\n', 'utf-8');
    } catch (err) {
      console.error(`[SessionTranscript] Failed to write generation log: ${err}`);
    }
  }
}
