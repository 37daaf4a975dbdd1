/**
 * TextGenerator
 *
 * The pipeline's view of the text-generation collaborator:
 * `generate(systemPrompt, userPrompt) -> text`. Without a client it runs in
 * unavailable mode and returns ''. Client faults are logged and also come
 * back as ''; callers read empty text as "no opinion", never as an error.
 */

import type { LLMClient } from './types.js';

export interface GenerationRecorder {
  recordGeneration(systemPrompt: string, userPrompt: string, response: string): void;
}

export class TextGenerator {
  private client: LLMClient | null;
  private recorder: GenerationRecorder | undefined;

  constructor(client: LLMClient | null, recorder?: GenerationRecorder) {
    this.client = client;
    this.recorder = recorder;
  }

  /**
   * A generator that never produces text
   */
  static unavailable(): TextGenerator {
    return new TextGenerator(null);
  }

  available(): boolean {
    return this.client !== null;
  }

  async generate(systemPrompt: string, userPrompt: string): Promise<string> {
    if (!this.client) {
      console.log('[TextGenerator] LLM unavailable: no client configured');
      return '';
    }

    try {
      const response = await this.client.generate(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt }
        ],
        { temperature: 0 }
      );
      const content = response.content.trim();
      if (!content) {
        console.log('[TextGenerator] LLM returned empty content');
      }
      this.recorder?.recordGeneration(systemPrompt, userPrompt, content);
      return content;
    } catch (error) {
      console.log(`[TextGenerator] LLM call failed: ${error instanceof Error ? error.message : String(error)}`);
      return '';
    }
  }
}

/**
 * Pull a JSON object out of generated text: the whole text if it parses,
 * otherwise the widest `{...}` span. Returns undefined when nothing parses.
 */
export function extractJson(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    const match = /\{[\s\S]*\}/.exec(text);
    if (!match) {
      return undefined;
    }
    try {
      return JSON.parse(match[0]);
    } catch {
      return undefined;
    }
  }
}
