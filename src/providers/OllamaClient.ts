/**
 * OllamaClient - Local LLM provider via Ollama
 *
 * Ollama provides a simple REST API for local model inference.
 * Default endpoint: http://localhost:11434
 */

import { z } from 'zod';
import type { LLMClient, Message, LLMResponse, ProviderConfig, GenerateOptions } from './types.js';

interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  stream: boolean;
  options?: {
    num_predict?: number;
    temperature?: number;
    stop?: string[];
  };
}

const OllamaChatResponse = z.object({
  model: z.string(),
  message: z.object({
    role: z.string(),
    content: z.string()
  }),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

const DEFAULT_TIMEOUT_MS = 30000;

export class OllamaClient implements LLMClient {
  private endpoint: string;
  private model: string;
  private timeoutMs: number;

  readonly provider = 'ollama' as const;

  constructor(config: ProviderConfig) {
    this.endpoint = config.apiEndpoint || 'http://localhost:11434';
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse> {
    const request: OllamaChatRequest = {
      model: this.model,
      messages: messages.map(m => ({
        role: m.role,
        content: m.content
      })),
      stream: false,
      options: {
        num_predict: options?.maxTokens,
        temperature: options?.temperature,
        stop: options?.stopSequences
      }
    };

    try {
      const response = await fetch(`${this.endpoint}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error ${response.status}: ${errorText}`);
      }

      const parsed = OllamaChatResponse.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Ollama returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }
      const data = parsed.data;

      return {
        content: data.message.content,
        stopReason: data.done_reason === 'length' ? 'max_tokens' : 'end_turn',
        usage: {
          inputTokens: data.prompt_eval_count || 0,
          outputTokens: data.eval_count || 0
        }
      };
    } catch (error) {
      if (error instanceof Error) {
        // Check if Ollama is not running
        if (error.message.includes('ECONNREFUSED') || error.message.includes('fetch failed')) {
          throw new Error(`Ollama not running at ${this.endpoint}. Start with: ollama serve`);
        }
        throw error;
      }
      throw new Error(`Ollama error: ${String(error)}`);
    }
  }
}
