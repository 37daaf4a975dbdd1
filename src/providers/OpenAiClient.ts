/**
 * OpenAiClient - OpenAI-compatible chat completions
 *
 * Works against api.openai.com and compatible endpoints such as Groq
 * (https://api.groq.com/openai/v1) by overriding the base URL.
 */

import OpenAI from 'openai';
import type { LLMClient, Message, LLMResponse, ProviderConfig, GenerateOptions } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;
const GROQ_FALLBACK_MODEL = 'llama3-70b-8192';

export class OpenAiClient implements LLMClient {
  private client: OpenAI;
  private model: string;
  private maxTokens: number | undefined;

  readonly provider = 'openai' as const;

  constructor(config: ProviderConfig) {
    if (!config.apiKey) {
      throw new Error('API key is required for the openai provider');
    }
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiEndpoint,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0
    });
    this.model = config.model;
    this.maxTokens = config.maxTokens;

    // Groq does not serve openai/* model ids
    if (config.apiEndpoint?.includes('groq.com') && this.model.startsWith('openai/')) {
      console.warn(`[OpenAiClient] Model '${this.model}' is not served by Groq, using ${GROQ_FALLBACK_MODEL}`);
      this.model = GROQ_FALLBACK_MODEL;
    }
  }

  async generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(m => ({ role: m.role, content: m.content })),
      temperature: options?.temperature ?? 0,
      max_tokens: options?.maxTokens ?? this.maxTokens,
      stop: options?.stopSequences
    });

    const choice = completion.choices[0];
    return {
      content: choice?.message.content ?? '',
      stopReason: choice?.finish_reason === 'length' ? 'max_tokens' : 'end_turn',
      usage: completion.usage
        ? {
            inputTokens: completion.usage.prompt_tokens,
            outputTokens: completion.usage.completion_tokens
          }
        : undefined
    };
  }
}
