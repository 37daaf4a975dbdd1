/**
 * Multi-Provider Types
 *
 * Abstraction layer for the text-generation backends:
 * - openai: any OpenAI-compatible chat endpoint (OpenAI, Groq, ...)
 * - ollama: local models via Ollama
 */

export type Provider = 'openai' | 'ollama';

export interface ProviderConfig {
  provider: Provider;
  model: string;
  apiKey?: string;
  apiEndpoint?: string;  // Groq: https://api.groq.com/openai/v1, Ollama: http://localhost:11434
  maxTokens?: number;
  timeoutMs?: number;
}

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
}

export interface LLMResponse {
  content: string;
  stopReason: 'end_turn' | 'max_tokens';
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMClient {
  generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse>;
  readonly provider: Provider;
}
