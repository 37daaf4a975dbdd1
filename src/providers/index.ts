/**
 * Multi-Provider Module
 *
 * Text-generation backends behind a single LLMClient interface.
 */

export { ProviderFactory } from './ProviderFactory.js';
export { OllamaClient } from './OllamaClient.js';
export { OpenAiClient } from './OpenAiClient.js';
export { TextGenerator, extractJson } from './TextGenerator.js';
export type { GenerationRecorder } from './TextGenerator.js';
export type {
  Provider,
  ProviderConfig,
  Message,
  GenerateOptions,
  LLMResponse,
  LLMClient
} from './types.js';
