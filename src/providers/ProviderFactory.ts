/**
 * ProviderFactory - Creates LLM clients for different providers
 *
 * Supports:
 * - openai: OpenAI-compatible endpoints (OpenAI, Groq) via the openai SDK
 * - ollama: Local models via Ollama
 */

import { OllamaClient } from './OllamaClient.js';
import { OpenAiClient } from './OpenAiClient.js';
import type { LLMClient, ProviderConfig } from './types.js';

export class ProviderFactory {
  private static clients: Map<string, LLMClient> = new Map();

  /**
   * Create or get cached client for a provider config.
   * Returns null when the provider cannot be used (missing credential),
   * which callers treat as "generation unavailable".
   */
  static createClient(config: ProviderConfig): LLMClient | null {
    const cacheKey = `${config.provider}:${config.model}:${config.apiEndpoint || 'default'}`;

    const cached = this.clients.get(cacheKey);
    if (cached) {
      return cached;
    }

    let client: LLMClient;

    switch (config.provider) {
      case 'ollama':
        client = new OllamaClient(config);
        break;

      case 'openai':
        if (!config.apiKey) {
          console.log('[ProviderFactory] LLM unavailable: no API key configured');
          return null;
        }
        client = new OpenAiClient(config);
        break;
    }

    this.clients.set(cacheKey, client);
    return client;
  }

  /**
   * Clear cached clients (for testing or reconfiguration)
   */
  static clearCache(): void {
    this.clients.clear();
  }
}
