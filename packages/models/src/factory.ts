import { ConfigError, type RefractConfig } from '@refract/shared';
import type { ModelProvider } from './provider.js';
import { OpenAIProvider } from './providers/openai.js';
import { OllamaProvider } from './providers/ollama.js';

/** Chooses the backend once, at startup. Business logic only sees `ModelProvider`. */
export function createProvider(config: RefractConfig): ModelProvider {
  switch (config.provider) {
    case 'openai': {
      const { apiKey, model, baseUrl } = config.providers.openai;
      if (!apiKey) {
        throw new ConfigError('provider "openai" requires an API key (set OPENAI_API_KEY, or USE_OLLAMA=true for a local model)');
      }
      return new OpenAIProvider({ apiKey, model, baseUrl });
    }
    case 'ollama':
      return new OllamaProvider(config.providers.ollama);
  }
}
