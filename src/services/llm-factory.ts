import type { SeopostConfig } from '../types/config.js';
import type { LLMService } from './llm-service.js';
import { OllamaService } from './ollama.js';
import { AnthropicService } from './anthropic.js';

/**
 * Factory function to create the appropriate LLM service based on config
 */
export function createLLMService(config: SeopostConfig): LLMService {
  const provider = config.llm.provider;

  switch (provider) {
    case 'ollama':
      return new OllamaService(config);
    case 'anthropic':
      return new AnthropicService(config);
    default: {
      const unknown: never = provider;
      throw new Error(`Unknown LLM provider: ${String(unknown)}`);
    }
  }
}
