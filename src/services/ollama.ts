import { Ollama } from 'ollama';
import type { SeopostConfig } from '../types/config.js';
import type { LLMService } from './llm-service.js';
import { ConfigError, ModelNotFoundError, OllamaNotAvailableError, errorMessage } from '../utils/errors.js';

export const DEFAULT_OLLAMA_TIMEOUT_MS = 60000;

/**
 * Wrap a fetch so every request aborts after `timeoutMs`, alongside any
 * signal the caller already passed.
 */
export function withTimeout(fetchImpl: typeof fetch, timeoutMs: number): typeof fetch {
  return (input, init) => {
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = init?.signal ? AbortSignal.any([init.signal, timeout]) : timeout;
    return fetchImpl(input, { ...init, signal });
  };
}

export class OllamaService implements LLMService {
  private client: Ollama;
  private model: string;
  private temperature: number;

  constructor(config: SeopostConfig, fetchImpl: typeof fetch = fetch) {
    if (!config.ollama) {
      throw new ConfigError('Ollama configuration not found in config');
    }

    this.model = config.ollama.model;
    this.temperature = config.generation.temperature ?? 0.7;
    this.client = new Ollama({
      host: config.ollama.host,
      fetch: withTimeout(fetchImpl, config.ollama.timeout ?? DEFAULT_OLLAMA_TIMEOUT_MS),
    });
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.list();
      return true;
    } catch {
      return false;
    }
  }

  async checkModel(): Promise<boolean> {
    try {
      const models = await this.client.list();
      return models.models.some((m) => m.name.includes(this.model));
    } catch {
      return false;
    }
  }

  async ensureAvailable(): Promise<void> {
    const available = await this.isAvailable();
    if (!available) {
      throw new OllamaNotAvailableError();
    }

    const hasModel = await this.checkModel();
    if (!hasModel) {
      throw new ModelNotFoundError(this.model);
    }
  }

  async generate(prompt: string): Promise<string> {
    try {
      const response = await this.client.generate({
        model: this.model,
        prompt,
        options: {
          temperature: this.temperature,
        },
      });

      return response.response;
    } catch (error) {
      if (errorMessage(error).includes('model')) {
        throw new ModelNotFoundError(this.model);
      }
      throw error;
    }
  }

  getModelName(): string {
    return this.model;
  }
}
