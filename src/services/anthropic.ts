import Anthropic from '@anthropic-ai/sdk';
import type { SeopostConfig } from '../types/config.js';
import type { LLMService } from './llm-service.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

export class AnthropicService implements LLMService {
  private client: Anthropic;
  private config: SeopostConfig;
  private apiKey: string;
  private lastError: unknown = null;

  constructor(config: SeopostConfig) {
    this.config = config;

    // Get API key from env or config
    this.apiKey = process.env.ANTHROPIC_API_KEY || config.anthropic?.apiKey || '';

    if (!this.apiKey) {
      throw new ConfigError(
        'Anthropic API key not found. Set ANTHROPIC_API_KEY environment variable or add to config.'
      );
    }

    this.client = new Anthropic({
      apiKey: this.apiKey,
    });
  }

  async isAvailable(): Promise<boolean> {
    try {
      // Test API key by making a minimal request
      await this.client.messages.create({
        model: this.getModelName(),
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch (error) {
      // Kept for ensureAvailable's report
      this.lastError = error;
      return false;
    }
  }

  async ensureAvailable(): Promise<void> {
    const available = await this.isAvailable();
    if (!available) {
      let errorMsg = 'Anthropic API is not available.\n';

      if (this.lastError) {
        const errorStr = String(this.lastError);

        if (errorStr.includes('401') || errorStr.includes('authentication')) {
          errorMsg += '✗ Authentication failed: Invalid API key\n';
          errorMsg += '  - Check ANTHROPIC_API_KEY in your .env file or environment\n';
        } else if (errorStr.includes('model')) {
          errorMsg += `✗ Model not found: ${this.getModelName()}\n`;
          errorMsg += '  - Check the model name in .seopostrc.json\n';
        } else if (errorStr.includes('network') || errorStr.includes('ENOTFOUND')) {
          errorMsg += '✗ Network error: Cannot reach Anthropic API\n';
          errorMsg += '  - Check your internet connection\n';
        } else {
          errorMsg += `✗ Error: ${errorMessage(this.lastError)}\n`;
        }
      }

      throw new Error(errorMsg);
    }
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.getModelName(),
      max_tokens: this.config.anthropic?.maxTokens || 1024,
      temperature: this.config.generation.temperature ?? 0.7,
      messages: [
        {
          role: 'user',
          content: prompt,
        },
      ],
    });

    // Extract text from response
    const textContent = response.content.find((block) => block.type === 'text');
    if (textContent && textContent.type === 'text') {
      return textContent.text;
    }

    throw new Error('No text content in Anthropic response');
  }

  getModelName(): string {
    return this.config.anthropic?.model || 'claude-3-5-sonnet-20241022';
  }
}
