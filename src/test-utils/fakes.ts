import type { LLMService } from '../services/llm-service.js';

export function words(count: number, prefix: string = 'word'): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
}

/**
 * LLM stand-in that replays canned responses; an Error entry is thrown
 */
export class StubLLM implements LLMService {
  readonly prompts: string[] = [];
  private responses: Array<string | Error>;

  constructor(responses: Array<string | Error>) {
    this.responses = responses;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async ensureAvailable(): Promise<void> {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const index = Math.min(this.prompts.length - 1, this.responses.length - 1);
    const next = this.responses[index];
    if (next === undefined) {
      throw new Error('StubLLM has no responses');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  getModelName(): string {
    return 'stub-model';
  }
}
