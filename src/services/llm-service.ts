/**
 * Interface for LLM service implementations.
 * The completion service is a single prompt in, text out call.
 */
export interface LLMService {
  /**
   * Check if the service is available
   */
  isAvailable(): Promise<boolean>;

  /**
   * Ensure the service is available and configured correctly
   * @throws Error if service is not available
   */
  ensureAvailable(): Promise<void>;

  /**
   * Generate text from a prompt
   */
  generate(prompt: string): Promise<string>;

  getModelName(): string;
}
