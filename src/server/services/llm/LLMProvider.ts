/**
 * LLM Provider Abstraction
 *
 * The generation capability the pipeline depends on: messages in, text out.
 * Implementations raise RateLimitedError, GenerationTimeoutError or GenerationServiceError
 * (see types/errors.ts); anything else they throw is treated as a service error.
 */

export interface LLMProvider {
  /**
   * Generate a completion from the LLM
   * @param messages Array of messages (system, user, assistant)
   * @param options Optional configuration (temperature, max_tokens, etc.)
   * @returns LLM response with content and metadata
   */
  generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;

  /**
   * Check if the provider is available and configured
   */
  isAvailable(): Promise<boolean>;

  /**
   * Get provider name
   */
  getName(): string;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMGenerateOptions {
  temperature?: number;
  max_tokens?: number;
  model?: string;
  /** Per-request timeout; the provider raises GenerationTimeoutError when it passes */
  timeoutMs?: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}
