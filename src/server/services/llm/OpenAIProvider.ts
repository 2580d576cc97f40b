/**
 * OpenAI LLM Provider
 *
 * Implements LLMProvider for the OpenAI chat completions API (or any compatible endpoint
 * via OPENAI_BASE_URL). SDK-level retries are disabled: the generation state machine owns
 * retrying, so every failure is mapped onto the generation failure taxonomy and rethrown.
 */

import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { GenerationServiceError } from '../../types/errors.js';
import { getEnv } from '../../config/env.js';
import { getOpenAIModule, mapOpenAIError } from './openaiUtils.js';

/**
 * The slice of the SDK client the provider uses
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
          temperature?: number;
          max_tokens?: number;
        },
        options?: { timeout?: number }
      ): Promise<{
        choices: Array<{
          message?: {
            content?: string | null;
          };
        }>;
        model: string;
        usage?: {
          prompt_tokens: number;
          completion_tokens: number;
          total_tokens: number;
        };
      }>;
    };
  };
}

export interface OpenAIProviderConfig {
  apiKey?: string;
  baseURL?: string;
  defaultModel?: string;
  temperature?: number;
  timeoutMs?: number;
}

export class OpenAIProvider implements LLMProvider {
  private config: OpenAIProviderConfig;
  private client: OpenAIClient | null = null;

  constructor(config?: OpenAIProviderConfig) {
    const env = getEnv();
    this.config = {
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL,
      defaultModel: env.STUDY_MODEL,
      temperature: env.GENERATION_TEMPERATURE,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
      ...config,
    };
  }

  getName(): string {
    return 'openai';
  }

  async isAvailable(): Promise<boolean> {
    if (!this.config.apiKey) {
      return false;
    }
    try {
      await this.getClient();
      return true;
    } catch (error) {
      logger.debug({ error }, 'OpenAI not available');
      return false;
    }
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const client = await this.getClient();
    const model = options?.model || this.config.defaultModel || 'gpt-4o-mini';
    const temperature = options?.temperature ?? this.config.temperature ?? 0.7;
    const max_tokens = options?.max_tokens;
    const timeouts = [options?.timeoutMs, this.config.timeoutMs].filter(
      (value): value is number => typeof value === 'number' && value > 0
    );
    const timeout = timeouts.length > 0 ? Math.min(...timeouts) : undefined;

    let response: Awaited<ReturnType<OpenAIClient['chat']['completions']['create']>>;
    try {
      response = await client.chat.completions.create(
        {
          model,
          messages: messages.map((msg) => ({
            role: msg.role,
            content: msg.content,
          })),
          temperature,
          ...(max_tokens && { max_tokens }),
        },
        timeout ? { timeout } : undefined
      );
    } catch (error) {
      const failure = mapOpenAIError(error);
      logger.warn({ code: failure.code, model, message: failure.message }, 'OpenAI request failed');
      throw failure;
    }

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new GenerationServiceError('OpenAI', 'Empty response from OpenAI', {
        reason: 'empty_response',
        model,
      });
    }

    return {
      content,
      model: response.model,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }

  /**
   * Set OpenAI client (for testing)
   */
  setClient(client: OpenAIClient): void {
    this.client = client;
  }

  private async getClient(): Promise<OpenAIClient> {
    if (this.client) {
      return this.client;
    }

    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new GenerationServiceError('OpenAI', 'OPENAI_API_KEY is not configured', { reason: 'missing_api_key' });
    }

    const OpenAI = await getOpenAIModule();
    const client: OpenAIClient = new OpenAI.default({
      apiKey,
      baseURL: this.config.baseURL,
      maxRetries: 0,
      timeout: this.config.timeoutMs,
    });
    this.client = client;
    return client;
  }
}
