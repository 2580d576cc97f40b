import type * as OpenAIModule from 'openai';
import { RateLimitedError, GenerationServiceError, GenerationTimeoutError, type GenerationFailure } from '../../types/errors.js';
import { getRetryAfterDelay } from '../../utils/retry.js';

/**
 * The SDK is loaded on first use
 */
export async function getOpenAIModule(): Promise<typeof OpenAIModule> {
  return import('openai');
}

function readStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return (
    error.name === 'APIConnectionTimeoutError' ||
    error.constructor.name === 'APIConnectionTimeoutError' ||
    error.name === 'TimeoutError' ||
    /timed?[ -]?out/i.test(error.message)
  );
}

/**
 * Map an OpenAI SDK error onto the generation failure taxonomy
 */
export function mapOpenAIError(error: unknown, serviceName: string = 'OpenAI'): GenerationFailure {
  if (error instanceof RateLimitedError || error instanceof GenerationTimeoutError || error instanceof GenerationServiceError) {
    return error;
  }

  const status = readStatus(error);
  if (status === 429) {
    const retryAfterMs = getRetryAfterDelay(error);
    return new RateLimitedError(serviceName, retryAfterMs === null ? undefined : Math.ceil(retryAfterMs / 1000));
  }
  if (status === 408 || status === 504 || isTimeoutError(error)) {
    return new GenerationTimeoutError(`${serviceName} request timed out`, { status });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GenerationServiceError(serviceName, message, status === undefined ? undefined : { status });
}
