/**
 * Retry Utility with Exponential Backoff
 *
 * Backoff arithmetic shared by the generation state machine, plus a generic retry loop
 * used for document downloads.
 */

import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total number of attempts, first one included (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Waits between attempts; tests swap in an instant version */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
} as const;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function getStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object') {
    if ('response' in error && isRecord(error.response) && typeof error.response.status === 'number') {
      return error.response.status;
    }
    if ('status' in error && typeof error.status === 'number') {
      return error.status;
    }
  }
  return undefined;
}

/**
 * Default retryable error detection
 * Retries on transient errors: 408, 429, 5xx, ECONNRESET, ETIMEDOUT, ECONNREFUSED
 */
function defaultIsRetryable(error: unknown): boolean {
  const status = getStatus(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || (status >= 500 && status < 600);
  }

  if (error && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED' || code === 'ECONNABORTED') {
      return true;
    }
  }

  // Axios errors without a response are network failures
  if (error && typeof error === 'object' && 'isAxiosError' in error) {
    return !('response' in error) || error.response === undefined;
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 *
 * @param retryIndex - Zero for the first retry
 * @returns Delay in milliseconds
 */
export function calculateExponentialBackoff(
  retryIndex: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, Math.max(0, retryIndex));
  return Math.min(delay, maxDelay);
}

/**
 * Extract a server-provided retry delay from an error
 *
 * @returns Retry-After value in milliseconds, or null if not present
 */
export function getRetryAfterDelay(error: unknown): number | null {
  if (isRecord(error)) {
    // axios puts headers on the response, the OpenAI SDK on the error itself
    const headers = isRecord(error.response) ? error.response.headers : error.headers;
    const retryAfter = isRecord(headers) ? headers['retry-after'] : undefined;
    if (typeof retryAfter === 'string') {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds) && seconds > 0) {
        return seconds * 1000;
      }
    }
  }

  if (error && typeof error === 'object' && 'retryAfterSeconds' in error) {
    const seconds = error.retryAfterSeconds;
    if (typeof seconds === 'number' && seconds > 0) {
      return seconds * 1000;
    }
  }

  return null;
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry (async function)
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, URL)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted or the error is not retryable
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = defaultIsRetryable,
    sleep: wait = sleep,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 1) {
        logger.info({ attempt, maxAttempts, context }, `Operation succeeded after ${attempt - 1} retries${contextStr}`);
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (!isRetryable(error) || attempt >= maxAttempts) {
        logger.debug({ attempt, maxAttempts, error: message, context }, `Giving up${contextStr}`);
        throw error;
      }

      const retryAfter = getRetryAfterDelay(error);
      const delay =
        retryAfter !== null
          ? Math.min(retryAfter, maxDelay)
          : calculateExponentialBackoff(attempt - 1, initialDelay, multiplier, maxDelay);

      logger.warn(
        { attempt, maxAttempts, delay, error: message, context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts})`
      );

      await wait(delay);
    }
  }
}
