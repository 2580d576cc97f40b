/**
 * Retry state machine for one artifact
 *
 *   pending → attempting → succeeded
 *                ↓    ↑
 *              retrying
 *                ↓
 *             exhausted
 *
 * The machine decides whether and when to retry; the orchestrator performs the calls.
 */

import type { RetryOptions } from '../../config/pipelineOptions.js';
import type { ArtifactType } from '../../types/pipeline.js';
import {
  GenerationServiceError,
  GenerationTimeoutError,
  RateLimitedError,
  SchemaValidationError,
  getErrorMessage,
  type GenerationFailure,
} from '../../types/errors.js';
import { calculateExponentialBackoff } from '../../utils/retry.js';

export type ArtifactState = 'pending' | 'attempting' | 'retrying' | 'succeeded' | 'exhausted';

export type AttemptFailure = GenerationFailure | SchemaValidationError;

export interface RetryDecision {
  retry: boolean;
  /** Wait before the next attempt */
  delayMs: number;
  /** Next attempt should carry the validation issues of the last response */
  repair: boolean;
}

const TRANSITIONS: Record<ArtifactState, ArtifactState[]> = {
  pending: ['attempting', 'exhausted'],
  attempting: ['succeeded', 'retrying', 'exhausted'],
  retrying: ['attempting', 'exhausted'],
  succeeded: [],
  exhausted: [],
};

/**
 * Anything the provider throws becomes one of the three generation failures
 */
export function classifyGenerationError(error: unknown, serviceName: string = 'generation'): GenerationFailure {
  if (error instanceof RateLimitedError || error instanceof GenerationTimeoutError || error instanceof GenerationServiceError) {
    return error;
  }
  return new GenerationServiceError(serviceName, getErrorMessage(error));
}

export class ArtifactGenerationStateMachine {
  private state: ArtifactState = 'pending';
  private attempts = 0;
  private rateLimitFailures = 0;
  private failure: AttemptFailure | undefined;
  private readonly history: ArtifactState[] = ['pending'];

  constructor(
    readonly artifact: ArtifactType,
    private readonly maxAttempts: number,
    private readonly retry: RetryOptions
  ) {}

  get current(): ArtifactState {
    return this.state;
  }

  get attemptCount(): number {
    return this.attempts;
  }

  get lastFailure(): AttemptFailure | undefined {
    return this.failure;
  }

  get states(): readonly ArtifactState[] {
    return this.history;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.state].length === 0;
  }

  /**
   * @returns The 1-based number of the attempt being started
   */
  startAttempt(): number {
    this.transition('attempting');
    this.attempts++;
    return this.attempts;
  }

  succeed(): void {
    this.transition('succeeded');
  }

  /**
   * Record a failed attempt and decide what happens next
   */
  fail(failure: AttemptFailure): RetryDecision {
    this.failure = failure;

    if (this.attempts >= this.maxAttempts) {
      this.transition('exhausted');
      return { retry: false, delayMs: 0, repair: false };
    }

    this.transition('retrying');
    return { retry: true, delayMs: this.delayFor(failure), repair: failure instanceof SchemaValidationError };
  }

  /**
   * The deadline passed: stop without another attempt
   */
  expire(failure: GenerationTimeoutError): void {
    this.failure = failure;
    this.transition('exhausted');
  }

  private delayFor(failure: AttemptFailure): number {
    if (failure instanceof RateLimitedError) {
      this.rateLimitFailures++;
      const backoff = calculateExponentialBackoff(
        this.rateLimitFailures - 1,
        this.retry.initialDelayMs,
        this.retry.multiplier,
        this.retry.maxDelayMs
      );
      const retryAfter = (failure.retryAfterSeconds ?? 0) * 1000;
      return Math.max(backoff, retryAfter);
    }
    if (failure instanceof SchemaValidationError) {
      return 0;
    }
    return this.retry.serviceRetryDelayMs;
  }

  private transition(to: ArtifactState): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new Error(`Invalid artifact state transition from ${this.state} to ${to}`);
    }
    this.state = to;
    this.history.push(to);
  }
}
