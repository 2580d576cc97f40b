/**
 * Zod validation schemas for batch options
 *
 * Environment values (see env.ts) seed the defaults for budget, retries and concurrency;
 * anything passed explicitly wins.
 */

import { z } from 'zod';
import { ARTIFACT_TYPES, DIFFICULTY_LEVELS, DOCUMENT_FORMATS } from '../types/pipeline.js';
import { InvalidOptionsError } from '../types/errors.js';
import { getEnv, type Env } from './env.js';

export const RetryOptionsSchema = z.object({
  /** Delay before the first retry after a rate limit */
  initialDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(30000),
  multiplier: z.number().min(1).default(2),
  /** Pause before retrying a timeout or service error */
  serviceRetryDelayMs: z.number().int().min(0).default(500),
});

export const BatchOptionsSchema = z.object({
  outputFormats: z
    .array(z.enum(ARTIFACT_TYPES))
    .min(1, 'At least one output format is required')
    .transform((formats) => [...new Set(formats)])
    .default([...ARTIFACT_TYPES]),
  numFlashcards: z.number().int().min(5).max(100).default(30),
  numQuizQuestions: z.number().int().min(5).max(50).default(20),
  difficultyLevel: z.enum(DIFFICULTY_LEVELS).default('mixed'),
  contextBudgetChars: z.number().int().min(1000).max(200000).default(15000),
  windowStrategy: z.enum(['prefix', 'distributed']).default('distributed'),
  windowSegments: z.number().int().min(2).max(20).default(5),
  maxRetries: z.number().int().min(1).max(10).default(3),
  concurrencyLimit: z.number().int().min(1).max(10).default(3),
  artifactConcurrency: z.number().int().min(1).max(5).default(1),
  minWords: z.number().int().min(0).default(500),
  insufficientTextPolicy: z.enum(['generate', 'skip']).default('generate'),
  defaultFormat: z.enum(DOCUMENT_FORMATS).optional(),
  documentTimeoutMs: z.number().int().positive().optional(),
  encodingTolerance: z.number().min(0).max(0.5).default(0.001),
  retry: RetryOptionsSchema.default({}),
});

export type BatchOptionsInput = z.input<typeof BatchOptionsSchema>;
export type BatchOptions = z.output<typeof BatchOptionsSchema>;
export type RetryOptions = z.output<typeof RetryOptionsSchema>;

/**
 * Merge environment defaults with caller options and validate the result
 *
 * @throws InvalidOptionsError listing every rejected field
 */
export function resolveBatchOptions(input: BatchOptionsInput = {}, env: Env = getEnv()): BatchOptions {
  const parsed = BatchOptionsSchema.safeParse({
    contextBudgetChars: env.CONTEXT_BUDGET_CHARS,
    maxRetries: env.MAX_RETRIES,
    concurrencyLimit: env.CONCURRENCY_LIMIT,
    ...input,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new InvalidOptionsError(`Invalid batch options: ${issues.join('; ')}`, issues);
  }

  return parsed.data;
}
