/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults and range checks.
 * Values here seed the batch option defaults; per-run options are validated separately.
 */

// Load dotenv early to ensure environment variables are available when this module executes
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL?: string;

  // Generation service
  OPENAI_API_KEY?: string;
  OPENAI_BASE_URL?: string;
  STUDY_MODEL: string;
  GENERATION_TEMPERATURE: number;
  GENERATION_TIMEOUT_MS: number;

  // Document download
  FETCH_TIMEOUT_MS: number;
  FETCH_MAX_BYTES: number;

  // Pipeline defaults
  CONTEXT_BUDGET_CHARS: number;
  MAX_RETRIES: number;
  CONCURRENCY_LIMIT: number;
}

let validatedEnv: Env | null = null;

function isNodeEnv(value: string): value is Env['NODE_ENV'] {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Validate and cache environment variables
 *
 * @throws Error listing every invalid variable
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const temperature = parseFloatEnv(process.env.GENERATION_TEMPERATURE, 0.7);
  if (temperature < 0 || temperature > 2) {
    errors.push(`GENERATION_TEMPERATURE: Invalid value "${process.env.GENERATION_TEMPERATURE}". Must be between 0 and 2.`);
  }

  const generationTimeout = parseNumericEnv(process.env.GENERATION_TIMEOUT_MS, 60000);
  if (generationTimeout < 1000) {
    errors.push(`GENERATION_TIMEOUT_MS: Invalid value "${process.env.GENERATION_TIMEOUT_MS}". Must be at least 1000.`);
  }

  const fetchTimeout = parseNumericEnv(process.env.FETCH_TIMEOUT_MS, 30000);
  if (fetchTimeout < 1000) {
    errors.push(`FETCH_TIMEOUT_MS: Invalid value "${process.env.FETCH_TIMEOUT_MS}". Must be at least 1000.`);
  }

  const fetchMaxBytes = parseNumericEnv(process.env.FETCH_MAX_BYTES, 50 * 1024 * 1024);
  if (fetchMaxBytes < 1024) {
    errors.push(`FETCH_MAX_BYTES: Invalid value "${process.env.FETCH_MAX_BYTES}". Must be at least 1024.`);
  }

  const contextBudget = parseNumericEnv(process.env.CONTEXT_BUDGET_CHARS, 15000);
  if (contextBudget < 1000 || contextBudget > 200000) {
    errors.push(`CONTEXT_BUDGET_CHARS: Invalid value "${process.env.CONTEXT_BUDGET_CHARS}". Must be between 1000 and 200000.`);
  }

  const maxRetries = parseNumericEnv(process.env.MAX_RETRIES, 3);
  if (maxRetries < 1 || maxRetries > 10) {
    errors.push(`MAX_RETRIES: Invalid value "${process.env.MAX_RETRIES}". Must be between 1 and 10.`);
  }

  const concurrencyLimit = parseNumericEnv(process.env.CONCURRENCY_LIMIT, 3);
  if (concurrencyLimit < 1 || concurrencyLimit > 10) {
    errors.push(`CONCURRENCY_LIMIT: Invalid value "${process.env.CONCURRENCY_LIMIT}". Must be between 1 and 10.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    logger.error({ errors }, 'Environment validation failed');
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: process.env.LOG_LEVEL,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY || undefined,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || undefined,
    STUDY_MODEL: process.env.STUDY_MODEL || 'gpt-4o-mini',
    GENERATION_TEMPERATURE: temperature,
    GENERATION_TIMEOUT_MS: generationTimeout,
    FETCH_TIMEOUT_MS: fetchTimeout,
    FETCH_MAX_BYTES: fetchMaxBytes,
    CONTEXT_BUDGET_CHARS: contextBudget,
    MAX_RETRIES: maxRetries,
    CONCURRENCY_LIMIT: concurrencyLimit,
  };

  return validatedEnv;
}

/**
 * Get validated environment configuration
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Drop the cached configuration (tests change process.env between cases)
 */
export function resetEnv(): void {
  validatedEnv = null;
}

