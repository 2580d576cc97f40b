import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for pipeline context (batch id, document id, etc.)
 */
export const pipelineContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current pipeline context
 */
export function getPipelineContext(): Record<string, unknown> {
  return pipelineContext.getStore() || {};
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLogLevel(isDevelopment: boolean, isTest: boolean): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (isTest) return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isTest = nodeEnv === 'test' || process.env.VITEST === 'true';
  const isDevelopment = nodeEnv !== 'production' && !isTest;

  const options: pino.LoggerOptions = {
    level: resolveLogLevel(isDevelopment, isTest),
    base: {
      env: nodeEnv,
      service: 'study-pipeline',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // stdout carries CLI output, so logs go to stderr
  if (isDevelopment) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getPipelineContext(), ...additionalContext };
  return logger.child(context);
}

/**
 * Run a function with pipeline context bound, so child loggers created inside pick it up
 */
export function runWithPipelineContext<T>(context: Record<string, unknown>, fn: () => T): T {
  return pipelineContext.run({ ...getPipelineContext(), ...context }, fn);
}
