/**
 * Centralized error type definitions for the study pipeline
 * Provides a consistent error hierarchy and stable error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  /** Structured payload copied onto the result entry */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Input errors
  INVALID_OPTIONS = 'INVALID_OPTIONS',
  DOCUMENT_FETCH_FAILED = 'DOCUMENT_FETCH_FAILED',

  // Extraction errors
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  CORRUPTED_DOCUMENT = 'CORRUPTED_DOCUMENT',
  PASSWORD_PROTECTED = 'PASSWORD_PROTECTED',
  ENCODING_UNDETERMINED = 'ENCODING_UNDETERMINED',
  INSUFFICIENT_TEXT = 'INSUFFICIENT_TEXT',

  // Generation errors
  RATE_LIMITED = 'RATE_LIMITED',
  TIMEOUT = 'TIMEOUT',
  SERVICE_ERROR = 'SERVICE_ERROR',
  SCHEMA_VALIDATION_FAILED = 'SCHEMA_VALIDATION_FAILED',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class InvalidOptionsError extends AppError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, ErrorCode.INVALID_OPTIONS, { issues });
  }
}

export class DocumentFetchError extends AppError {
  constructor(url: string, message: string, statusCode?: number) {
    super(
      `Failed to download ${url}${statusCode ? ` (HTTP ${statusCode})` : ''}: ${message}`,
      ErrorCode.DOCUMENT_FETCH_FAILED,
      { url, httpStatus: statusCode }
    );
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(public readonly attemptedFormat: string, details?: Record<string, unknown>) {
    super(`Unsupported document format: ${attemptedFormat}`, ErrorCode.UNSUPPORTED_FORMAT, {
      attemptedFormat,
      ...details,
    });
  }
}

export class CorruptedDocumentError extends AppError {
  constructor(format: string, reason: string, details?: Record<string, unknown>) {
    super(`Cannot parse ${format} document: ${reason}`, ErrorCode.CORRUPTED_DOCUMENT, {
      format,
      ...details,
    });
  }
}

export class PasswordProtectedError extends AppError {
  constructor(format: string, details?: Record<string, unknown>) {
    super(`The ${format} document is encrypted or password protected`, ErrorCode.PASSWORD_PROTECTED, {
      format,
      ...details,
    });
  }
}

export class EncodingUndeterminedError extends AppError {
  constructor(public readonly candidates: string[]) {
    super(
      `No candidate encoding produced clean text (tried ${candidates.join(', ')})`,
      ErrorCode.ENCODING_UNDETERMINED,
      { candidates }
    );
  }
}

export class InsufficientTextError extends AppError {
  constructor(public readonly wordCount: number, public readonly minWords: number) {
    super(
      `Document has ${wordCount} words, below the minimum of ${minWords}`,
      ErrorCode.INSUFFICIENT_TEXT,
      { wordCount, minWords }
    );
  }
}

/**
 * Generation capability refused the request because of quota or rate limits
 */
export class RateLimitedError extends AppError {
  constructor(public readonly serviceName: string, public readonly retryAfterSeconds?: number) {
    super(
      `${serviceName} rate limit exceeded${retryAfterSeconds ? `. Retry after ${retryAfterSeconds}s` : ''}`,
      ErrorCode.RATE_LIMITED,
      { service: serviceName, retryAfterSeconds }
    );
  }
}

export class GenerationTimeoutError extends AppError {
  constructor(message: string = 'Generation request timed out', details?: Record<string, unknown>) {
    super(message, ErrorCode.TIMEOUT, details);
  }
}

export class GenerationServiceError extends AppError {
  constructor(public readonly serviceName: string, message: string, details?: Record<string, unknown>) {
    super(`External service error (${serviceName}): ${message}`, ErrorCode.SERVICE_ERROR, {
      service: serviceName,
      ...details,
    });
  }
}

export class SchemaValidationError extends AppError {
  constructor(public readonly artifact: string, public readonly issues: string[]) {
    super(
      `Generated ${artifact} failed validation: ${issues.slice(0, 5).join('; ')}`,
      ErrorCode.SCHEMA_VALIDATION_FAILED,
      { artifact, issues }
    );
  }
}

/**
 * Errors the generation capability may raise
 */
export type GenerationFailure = RateLimitedError | GenerationTimeoutError | GenerationServiceError;

/**
 * Details with undefined entries dropped; undefined when nothing is left
 */
export function issueDetails(error: AppError): Record<string, unknown> | undefined {
  if (!error.details) return undefined;
  const entries = Object.entries(error.details).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Extract a readable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
