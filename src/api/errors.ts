/**
 * Companion error utilities.
 *
 * Provides a consistent error type for all public API surfaces and
 * helpers to convert provider, cache and validation failures into
 * CompanionError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers and written to logs.
 */
export type CompanionErrorCode =
  | 'InvalidUrl'
  | 'VideoTooLong'
  | 'TranscriptTooLong'
  | 'EmptyTranscript'
  | 'QuestionRejected'
  | 'NotFound'
  | 'TranscriptDisabled'
  | 'RateLimited'
  | 'ProviderError'
  | 'Timeout'
  | 'AllModelsExhausted'
  | 'CacheCorruption'
  | 'IngestTimeout'
  | 'SessionNotReady'
  | 'ConfigurationError'
  | 'Cancelled'
  | 'UnknownError';

/**
 * Codes rejected before any provider call is made.
 */
const VALIDATION_CODES: ReadonlySet<CompanionErrorCode> = new Set<CompanionErrorCode>([
  'InvalidUrl',
  'VideoTooLong',
  'TranscriptTooLong',
  'EmptyTranscript',
  'QuestionRejected',
]);

/**
 * Short human-readable message per code, safe to show to an end user.
 */
const USER_MESSAGES: Readonly<Record<CompanionErrorCode, string>> = {
  InvalidUrl: 'Please provide a valid YouTube video URL.',
  VideoTooLong: 'This video is too long to process.',
  TranscriptTooLong: 'This transcript is too long to process.',
  EmptyTranscript: 'The transcript for this video is empty.',
  QuestionRejected: 'That question cannot be processed. Please rephrase it.',
  NotFound: 'No transcript was found for this video.',
  TranscriptDisabled: 'Transcripts are disabled for this video.',
  RateLimited: "You're making requests too quickly. Please wait a moment.",
  ProviderError: 'The language model service returned an error.',
  Timeout: 'The request took too long. Please try again.',
  AllModelsExhausted: 'All language models are currently unavailable. Please try again later.',
  CacheCorruption: 'A cached result was unreadable and has been discarded.',
  IngestTimeout: 'Processing this video took too long. Please try again.',
  SessionNotReady: 'This video has not finished processing yet.',
  ConfigurationError: 'The service is misconfigured.',
  Cancelled: 'The request was cancelled.',
  UnknownError: 'An unexpected error occurred.',
};

/**
 * Serializable error shape (for JSON responses and structured logs).
 */
export interface CompanionErrorShape {
  code: CompanionErrorCode;
  message: string;
  retryAfterMs?: number;
  details?: Record<string, unknown>;
}

/**
 * Base error raised by every component.
 */
export class CompanionError extends Error implements CompanionErrorShape {
  public readonly code: CompanionErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly retryAfterMs?: number;

  constructor(
    code: CompanionErrorCode,
    message: string,
    details?: Record<string, unknown>,
    retryAfterMs?: number
  ) {
    super(message);
    this.name = 'CompanionError';
    this.code = code;
    this.details = details;
    this.retryAfterMs = retryAfterMs;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): CompanionErrorShape {
    return {
      code: this.code,
      message: this.message,
      ...(this.retryAfterMs !== undefined && { retryAfterMs: this.retryAfterMs }),
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

/**
 * Malformed input, rejected immediately.
 */
export class ValidationError extends CompanionError {
  constructor(
    code: 'InvalidUrl' | 'VideoTooLong' | 'TranscriptTooLong' | 'EmptyTranscript' | 'QuestionRejected',
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Admission rejected. Never retried internally; the caller must back off.
 */
export class RateLimitedError extends CompanionError {
  public readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, details?: Record<string, unknown>) {
    super('RateLimited', message, details, retryAfterMs);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Outcome of a single candidate attempt inside the fallback selector.
 */
export interface ModelAttempt {
  modelId: string;
  outcome: 'disabled' | 'rate_limited' | 'failed';
  code?: CompanionErrorCode;
  message?: string;
  retryAfterMs?: number;
}

/**
 * Every candidate for a capability was disabled, rate limited or failed.
 */
export class AllModelsExhaustedError extends CompanionError {
  public readonly capability: string;
  public readonly attempts: ModelAttempt[];

  constructor(capability: string, attempts: ModelAttempt[], retryAfterMs?: number) {
    const summary = attempts.map((a) => `${a.modelId}=${a.outcome}`).join(', ');
    super(
      'AllModelsExhausted',
      `All models exhausted for ${capability}${summary ? ` (${summary})` : ''}`,
      { capability, attempts },
      retryAfterMs
    );
    this.name = 'AllModelsExhaustedError';
    this.capability = capability;
    this.attempts = attempts;
  }
}

/**
 * Timeout error with the operation that timed out.
 */
export class TimeoutError extends CompanionError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('Timeout', `${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Map unknown errors into CompanionError instances.
 *
 * @param error - Error thrown by a provider, the cache or a helper
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toCompanionError(
  error: unknown,
  fallbackCode: CompanionErrorCode = 'UnknownError'
): CompanionError {
  if (error instanceof CompanionError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new CompanionError('Cancelled', error.message || 'Operation aborted by caller');
    }

    if (/timed? ?out/i.test(error.message)) {
      return new CompanionError('Timeout', error.message);
    }

    if (/\b429\b|rate.?limit|too many requests/i.test(error.message)) {
      return new CompanionError('RateLimited', error.message);
    }

    return new CompanionError(fallbackCode, error.message);
  }

  return new CompanionError(fallbackCode, typeof error === 'string' ? error : 'Unknown error');
}

/**
 * Convert Zod validation error to CompanionError
 *
 * @example
 * ```typescript
 * const result = RuntimeConfigSchema.safeParse(raw);
 * if (!result.success) {
 *   throw zodErrorToCompanionError(result.error);
 * }
 * // Throws: "Validation error on field 'chunking.chunk_size': Number must be greater than 0"
 * ```
 */
export function zodErrorToCompanionError(
  error: ZodError,
  code: CompanionErrorCode = 'ConfigurationError'
): CompanionError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new CompanionError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

export function isValidationError(error: unknown): boolean {
  return error instanceof CompanionError && VALIDATION_CODES.has(error.code);
}

/**
 * Human-readable message plus internal code for logs.
 */
export function describeError(error: unknown): { code: CompanionErrorCode; message: string } {
  const companionError = toCompanionError(error);
  return { code: companionError.code, message: USER_MESSAGES[companionError.code] };
}

export function createCancelledError(operation: string): CompanionError {
  return new CompanionError('Cancelled', `${operation} was cancelled by the caller`);
}
