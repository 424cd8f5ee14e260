/**
 * RetryPolicy - Exponential backoff with jitter for retrying failed operations
 *
 * Used for transcript fetches, which are idempotent and fail transiently.
 * Provider calls are not retried here: the model fallback selector moves to
 * the next candidate instead.
 *
 * Algorithm:
 * - Base delay = initialDelay * (multiplier ^ (attempt - 1))
 * - Capped delay = min(maxDelay, baseDelay)
 * - Final delay = cappedDelay * (1 + random(-jitter, +jitter))
 *
 * Usage:
 * ```typescript
 * const retryPolicy = new RetryPolicy({
 *   maxAttempts: 3,
 *   initialDelayMs: 500,
 *   maxDelayMs: 4000,
 *   backoffMultiplier: 2,
 *   jitter: 0.1,
 *   retryableCodes: ['Timeout', 'ProviderError'],
 * });
 *
 * const transcript = await retryPolicy.execute(
 *   (attempt) => fetcher.fetchTranscript(videoId),
 *   'transcript-fetch'
 * );
 * ```
 *
 * @module retry-policy
 */

import type { Logger } from 'pino';
import { toCompanionError, type CompanionError, type CompanionErrorCode } from '../api/errors.js';
import { throwIfAborted } from '../utils/timeout.js';

/**
 * Retry policy configuration
 */
export interface RetryPolicyConfig {
  /** Maximum attempts including the first (>= 1) */
  maxAttempts: number;

  /** Delay before the first retry (milliseconds) */
  initialDelayMs: number;

  /** Upper bound for any delay (milliseconds) */
  maxDelayMs: number;

  /** Exponential backoff multiplier */
  backoffMultiplier: number;

  /** Jitter factor 0-1 for ±% variation */
  jitter: number;

  /** Error codes that are worth another attempt */
  retryableCodes: CompanionErrorCode[];

  /** Code for errors that are not already CompanionErrors (default: UnknownError) */
  fallbackCode?: CompanionErrorCode;

  /** Optional logger instance */
  logger?: Logger;

  /** Source of randomness for jitter, injectable for tests */
  random?: () => number;
}

/**
 * Retry policy statistics
 */
export interface RetryPolicyStats {
  totalOperations: number;
  successfulOperations: number;
  failedOperations: number;
  totalRetries: number;
  successRate: number;
}

export class RetryPolicy {
  private readonly config: RetryPolicyConfig;
  private readonly logger?: Logger;
  private readonly random: () => number;

  private stats = {
    totalOperations: 0,
    successfulOperations: 0,
    failedOperations: 0,
    totalRetries: 0,
  };

  constructor(config: RetryPolicyConfig) {
    if (config.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be >= 1');
    }
    if (config.initialDelayMs < 0) {
      throw new RangeError('initialDelayMs must be >= 0');
    }
    if (config.maxDelayMs < config.initialDelayMs) {
      throw new RangeError('maxDelayMs must be >= initialDelayMs');
    }
    if (config.backoffMultiplier <= 0) {
      throw new RangeError('backoffMultiplier must be > 0');
    }
    if (config.jitter < 0 || config.jitter > 1) {
      throw new RangeError('jitter must be in range [0, 1]');
    }
    this.config = config;
    this.logger = config.logger;
    this.random = config.random ?? Math.random;
  }

  /**
   * Execute operation with retry logic
   *
   * Errors are translated with toCompanionError; only codes listed in
   * `retryableCodes` are retried. The last translated error is thrown.
   *
   * @param operation - Receives the 1-based attempt number
   * @param context - Label for logs
   * @param signal - Aborts the wait between attempts
   */
  public async execute<T>(
    operation: (attempt: number) => Promise<T>,
    context?: string,
    signal?: AbortSignal
  ): Promise<T> {
    this.stats.totalOperations++;
    const label = context ?? 'operation';

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await operation(attempt);
        this.stats.successfulOperations++;
        if (attempt > 1) {
          this.stats.totalRetries += attempt - 1;
          this.logger?.info({ context, attempt }, 'Operation succeeded after retry');
        }
        return result;
      } catch (error) {
        const companionError = toCompanionError(error, this.config.fallbackCode);

        if (!this.shouldRetry(companionError, attempt) || signal?.aborted) {
          this.stats.failedOperations++;
          this.stats.totalRetries += attempt - 1;
          this.logger?.debug(
            { context, attempt, code: companionError.code },
            'Error not retryable or max attempts reached'
          );
          throw companionError;
        }

        const delayMs = this.calculateDelay(attempt);
        this.logger?.warn(
          {
            context,
            attempt,
            maxAttempts: this.config.maxAttempts,
            delayMs,
            code: companionError.code,
            err: companionError.message,
          },
          'Retrying operation after delay'
        );

        await this.delay(delayMs, signal, label);
      }
    }
  }

  public shouldRetry(error: CompanionError, attempt: number): boolean {
    if (attempt >= this.config.maxAttempts) {
      return false;
    }
    return this.config.retryableCodes.includes(error.code);
  }

  /**
   * Calculate retry delay with exponential backoff + jitter
   *
   * @param attempt - Attempt that just failed (1-indexed)
   */
  public calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitterRange = cappedDelay * this.config.jitter;
    const jitter = (this.random() * 2 - 1) * jitterRange;

    return Math.round(Math.max(0, cappedDelay + jitter));
  }

  public getStats(): RetryPolicyStats {
    return {
      ...this.stats,
      successRate:
        this.stats.totalOperations > 0
          ? this.stats.successfulOperations / this.stats.totalOperations
          : 0,
    };
  }

  private async delay(ms: number, signal: AbortSignal | undefined, label: string): Promise<void> {
    throwIfAborted(signal, label);
    if (ms <= 0) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(done, ms);
      function done(): void {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      }
      signal?.addEventListener('abort', done, { once: true });
    });

    throwIfAborted(signal, label);
  }
}
