/**
 * Model Fallback Selector
 *
 * Routes a capability ("chat-completion", "embedding") to the first healthy,
 * admitted candidate model. Each model carries a health record: consecutive
 * failures, last failure time and a disabled-until deadline.
 *
 * A model is disabled for `cooldownMs` once its consecutive failures reach
 * `failureThreshold`. After the cooldown it is tried again; the failure count
 * is kept, so a single further failure disables it again while a success
 * resets it.
 *
 * Rate limiting never touches the failure count. A model is skipped while
 * the request limiter (`model:<id>`) or the token limiter
 * (`tokens:model:<id>`) rejects it, and, after a provider 429, until the
 * provider's retry-after has passed.
 */

import type { Logger } from 'pino';
import {
  AllModelsExhaustedError,
  toCompanionError,
  type ModelAttempt,
} from '../api/errors.js';
import { throwIfAborted, withTimeout } from '../utils/timeout.js';
import { estimateTokens, type AdmissionResult, type RateLimiter } from './rate-limiter.js';

export type Capability = 'chat-completion' | 'embedding';

export interface ModelHealth {
  consecutiveFailures: number;
  lastFailureAt: number | null;
  disabledUntil: number | null;
  /** Provider asked to wait until then (429 retry-after) */
  rateLimitedUntil: number | null;
}

export interface ModelHealthChangeEvent {
  modelId: string;
  disabled: boolean;
  consecutiveFailures: number;
  disabledUntil: number | null;
  at: number;
}

export interface ModelFallbackConfig {
  primaryModelId: string;
  fallbackModelId: string;
  embeddingModelId: string;

  /** Consecutive failures that disable a model */
  failureThreshold: number;

  /** How long a disabled model is skipped (milliseconds) */
  cooldownMs: number;

  /** Deadline for each provider call (milliseconds) */
  callTimeoutMs: number;

  /** Provider limiter, consulted as `model:<id>` */
  rateLimiter?: RateLimiter;

  /** Prompt token budget, consulted as `tokens:model:<id>` for calls that carry a prompt */
  tokenLimiter?: RateLimiter;

  /** Invoked when a model is disabled or recovers */
  onHealthChange?: (event: ModelHealthChangeEvent) => void;

  logger?: Logger;

  /** Clock, injectable for tests */
  now?: () => number;
}

export interface SelectorCall<T> {
  capability: Capability;
  invoke: (modelId: string, signal: AbortSignal) => Promise<T>;
  /** Operation name for logs and timeout messages */
  label?: string;
  /** Prompt text, charged against the token limiter */
  prompt?: string;
  signal?: AbortSignal;
}

export interface SelectorResult<T> {
  value: T;
  modelId: string;
  /** Candidates skipped or failed before the one that answered */
  attempts: ModelAttempt[];
}

export interface ModelFallbackStats {
  calls: number;
  successes: number;
  failures: number;
  rateLimited: number;
  exhausted: number;
  health: Record<string, ModelHealth>;
}

export class ModelFallbackSelector {
  private readonly config: ModelFallbackConfig;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly health = new Map<string, ModelHealth>();

  private stats = {
    calls: 0,
    successes: 0,
    failures: 0,
    rateLimited: 0,
    exhausted: 0,
  };

  constructor(config: ModelFallbackConfig) {
    if (config.failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be >= 1, got ${config.failureThreshold}`);
    }
    this.config = config;
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
  }

  /**
   * Ordered candidate list for a capability
   *
   * Embedding has a single candidate: an index must never mix vector spaces.
   */
  public candidates(capability: Capability): string[] {
    if (capability === 'embedding') {
      return [this.config.embeddingModelId];
    }
    return Array.from(new Set([this.config.primaryModelId, this.config.fallbackModelId]));
  }

  /**
   * Invoke the first candidate that is enabled, admitted and succeeds
   *
   * @throws {CompanionError} Cancelled when the caller's signal aborts
   * @throws {AllModelsExhaustedError} when every candidate was skipped or failed
   */
  public async call<T>(request: SelectorCall<T>): Promise<SelectorResult<T>> {
    const label = request.label ?? request.capability;
    const attempts: ModelAttempt[] = [];
    this.stats.calls++;

    for (const modelId of this.candidates(request.capability)) {
      throwIfAborted(request.signal, label);

      const health = this.healthOf(modelId);
      const now = this.now();

      if (health.disabledUntil !== null && health.disabledUntil > now) {
        attempts.push({ modelId, outcome: 'disabled', retryAfterMs: health.disabledUntil - now });
        continue;
      }

      if (health.rateLimitedUntil !== null && health.rateLimitedUntil > now) {
        this.stats.rateLimited++;
        attempts.push({
          modelId,
          outcome: 'rate_limited',
          code: 'RateLimited',
          retryAfterMs: health.rateLimitedUntil - now,
        });
        continue;
      }

      const admission = this.admit(modelId, request.prompt);
      if (!admission.admitted) {
        this.stats.rateLimited++;
        attempts.push({ modelId, outcome: 'rate_limited', code: 'RateLimited', retryAfterMs: admission.retryAfterMs });
        this.logger?.debug({ modelId, retryAfterMs: admission.retryAfterMs }, 'Model rate limited, trying next candidate');
        continue;
      }

      try {
        const value = await withTimeout(
          (signal) => request.invoke(modelId, signal),
          this.config.callTimeoutMs,
          `${label} (${modelId})`,
          request.signal
        );
        this.recordSuccess(modelId);
        return { value, modelId, attempts };
      } catch (error) {
        const companionError = toCompanionError(error, 'ProviderError');

        if (companionError.code === 'Cancelled' && request.signal?.aborted) {
          throw companionError;
        }

        if (companionError.code === 'RateLimited') {
          this.stats.rateLimited++;
          if (companionError.retryAfterMs !== undefined && companionError.retryAfterMs > 0) {
            this.healthOf(modelId).rateLimitedUntil = this.now() + companionError.retryAfterMs;
          }
          attempts.push({
            modelId,
            outcome: 'rate_limited',
            code: 'RateLimited',
            message: companionError.message,
            retryAfterMs: companionError.retryAfterMs,
          });
          this.logger?.warn({ modelId, label }, 'Provider rate limited model, trying next candidate');
          continue;
        }

        this.recordFailure(modelId);
        attempts.push({
          modelId,
          outcome: 'failed',
          code: companionError.code,
          message: companionError.message,
        });
        this.logger?.warn(
          { modelId, label, code: companionError.code, err: companionError.message },
          'Model call failed, trying next candidate'
        );
      }
    }

    this.stats.exhausted++;
    const waits = attempts
      .map((attempt) => attempt.retryAfterMs)
      .filter((wait): wait is number => wait !== undefined);
    const retryAfterMs = waits.length > 0 ? Math.min(...waits) : undefined;

    this.logger?.error({ capability: request.capability, label, attempts }, 'All models exhausted');
    throw new AllModelsExhaustedError(request.capability, attempts, retryAfterMs);
  }

  public getHealth(modelId: string): ModelHealth {
    return { ...this.healthOf(modelId) };
  }

  public isDisabled(modelId: string): boolean {
    const { disabledUntil } = this.healthOf(modelId);
    return disabledUntil !== null && disabledUntil > this.now();
  }

  public getStats(): ModelFallbackStats {
    const health: Record<string, ModelHealth> = {};
    for (const [modelId, record] of Array.from(this.health.entries())) {
      health[modelId] = { ...record };
    }
    return { ...this.stats, health };
  }

  /**
   * Clear health for one model, or for all of them
   */
  public resetHealth(modelId?: string): void {
    if (modelId === undefined) {
      this.health.clear();
    } else {
      this.health.delete(modelId);
    }
  }

  private healthOf(modelId: string): ModelHealth {
    let record = this.health.get(modelId);
    if (!record) {
      record = { consecutiveFailures: 0, lastFailureAt: null, disabledUntil: null, rateLimitedUntil: null };
      this.health.set(modelId, record);
    }
    return record;
  }

  /**
   * Request and token admission for one candidate
   *
   * Tokens are peeked before the request is recorded and charged after it;
   * a rejection on either side records nothing.
   */
  private admit(modelId: string, prompt: string | undefined): AdmissionResult {
    const { rateLimiter, tokenLimiter } = this.config;
    const tokenKey = `tokens:model:${modelId}`;
    const tokens = tokenLimiter && prompt !== undefined ? estimateTokens(prompt, modelId) : 0;

    if (tokenLimiter && tokens > 0) {
      const budget = tokenLimiter.peek(tokenKey, tokens);
      if (!budget.admitted) {
        return budget;
      }
    }

    const admission = rateLimiter?.tryAdmit(`model:${modelId}`);
    if (admission && !admission.admitted) {
      return admission;
    }

    if (tokenLimiter && tokens > 0) {
      return tokenLimiter.tryAdmit(tokenKey, tokens);
    }
    return { admitted: true };
  }

  private recordSuccess(modelId: string): void {
    this.stats.successes++;
    const record = this.healthOf(modelId);
    const wasDegraded = record.disabledUntil !== null;

    record.consecutiveFailures = 0;
    record.disabledUntil = null;
    record.rateLimitedUntil = null;

    if (wasDegraded) {
      this.logger?.info({ modelId }, 'Model recovered');
      this.emitHealthChange(modelId, record, false);
    }
  }

  private recordFailure(modelId: string): void {
    this.stats.failures++;
    const record = this.healthOf(modelId);
    const now = this.now();

    record.consecutiveFailures++;
    record.lastFailureAt = now;

    if (record.consecutiveFailures >= this.config.failureThreshold) {
      record.disabledUntil = now + this.config.cooldownMs;
      this.logger?.warn(
        { modelId, consecutiveFailures: record.consecutiveFailures, disabledUntil: record.disabledUntil },
        'Model disabled'
      );
      this.emitHealthChange(modelId, record, true);
    }
  }

  private emitHealthChange(modelId: string, record: ModelHealth, disabled: boolean): void {
    this.config.onHealthChange?.({
      modelId,
      disabled,
      consecutiveFailures: record.consecutiveFailures,
      disabledUntil: record.disabledUntil,
      at: this.now(),
    });
  }
}
