/**
 * Sliding-window Rate Limiter
 *
 * Keeps the weighted admissions of each identity inside a trailing window.
 * A request is admitted iff the recorded cost plus its own stays within the
 * ceiling. Check and record happen in one synchronous step, so callers
 * racing on the event loop can never be admitted past the ceiling.
 *
 * The same limiter counts requests (cost 1) or estimated prompt tokens
 * (cost from `estimateTokens`).
 */

import type { Logger } from 'pino';

export interface RateLimiterConfig {
  /** Ceiling per identity per window, in cost units */
  maxRequests: number;

  /** Trailing window length (milliseconds) */
  windowMs: number;

  /** Logger instance (optional) */
  logger?: Logger;

  /** Clock, injectable for tests */
  now?: () => number;
}

export type AdmissionResult = { admitted: true } | { admitted: false; retryAfterMs: number };

export interface RateLimiterUsage {
  used: number;
  remaining: number;
  /** Milliseconds until the oldest recorded admission leaves the window */
  resetInMs: number;
}

export interface RateLimiterStats {
  identities: number;
  admitted: number;
  rejected: number;
  maxRequests: number;
  windowMs: number;
}

interface Admission {
  at: number;
  cost: number;
}

interface Window {
  admissions: Admission[];
  used: number;
}

/** Largest estimate for a single prompt */
export const MAX_TOKEN_ESTIMATE = 4_000;

const TOKEN_ESTIMATES = {
  llama: { base: 80, perChar: 0.3 },
  default: { base: 50, perChar: 0.25 },
} as const;

/**
 * Rough prompt token count: a fixed overhead plus a per-character rate,
 * capped at MAX_TOKEN_ESTIMATE.
 */
export function estimateTokens(text: string, modelId: string): number {
  if (!text) {
    return TOKEN_ESTIMATES.default.base;
  }
  const rate = modelId.toLowerCase().includes('llama') ? TOKEN_ESTIMATES.llama : TOKEN_ESTIMATES.default;
  return Math.min(rate.base + Math.floor(text.length * rate.perChar), MAX_TOKEN_ESTIMATE);
}

export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly logger?: Logger;
  private readonly now: () => number;

  /** identity -> admissions in ascending time order */
  private readonly windows = new Map<string, Window>();

  private admitted = 0;
  private rejected = 0;

  constructor(config: RateLimiterConfig) {
    if (!Number.isInteger(config.maxRequests) || config.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${config.maxRequests}`);
    }
    if (config.windowMs <= 0) {
      throw new RangeError(`windowMs must be positive, got ${config.windowMs}`);
    }
    this.config = config;
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
  }

  public get ceiling(): number {
    return this.config.maxRequests;
  }

  /**
   * Admit or reject one request for an identity
   *
   * On rejection nothing is recorded and `retryAfterMs` is the wait until
   * enough recorded cost leaves the window for this cost to fit.
   */
  public tryAdmit(identity: string, cost = 1): AdmissionResult {
    const result = this.check(identity, cost);
    if (!result.admitted) {
      this.rejected++;
      return result;
    }

    const window = this.windows.get(identity) ?? { admissions: [], used: 0 };
    window.admissions.push({ at: this.now(), cost });
    window.used += cost;
    this.windows.set(identity, window);
    this.admitted++;
    return result;
  }

  /**
   * Same decision as tryAdmit, without recording anything
   */
  public peek(identity: string, cost = 1): AdmissionResult {
    return this.check(identity, cost);
  }

  public getUsage(identity: string): RateLimiterUsage {
    const now = this.now();
    const window = this.prune(identity, now);
    const oldest = window?.admissions[0];
    const used = window?.used ?? 0;
    return {
      used,
      remaining: Math.max(0, this.config.maxRequests - used),
      resetInMs: oldest === undefined ? 0 : this.config.windowMs - (now - oldest.at),
    };
  }

  public getStats(): RateLimiterStats {
    const now = this.now();
    for (const identity of Array.from(this.windows.keys())) {
      this.prune(identity, now);
    }
    return {
      identities: this.windows.size,
      admitted: this.admitted,
      rejected: this.rejected,
      maxRequests: this.config.maxRequests,
      windowMs: this.config.windowMs,
    };
  }

  /**
   * Forget one identity, or all of them
   */
  public reset(identity?: string): void {
    if (identity === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(identity);
    }
  }

  private check(identity: string, cost: number): AdmissionResult {
    const { maxRequests, windowMs } = this.config;
    const now = this.now();
    const window = this.prune(identity, now);
    const used = window?.used ?? 0;

    if (cost > maxRequests) {
      this.logger?.warn({ identity, cost, maxRequests }, 'Request cost exceeds rate limit ceiling');
      return { admitted: false, retryAfterMs: windowMs };
    }

    if (window && used + cost > maxRequests) {
      let released = 0;
      let releaseAt = now;
      for (const admission of window.admissions) {
        released += admission.cost;
        releaseAt = admission.at;
        if (used - released + cost <= maxRequests) {
          break;
        }
      }
      const retryAfterMs = Math.max(1, windowMs - (now - releaseAt));
      this.logger?.debug({ identity, used, cost, retryAfterMs }, 'Rate limit reached');
      return { admitted: false, retryAfterMs };
    }

    return { admitted: true };
  }

  /**
   * Drop admissions that left the window; deletes identities left empty.
   */
  private prune(identity: string, now: number): Window | undefined {
    const window = this.windows.get(identity);
    if (!window) {
      return undefined;
    }

    let expired = 0;
    while (expired < window.admissions.length && now - window.admissions[expired].at >= this.config.windowMs) {
      window.used -= window.admissions[expired].cost;
      expired++;
    }
    if (expired > 0) {
      window.admissions.splice(0, expired);
    }
    if (window.admissions.length === 0) {
      this.windows.delete(identity);
      return undefined;
    }
    return window;
  }
}
