/**
 * Cache Store (content-addressed, LRU with TTL)
 *
 * Holds derived artifacts (transcript, chunks, embeddings, summary) under a
 * key made of the video id, the artifact kind and a fingerprint of every
 * parameter that affects the payload.
 *
 * Features:
 * - LRU eviction (least recently used) at maxEntries
 * - TTL checked lazily on get, optional periodic sweep
 * - SHA-256 checksum plus schema validation on every read
 * - Optional JSON-file persistence (temp file + rename)
 *
 * LRU Eviction Logic:
 * - Map iteration order === insertion order (oldest first)
 * - On get(): Move entry to end (most recently used)
 * - On put(): Evict first entries until there is room
 *
 * Payloads are stored as serialized JSON. Every get() parses a fresh copy, so
 * callers never share a mutable artifact and a write replaces the whole
 * entry in one synchronous step (last writer wins).
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CacheKindSchema, type CacheKind } from '../types/schemas/artifacts.js';
import { sha256 } from '../utils/fingerprint.js';

/**
 * Cache store configuration
 */
export interface CacheStoreConfig {
  /** Default time-to-live for entries (milliseconds) */
  ttlMs: number;

  /** Maximum number of entries (LRU capacity) */
  maxEntries: number;

  /** Periodic expiry sweep; 0 or undefined disables it */
  sweepIntervalMs?: number;

  /** Persistence configuration (optional) */
  persistence?: {
    /** Path to persistence file */
    path: string;

    /** Save interval (milliseconds); 0 saves only on shutdown */
    saveIntervalMs: number;
  };

  /** Logger instance (optional) */
  logger?: Logger;

  /** Clock, injectable for tests */
  now?: () => number;
}

/**
 * Namespace of an entry. Omitting `kind` on invalidate() covers every kind.
 */
export interface CacheNamespace {
  videoId: string;
  kind: CacheKind;
}

/**
 * Cache entry structure
 */
interface CacheEntry {
  videoId: string;
  kind: CacheKind;

  /** Serialized JSON payload */
  payload: string;

  /** SHA-256 of payload */
  checksum: string;

  bytes: number;
  createdAt: number;
  expiresAt: number;
  lastAccessedAt: number;
  accessCount: number;
}

const PersistedEntrySchema = z.object({
  key: z.string(),
  videoId: z.string(),
  kind: CacheKindSchema,
  payload: z.string(),
  checksum: z.string(),
  bytes: z.number(),
  createdAt: z.number(),
  expiresAt: z.number(),
  lastAccessedAt: z.number(),
  accessCount: z.number(),
});

const PersistedCacheSchema = z.object({
  version: z.literal(1),
  entries: z.array(PersistedEntrySchema),
});

type PersistedEntry = z.infer<typeof PersistedEntrySchema>;

/**
 * Cache statistics
 */
export interface CacheStoreStats {
  size: number;
  totalBytes: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
  ttlEvictions: number;
  corruptions: number;
  invalidations: number;
  hitRate: number;
}

export class CacheStore {
  private readonly config: CacheStoreConfig;
  private readonly logger?: Logger;
  private readonly now: () => number;

  private readonly cache = new Map<string, CacheEntry>();
  private totalBytes = 0;

  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
    ttlEvictions: 0,
    corruptions: 0,
    invalidations: 0,
  };

  private sweepTimer?: NodeJS.Timeout;
  private saveTimer?: NodeJS.Timeout;

  constructor(config: CacheStoreConfig) {
    this.config = config;
    this.logger = config.logger;
    this.now = config.now ?? Date.now;

    if (config.persistence) {
      this.load();
    }

    if (config.sweepIntervalMs && config.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.sweep();
      }, config.sweepIntervalMs);
      this.sweepTimer.unref();
    }

    if (config.persistence && config.persistence.saveIntervalMs > 0) {
      this.saveTimer = setInterval(() => {
        this.save();
      }, config.persistence.saveIntervalMs);
      this.saveTimer.unref();
    }

    this.logger?.debug(
      {
        maxEntries: config.maxEntries,
        ttlMs: config.ttlMs,
        sweepIntervalMs: config.sweepIntervalMs ?? 0,
        persistence: config.persistence?.path ?? null,
      },
      'CacheStore initialized'
    );
  }

  /**
   * Get a cached payload
   *
   * Returns undefined (a miss) if the entry is absent or expired, or if it
   * fails the checksum or schema check. Failing entries are evicted.
   */
  public get<T>(
    namespace: CacheNamespace,
    fingerprint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): T | undefined {
    const key = this.keyFor(namespace, fingerprint);
    const entry = this.cache.get(key);

    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    const now = this.now();
    if (now >= entry.expiresAt) {
      this.logger?.debug({ key, age: now - entry.createdAt }, 'Cache entry expired');
      this.remove(key, entry);
      this.stats.ttlEvictions++;
      this.stats.misses++;
      return undefined;
    }

    const value = this.decode(key, entry, schema);
    if (value === undefined) {
      this.remove(key, entry);
      this.stats.corruptions++;
      this.stats.misses++;
      return undefined;
    }

    entry.lastAccessedAt = now;
    entry.accessCount++;
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.stats.hits++;
    return value;
  }

  /**
   * Store a payload, replacing any entry under the same key
   *
   * @param ttlMs - Overrides the configured TTL for this entry
   */
  public put(namespace: CacheNamespace, fingerprint: string, payload: unknown, ttlMs?: number): void {
    const key = this.keyFor(namespace, fingerprint);
    const serialized = JSON.stringify(payload);
    if (serialized === undefined) {
      throw new TypeError(`Cannot cache a non-serializable ${namespace.kind} payload`);
    }

    const now = this.now();
    const entry: CacheEntry = {
      videoId: namespace.videoId,
      kind: namespace.kind,
      payload: serialized,
      checksum: sha256(serialized),
      bytes: Buffer.byteLength(serialized, 'utf8'),
      createdAt: now,
      expiresAt: now + (ttlMs ?? this.config.ttlMs),
      lastAccessedAt: now,
      accessCount: 0,
    };

    const existing = this.cache.get(key);
    if (existing) {
      this.remove(key, existing);
    }

    while (this.cache.size >= this.config.maxEntries) {
      if (!this.evictLRU()) {
        break;
      }
    }

    this.cache.set(key, entry);
    this.totalBytes += entry.bytes;

    this.logger?.debug(
      { key, bytes: entry.bytes, totalEntries: this.cache.size },
      'Artifact cached'
    );
  }

  /**
   * Drop every entry for a video, or only one kind of it
   *
   * @returns Number of entries removed
   */
  public invalidate(namespace: { videoId: string; kind?: CacheKind }): number {
    let removed = 0;
    for (const [key, entry] of Array.from(this.cache.entries())) {
      if (entry.videoId !== namespace.videoId) continue;
      if (namespace.kind !== undefined && entry.kind !== namespace.kind) continue;
      this.remove(key, entry);
      removed++;
    }

    if (removed > 0) {
      this.stats.invalidations += removed;
      this.logger?.info({ ...namespace, removed }, 'Cache namespace invalidated');
    }
    return removed;
  }

  /**
   * Remove all expired entries
   */
  public sweep(): number {
    const now = this.now();
    let evicted = 0;

    for (const [key, entry] of Array.from(this.cache.entries())) {
      if (now >= entry.expiresAt) {
        this.remove(key, entry);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.stats.ttlEvictions += evicted;
      this.logger?.debug({ evicted, remaining: this.cache.size }, 'Swept expired entries');
    }
    return evicted;
  }

  public getStats(): CacheStoreStats {
    const total = this.stats.hits + this.stats.misses;
    return {
      size: this.cache.size,
      totalBytes: this.totalBytes,
      maxEntries: this.config.maxEntries,
      ...this.stats,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  public clear(): void {
    this.cache.clear();
    this.totalBytes = 0;
  }

  /**
   * Save cache to disk
   *
   * Writes every unexpired entry to a temp file and renames it over the
   * target. Failures are logged; the in-memory cache is unaffected.
   */
  public save(): void {
    const path = this.config.persistence?.path;
    if (!path) {
      return;
    }

    try {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      const now = this.now();
      const entries: PersistedEntry[] = [];
      for (const [key, entry] of Array.from(this.cache.entries())) {
        if (now < entry.expiresAt) {
          entries.push({ key, ...entry });
        }
      }

      const tempPath = `${path}.${process.pid}.tmp`;
      writeFileSync(tempPath, JSON.stringify({ version: 1, entries }), 'utf-8');
      renameSync(tempPath, path);

      this.logger?.debug({ path, entries: entries.length }, 'Cache persisted to disk');
    } catch (error) {
      this.logger?.warn({ err: error, path }, 'Failed to save cache to disk');
    }
  }

  /**
   * Stop timers and persist. Safe to call multiple times.
   */
  public shutdown(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    if (this.saveTimer) {
      clearInterval(this.saveTimer);
      this.saveTimer = undefined;
    }
    this.save();
  }

  private load(): void {
    const path = this.config.persistence?.path;
    if (!path || !existsSync(path)) {
      this.logger?.debug({ path }, 'No persisted cache found');
      return;
    }

    let parsed: z.infer<typeof PersistedCacheSchema>;
    try {
      const result = PersistedCacheSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
      if (!result.success) {
        this.logger?.warn({ path, issues: result.error.issues.length }, 'Persisted cache has unexpected shape, ignoring');
        return;
      }
      parsed = result.data;
    } catch (error) {
      this.logger?.warn({ err: error, path }, 'Failed to load cache from disk');
      return;
    }

    const now = this.now();
    let loaded = 0;
    let skippedExpired = 0;

    for (const { key, ...entry } of parsed.entries) {
      if (now >= entry.expiresAt) {
        skippedExpired++;
        continue;
      }
      if (this.cache.size >= this.config.maxEntries) {
        break;
      }
      this.cache.set(key, entry);
      this.totalBytes += entry.bytes;
      loaded++;
    }

    this.logger?.info({ path, loaded, skippedExpired }, 'Cache loaded from disk');
  }

  private decode<T>(
    key: string,
    entry: CacheEntry,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): T | undefined {
    if (sha256(entry.payload) !== entry.checksum) {
      this.logger?.warn({ key, code: 'CacheCorruption' }, 'Cache entry failed checksum, evicting');
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(entry.payload);
    } catch (error) {
      this.logger?.warn({ key, code: 'CacheCorruption', err: error }, 'Cache entry is not valid JSON, evicting');
      return undefined;
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      this.logger?.warn(
        { key, code: 'CacheCorruption', issue: result.error.issues[0]?.message },
        'Cache entry failed schema validation, evicting'
      );
      return undefined;
    }
    return result.data;
  }

  private evictLRU(): boolean {
    const first = this.cache.entries().next();
    if (first.done) {
      return false;
    }

    const [key, entry] = first.value;
    this.remove(key, entry);
    this.stats.evictions++;
    this.logger?.debug({ key, accessCount: entry.accessCount }, 'Evicted LRU entry');
    return true;
  }

  private remove(key: string, entry: CacheEntry): void {
    this.cache.delete(key);
    this.totalBytes -= entry.bytes;
  }

  private keyFor(namespace: CacheNamespace, fingerprint: string): string {
    return `${namespace.videoId}:${namespace.kind}:${fingerprint}`;
  }
}
