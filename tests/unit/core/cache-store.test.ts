import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { CacheStore, type CacheStoreConfig } from '../../../src/core/cache-store.js';
import { ChunkListSchema, TranscriptSchema, type Chunk } from '../../../src/types/schemas/artifacts.js';

const VIDEO = 'abcDEF12345';
const OTHER = 'zyxWVU98765';
const StringSchema = z.string();

const chunks: Chunk[] = [
  { index: 0, text: 'alpha beta', charSpan: { start: 0, end: 10 }, overlapWithPrev: 0 },
  { index: 1, text: 'beta gamma', charSpan: { start: 6, end: 16 }, overlapWithPrev: 4 },
];

describe('CacheStore', () => {
  let now = 0;
  const clock = (): number => now;
  const createStore = (overrides: Partial<CacheStoreConfig> = {}): CacheStore =>
    new CacheStore({ ttlMs: 1000, maxEntries: 10, now: clock, ...overrides });

  beforeEach(() => {
    now = 0;
  });

  it('returns a validated copy of a stored payload', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'chunks' }, 'fp1', chunks);

    const first = store.get({ videoId: VIDEO, kind: 'chunks' }, 'fp1', ChunkListSchema);
    expect(first).toEqual(chunks);
    expect(first).not.toBe(chunks);
    expect(store.getStats()).toMatchObject({ size: 1, hits: 1, misses: 0 });
  });

  it('misses on a different fingerprint or kind', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'chunks' }, 'fp1', chunks);

    expect(store.get({ videoId: VIDEO, kind: 'chunks' }, 'fp2', ChunkListSchema)).toBeUndefined();
    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'fp1', ChunkListSchema)).toBeUndefined();
    expect(store.getStats().misses).toBe(2);
  });

  it('expires entries at their TTL', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'summary' }, 'fp', 'text');

    now = 999;
    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'fp', StringSchema)).toBe('text');

    now = 1000;
    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'fp', StringSchema)).toBeUndefined();
    expect(store.getStats()).toMatchObject({ size: 0, ttlEvictions: 1 });
  });

  it('honours a per-entry TTL', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'summary' }, 'fp', 'text', 5000);

    now = 4000;
    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'fp', StringSchema)).toBe('text');
  });

  it('sweeps expired entries', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'summary' }, 'a', 'x');
    store.put({ videoId: VIDEO, kind: 'summary' }, 'b', 'y', 5000);

    now = 2000;
    expect(store.sweep()).toBe(1);
    expect(store.getStats().size).toBe(1);
  });

  it('evicts the least recently used entry at capacity', () => {
    const store = createStore({ maxEntries: 2 });
    store.put({ videoId: VIDEO, kind: 'summary' }, 'a', 'A');
    store.put({ videoId: VIDEO, kind: 'summary' }, 'b', 'B');
    store.get({ videoId: VIDEO, kind: 'summary' }, 'a', StringSchema);
    store.put({ videoId: VIDEO, kind: 'summary' }, 'c', 'C');

    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'b', StringSchema)).toBeUndefined();
    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'a', StringSchema)).toBe('A');
    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'c', StringSchema)).toBe('C');
    expect(store.getStats().evictions).toBe(1);
  });

  it('replaces an entry written twice under the same key', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'summary' }, 'fp', 'first');
    store.put({ videoId: VIDEO, kind: 'summary' }, 'fp', 'second');

    expect(store.get({ videoId: VIDEO, kind: 'summary' }, 'fp', StringSchema)).toBe('second');
    expect(store.getStats()).toMatchObject({ size: 1, totalBytes: Buffer.byteLength('"second"') });
  });

  it('treats a payload failing its schema as a corrupt miss and evicts it', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'transcript' }, 'fp', { foo: 1 });

    expect(store.get({ videoId: VIDEO, kind: 'transcript' }, 'fp', TranscriptSchema)).toBeUndefined();
    expect(store.getStats()).toMatchObject({ size: 0, corruptions: 1, misses: 1 });
  });

  it('invalidates one kind or a whole video', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'transcript' }, 'fp', 't');
    store.put({ videoId: VIDEO, kind: 'chunks' }, 'fp', 'c');
    store.put({ videoId: OTHER, kind: 'transcript' }, 'fp', 'o');

    expect(store.invalidate({ videoId: VIDEO, kind: 'chunks' })).toBe(1);
    expect(store.invalidate({ videoId: VIDEO })).toBe(1);
    expect(store.invalidate({ videoId: VIDEO })).toBe(0);
    expect(store.get({ videoId: OTHER, kind: 'transcript' }, 'fp', StringSchema)).toBe('o');
    expect(store.getStats().invalidations).toBe(2);
  });

  it('reports the hit rate', () => {
    const store = createStore();
    store.put({ videoId: VIDEO, kind: 'summary' }, 'fp', 'x');
    store.get({ videoId: VIDEO, kind: 'summary' }, 'fp', StringSchema);
    store.get({ videoId: VIDEO, kind: 'summary' }, 'nope', StringSchema);

    expect(store.getStats().hitRate).toBe(0.5);
  });

  describe('persistence', () => {
    let dir: string;
    let path: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'companion-cache-'));
      path = join(dir, 'nested', 'cache.json');
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    const persistent = (): CacheStore => createStore({ persistence: { path, saveIntervalMs: 0 } });

    it('saves on shutdown and reloads on construction', () => {
      const first = persistent();
      first.put({ videoId: VIDEO, kind: 'chunks' }, 'fp', chunks);
      first.shutdown();
      expect(existsSync(path)).toBe(true);

      const second = persistent();
      expect(second.get({ videoId: VIDEO, kind: 'chunks' }, 'fp', ChunkListSchema)).toEqual(chunks);
    });

    it('skips entries that expired while on disk', () => {
      const first = persistent();
      first.put({ videoId: VIDEO, kind: 'chunks' }, 'fp', chunks);
      first.shutdown();

      now = 5000;
      expect(persistent().getStats().size).toBe(0);
    });

    it('detects a tampered payload through its checksum', () => {
      const first = persistent();
      first.put({ videoId: VIDEO, kind: 'chunks' }, 'fp', chunks);
      first.shutdown();

      const snapshot = readFileSync(path, 'utf-8');
      writeFileSync(path, snapshot.replace('alpha beta', 'omega beta'));

      const second = persistent();
      expect(second.getStats().size).toBe(1);
      expect(second.get({ videoId: VIDEO, kind: 'chunks' }, 'fp', ChunkListSchema)).toBeUndefined();
      expect(second.getStats()).toMatchObject({ size: 0, corruptions: 1 });
    });

    it('starts empty when the file is unreadable', () => {
      const first = persistent();
      first.shutdown();
      writeFileSync(path, 'not json');

      expect(persistent().getStats().size).toBe(0);
    });
  });
});
