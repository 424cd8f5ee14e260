import { describe, it, expect, beforeEach } from 'vitest';
import { CompanionError } from '../../../src/api/errors.js';
import { CacheStore } from '../../../src/core/cache-store.js';
import { ModelFallbackSelector } from '../../../src/core/model-fallback.js';
import { chunkTranscript, chunkingFingerprint, type ChunkingParams } from '../../../src/pipeline/chunker.js';
import { EmbedPipeline, embeddingFingerprint } from '../../../src/pipeline/embed-pipeline.js';
import type { Transcript } from '../../../src/types/schemas/artifacts.js';
import { FakeEmbedder, keywordVector } from '../../helpers/fakes.js';
import { TEXT_A } from '../../helpers/harness.js';

const transcript: Transcript = {
  videoId: 'abcDEF12345',
  text: TEXT_A,
  language: 'en',
  durationSeconds: 300,
  fetchedAt: 0,
};

const CHUNKING: ChunkingParams = { chunkSize: 80, chunkOverlap: 15 };

async function rejection(promise: Promise<unknown>): Promise<CompanionError | undefined> {
  try {
    await promise;
    return undefined;
  } catch (error) {
    return error instanceof CompanionError ? error : undefined;
  }
}

describe('EmbedPipeline', () => {
  let cache: CacheStore;
  let embedder: FakeEmbedder;

  const createPipeline = (chunking: ChunkingParams = CHUNKING, embeddingModelId = 'embed-v1'): EmbedPipeline =>
    new EmbedPipeline({
      cache,
      embedder,
      chunking,
      embeddingBatchSize: 2,
      selector: new ModelFallbackSelector({
        primaryModelId: 'p',
        fallbackModelId: 'f',
        embeddingModelId,
        failureThreshold: 3,
        cooldownMs: 1000,
        callTimeoutMs: 1000,
      }),
    });

  beforeEach(() => {
    cache = new CacheStore({ ttlMs: 60_000, maxEntries: 500 });
    embedder = new FakeEmbedder();
  });

  it('chunks, embeds in batches and builds the index', async () => {
    const expected = chunkTranscript(TEXT_A, CHUNKING);
    const result = await createPipeline().ingest(transcript);

    expect(result.chunks).toEqual(expected);
    expect(result.index.size).toBe(expected.length);
    expect(result.index.embeddingModelId).toBe('embed-v1');
    expect(result.stats).toEqual({
      chunks: expected.length,
      chunksFromCache: false,
      cachedEmbeddings: 0,
      embeddedChunks: expected.length,
      embeddingCalls: Math.ceil(expected.length / 2),
    });
    expect(embedder.calls.every((call) => call.texts.length <= 2 && call.modelId === 'embed-v1')).toBe(true);
  });

  it('makes no embedding calls when everything is cached', async () => {
    await createPipeline().ingest(transcript);
    const callsAfterFirst = embedder.calls.length;

    const second = await createPipeline().ingest(transcript);
    expect(embedder.calls).toHaveLength(callsAfterFirst);
    expect(second.stats).toMatchObject({ chunksFromCache: true, embeddedChunks: 0, embeddingCalls: 0 });
    expect(second.stats.cachedEmbeddings).toBe(second.chunks.length);
  });

  it('re-chunks and re-embeds when the chunk size changes', async () => {
    const first = await createPipeline().ingest(transcript);
    const second = await createPipeline({ chunkSize: 60, chunkOverlap: 15 }).ingest(transcript);

    expect(second.chunkingFingerprint).not.toBe(first.chunkingFingerprint);
    expect(second.stats.chunksFromCache).toBe(false);
    expect(second.stats.embeddedChunks).toBe(second.chunks.length);
  });

  it('re-embeds under a different embedding model', async () => {
    await createPipeline().ingest(transcript);
    const second = await createPipeline(CHUNKING, 'embed-v2').ingest(transcript);

    expect(second.stats.chunksFromCache).toBe(true);
    expect(second.stats.cachedEmbeddings).toBe(0);
    expect(embedder.calls[embedder.calls.length - 1].modelId).toBe('embed-v2');
  });

  it('re-embeds only the chunk whose cached embedding is corrupt', async () => {
    const first = await createPipeline().ingest(transcript);
    const corrupt = { chunkIndex: 1, modelId: 'embed-v1', vector: 'not a vector' };
    cache.put(
      { videoId: transcript.videoId, kind: 'embeddings' },
      embeddingFingerprint(first.chunks[1], first.chunkingFingerprint, 'embed-v1'),
      corrupt
    );
    const callsAfterFirst = embedder.calls.length;

    const second = await createPipeline().ingest(transcript);

    expect(second.stats).toMatchObject({
      chunksFromCache: true,
      cachedEmbeddings: first.chunks.length - 1,
      embeddedChunks: 1,
      embeddingCalls: 1,
    });
    expect(embedder.calls).toHaveLength(callsAfterFirst + 1);
    expect(embedder.calls[callsAfterFirst].texts).toEqual([first.chunks[1].text]);
    expect(second.index.size).toBe(first.chunks.length);
    expect(cache.getStats().corruptions).toBe(1);
  });

  it('re-chunks when the cached chunk list is corrupt', async () => {
    const first = await createPipeline().ingest(transcript);
    cache.put(
      { videoId: transcript.videoId, kind: 'chunks' },
      chunkingFingerprint(TEXT_A, CHUNKING),
      'not a chunk list'
    );

    const second = await createPipeline().ingest(transcript);

    expect(second.chunks).toEqual(first.chunks);
    expect(second.stats).toMatchObject({ chunksFromCache: false, embeddedChunks: 0, embeddingCalls: 0 });
    expect(cache.getStats().corruptions).toBe(1);
  });

  it('stores nothing from a batch that finishes after the signal aborted', async () => {
    const controller = new AbortController();
    embedder.vectorize = (text) => {
      controller.abort();
      return keywordVector(text);
    };

    const error = await rejection(createPipeline().ingest(transcript, { signal: controller.signal }));

    expect(error?.code).toBe('Cancelled');
    expect(embedder.calls).toHaveLength(1);
    expect(cache.getStats().size).toBe(1);
  });

  it('rejects an empty transcript before any embedding call', async () => {
    const error = await rejection(createPipeline().ingest({ ...transcript, text: '  \n ' }));

    expect(error?.code).toBe('EmptyTranscript');
    expect(embedder.calls).toHaveLength(0);
  });

  it('rejects a batch with the wrong number of vectors', async () => {
    embedder.overrides = [[[1, 2, 3]]];
    const error = await rejection(createPipeline().ingest(transcript));

    expect(error?.code).toBe('ProviderError');
    expect(error?.message).toBe('Embedder returned 1 vectors for 2 texts');
  });

  it('rejects non-finite vectors', async () => {
    embedder.overrides = [[[1, Number.NaN], [1, 2]]];
    const error = await rejection(createPipeline().ingest(transcript));

    expect(error?.message).toBe('Embedder returned an empty or non-finite vector');
  });
});
