import { describe, it, expect, beforeEach } from 'vitest';
import { CompanionError } from '../../../src/api/errors.js';
import { CacheStore } from '../../../src/core/cache-store.js';
import { ModelFallbackSelector } from '../../../src/core/model-fallback.js';
import { Summarizer } from '../../../src/core/summarizer.js';
import type { Chunk } from '../../../src/types/schemas/artifacts.js';
import { FakeCompleter, scriptedReply } from '../../helpers/fakes.js';

const VIDEO = 'abcDEF12345';

const chunks: Chunk[] = ['First part.', 'Second part.', 'Third part.'].map((text, index) => ({
  index,
  text,
  charSpan: { start: index * 20, end: index * 20 + text.length },
  overlapWithPrev: 0,
}));

const createSelector = (primaryModelId = 'p'): ModelFallbackSelector =>
  new ModelFallbackSelector({
    primaryModelId,
    fallbackModelId: 'f',
    embeddingModelId: 'e',
    failureThreshold: 5,
    cooldownMs: 1000,
    callTimeoutMs: 1000,
  });

async function rejection(promise: Promise<unknown>): Promise<CompanionError | undefined> {
  try {
    await promise;
    return undefined;
  } catch (error) {
    return error instanceof CompanionError ? error : undefined;
  }
}

describe('Summarizer', () => {
  let cache: CacheStore;
  let completer: FakeCompleter;
  let summarizer: Summarizer;

  beforeEach(() => {
    cache = new CacheStore({ ttlMs: 60_000, maxEntries: 100 });
    completer = new FakeCompleter();
    summarizer = new Summarizer({ cache, selector: createSelector(), completer, now: () => 1234 });
  });

  it('threads a running summary through every chunk, then extracts key points', async () => {
    const summary = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');

    expect(summary).toEqual({
      overviewText: 'S3',
      keyPoints: ['First point', 'Second point', 'Third point'],
      generatedAt: 1234,
      modelId: 'p',
      status: 'complete',
      chunksProcessed: 3,
      totalChunks: 3,
    });
    expect(completer.calls).toHaveLength(4);
    expect(completer.calls[1].prompt).toContain('<summary>\nS1\n</summary>');
    expect(completer.calls[1].prompt).toContain('<excerpt>\nSecond part.\n</excerpt>');
  });

  it('serves a complete summary from the cache', async () => {
    const first = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    const second = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');

    expect(second).toEqual(first);
    expect(completer.calls).toHaveLength(4);
  });

  it('rejects an empty chunk list without calling a model', async () => {
    const error = await rejection(summarizer.summarize(VIDEO, [], 'chunks-fp'));
    expect(error?.code).toBe('EmptyTranscript');
    expect(completer.calls).toHaveLength(0);
  });

  it('returns a partial summary when models run out mid-way, and does not cache it', async () => {
    completer.fail = (_, callNumber) => (callNumber > 2 ? new Error('service down') : undefined);

    const partial = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    expect(partial).toMatchObject({
      overviewText: 'S2',
      keyPoints: [],
      status: 'partial',
      chunksProcessed: 2,
      totalChunks: 3,
    });
    expect(completer.calls).toHaveLength(4);

    completer.fail = undefined;
    const complete = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    expect(complete.status).toBe('complete');
    expect(completer.calls).toHaveLength(8);
  });

  it('returns a partial summary when key point extraction runs out of models', async () => {
    completer.fail = (call) => (call.prompt.includes('takeaways') ? new Error('service down') : undefined);

    const summary = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    expect(summary).toMatchObject({ overviewText: 'S3', keyPoints: [], status: 'partial', chunksProcessed: 3 });
  });

  it('asks again for key points when the first reply has fewer than three', async () => {
    let keyPointReplies = 0;
    completer.respond = (prompt) => {
      if (prompt.includes('takeaways')) {
        keyPointReplies++;
        return keyPointReplies === 1 ? '- Only point' : '- One\n- Two\n- Three';
      }
      return scriptedReply(prompt);
    };

    const summary = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    expect(summary).toMatchObject({ keyPoints: ['One', 'Two', 'Three'], status: 'complete' });
    expect(completer.calls).toHaveLength(5);
    expect(cache.getStats().size).toBe(1);
  });

  it('tags a summary partial when key points stay below three', async () => {
    completer.respond = (prompt) => (prompt.includes('takeaways') ? '- Only point\n- Other point' : scriptedReply(prompt));

    const summary = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    expect(summary).toMatchObject({
      overviewText: 'S3',
      keyPoints: ['Only point', 'Other point'],
      status: 'partial',
      chunksProcessed: 3,
    });
    expect(completer.calls).toHaveLength(5);
    expect(cache.getStats().size).toBe(0);

    await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    expect(completer.calls).toHaveLength(10);
  });

  it('does not cache a summary whose signal aborted during the last call', async () => {
    const controller = new AbortController();
    completer.respond = (prompt) => {
      if (prompt.includes('takeaways')) {
        controller.abort();
      }
      return scriptedReply(prompt);
    };

    const error = await rejection(summarizer.summarize(VIDEO, chunks, 'chunks-fp', { signal: controller.signal }));
    expect(error?.code).toBe('Cancelled');
    expect(completer.calls).toHaveLength(4);
    expect(cache.getStats().size).toBe(0);
  });

  it('fails when the first step cannot be served', async () => {
    completer.fail = () => new Error('service down');

    const error = await rejection(summarizer.summarize(VIDEO, chunks, 'chunks-fp'));
    expect(error?.code).toBe('AllModelsExhausted');
    expect(completer.calls).toHaveLength(2);
  });

  it('uses the fallback model when the primary fails', async () => {
    completer.failModels('p');

    const summary = await summarizer.summarize(VIDEO, chunks, 'chunks-fp');
    expect(summary.modelId).toBe('f');
    expect(summary.status).toBe('complete');
  });

  it('keys the cache on the candidate chat models', () => {
    const other = new Summarizer({ cache, selector: createSelector('other-primary'), completer });
    expect(other.summaryFingerprint('chunks-fp')).not.toBe(summarizer.summaryFingerprint('chunks-fp'));
    expect(summarizer.summaryFingerprint('chunks-fp')).toBe(summarizer.summaryFingerprint('chunks-fp'));
  });
});
