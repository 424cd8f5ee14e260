/**
 * Summarizer (iterative refinement)
 *
 * Walks the chunks in order, threading a running summary through one model
 * call per chunk, then asks for 3-5 key points. Every prompt holds one
 * chunk plus the running summary, so prompt size does not grow with the
 * transcript.
 *
 * When the selector runs out of models after at least one successful step,
 * the running summary is returned tagged `partial` instead of discarding the
 * work done so far. A reply with fewer than three key points is asked for
 * again once; a second short reply also yields `partial`. Partial summaries
 * are not cached, and neither is a summary whose signal aborted.
 */

import type { Logger } from 'pino';
import { CompanionError, ValidationError } from '../api/errors.js';
import type { Completer } from '../providers/types.js';
import { SummarySchema, type Chunk, type Summary } from '../types/schemas/artifacts.js';
import { fingerprint } from '../utils/fingerprint.js';
import { cleanOutput } from '../utils/input-guard.js';
import { throwIfAborted } from '../utils/timeout.js';
import type { CacheStore } from './cache-store.js';
import type { ModelFallbackSelector, SelectorResult } from './model-fallback.js';
import {
  PROMPT_VERSION,
  initialSummaryPrompt,
  keyPointsPrompt,
  parseKeyPoints,
  refineSummaryPrompt,
} from './prompts.js';

export interface SummarizerConfig {
  cache: CacheStore;
  selector: ModelFallbackSelector;
  completer: Completer;
  logger?: Logger;
  now?: () => number;
}

export interface SummarizeOptions {
  signal?: AbortSignal;
}

const MIN_KEY_POINTS = 3;

function isExhausted(error: unknown): boolean {
  return error instanceof CompanionError && error.code === 'AllModelsExhausted';
}

export class Summarizer {
  private readonly config: SummarizerConfig;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(config: SummarizerConfig) {
    this.config = config;
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
  }

  /**
   * Cache fingerprint: chunking, candidate chat models and prompt wording.
   */
  public summaryFingerprint(chunkingFingerprint: string): string {
    return fingerprint({
      chunkingFingerprint,
      chatModels: this.config.selector.candidates('chat-completion'),
      promptVersion: PROMPT_VERSION,
    });
  }

  /**
   * @throws {ValidationError} EmptyTranscript for an empty chunk list, before any call
   * @throws {CompanionError} from the first refinement step, or Cancelled
   */
  public async summarize(
    videoId: string,
    chunks: readonly Chunk[],
    chunkingFingerprint: string,
    options: SummarizeOptions = {}
  ): Promise<Summary> {
    if (chunks.length === 0) {
      throw new ValidationError('EmptyTranscript', `Nothing to summarize for ${videoId}`);
    }

    const namespace = { videoId, kind: 'summary' } as const;
    const fp = this.summaryFingerprint(chunkingFingerprint);
    const cached = this.config.cache.get(namespace, fp, SummarySchema);
    if (cached && cached.status === 'complete') {
      this.logger?.debug({ videoId }, 'Summary served from cache');
      return cached;
    }

    let running = '';
    let modelId = '';
    let processed = 0;

    for (const chunk of chunks) {
      const prompt = processed === 0 ? initialSummaryPrompt(chunk.text) : refineSummaryPrompt(running, chunk.text);
      let result: SelectorResult<string>;
      try {
        result = await this.complete(prompt, `summarize chunk ${chunk.index}`, options.signal);
      } catch (error) {
        if (processed > 0 && isExhausted(error)) {
          this.logger?.warn(
            { videoId, processed, total: chunks.length, code: 'AllModelsExhausted' },
            'Refinement stopped early, returning partial summary'
          );
          return this.build(running, [], modelId, 'partial', processed, chunks.length);
        }
        throw error;
      }
      running = result.value;
      modelId = result.modelId;
      processed++;
    }

    let keyPoints: string[] = [];
    try {
      for (let attempt = 1; attempt <= 2 && keyPoints.length < MIN_KEY_POINTS; attempt++) {
        const result = await this.complete(keyPointsPrompt(running), `key points (attempt ${attempt})`, options.signal);
        keyPoints = parseKeyPoints(result.value);
      }
    } catch (error) {
      if (isExhausted(error)) {
        this.logger?.warn({ videoId, code: 'AllModelsExhausted' }, 'Key point extraction failed, returning partial summary');
        return this.build(running, keyPoints, modelId, 'partial', processed, chunks.length);
      }
      throw error;
    }

    if (keyPoints.length < MIN_KEY_POINTS) {
      this.logger?.warn({ videoId, keyPoints: keyPoints.length }, 'Too few key points, returning partial summary');
      return this.build(running, keyPoints, modelId, 'partial', processed, chunks.length);
    }

    throwIfAborted(options.signal, `Summary of ${videoId}`);
    const summary = this.build(running, keyPoints, modelId, 'complete', processed, chunks.length);
    this.config.cache.put(namespace, fp, summary);
    this.logger?.info({ videoId, modelId, chunks: chunks.length, keyPoints: keyPoints.length }, 'Summary generated');
    return summary;
  }

  private complete(prompt: string, label: string, signal?: AbortSignal): Promise<SelectorResult<string>> {
    return this.config.selector.call({
      capability: 'chat-completion',
      label,
      prompt,
      signal,
      invoke: async (modelId, callSignal) => {
        const reply = cleanOutput(await this.config.completer.complete(prompt, modelId, { signal: callSignal }));
        if (!reply) {
          throw new CompanionError('ProviderError', `${modelId} returned an empty reply`);
        }
        return reply;
      },
    });
  }

  private build(
    overviewText: string,
    keyPoints: string[],
    modelId: string,
    status: Summary['status'],
    chunksProcessed: number,
    totalChunks: number
  ): Summary {
    return {
      overviewText,
      keyPoints,
      generatedAt: this.now(),
      modelId,
      status,
      chunksProcessed,
      totalChunks,
    };
  }
}
