/**
 * VideoCompanion - session orchestrator
 *
 * Binds a video id to its cached artifacts and exposes the three public
 * operations: ingest(url), getSummary(handle) and ask(handle, question,
 * history).
 *
 * Collaborators (fetcher, embedder, completer) are injected; everything
 * else is built from CompanionOptions at construction.
 *
 * Shared work:
 * - concurrent ingest() calls for one video share one ingestion
 * - concurrent getSummary() calls for one video share one computation
 * - a caller's AbortSignal only abandons that caller's wait
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { mergeOptions, type CompanionOptions, type CompanionOptionsOverride } from '../config/defaults.js';
import { toCompanionOptions } from '../config/loader.js';
import { CacheStore, type CacheStoreStats } from '../core/cache-store.js';
import { ModelFallbackSelector, type ModelFallbackStats } from '../core/model-fallback.js';
import { QaEngine } from '../core/qa-engine.js';
import { RateLimiter, type RateLimiterStats } from '../core/rate-limiter.js';
import { RetryPolicy, type RetryPolicyStats } from '../core/retry-policy.js';
import { VideoSession, type ReadySession } from '../core/session.js';
import { Summarizer } from '../core/summarizer.js';
import { EmbedPipeline } from '../pipeline/embed-pipeline.js';
import type { Completer, Embedder, TranscriptFetcher } from '../providers/types.js';
import type {
  Answer,
  CallOptions,
  ConversationTurn,
  SessionHandle,
  SessionState,
} from '../types/companion.js';
import { TranscriptSchema, type Summary, type Transcript } from '../types/schemas/artifacts.js';
import type { RuntimeConfig } from '../types/schemas/config.js';
import { fingerprint } from '../utils/fingerprint.js';
import { createLogger } from '../utils/logger.js';
import { abandonOnAbort, throwIfAborted, withTimeout } from '../utils/timeout.js';
import { extractVideoId } from '../utils/video-id.js';
import {
  CompanionError,
  RateLimitedError,
  TimeoutError,
  ValidationError,
  toCompanionError,
} from './errors.js';
import type { CompanionEvents } from './events.js';

export interface VideoCompanionDependencies {
  fetcher: TranscriptFetcher;
  embedder: Embedder;
  completer: Completer;
  logger?: Logger;
  /** Clock shared by the cache, limiters and model health, injectable for tests */
  now?: () => number;
}

export interface CompanionStats {
  sessions: Record<string, SessionState>;
  cache: CacheStoreStats;
  providerRateLimit: RateLimiterStats;
  tokenRateLimit: RateLimiterStats;
  callerRateLimit: RateLimiterStats;
  models: ModelFallbackStats;
  transcriptRetry: RetryPolicyStats;
}

interface IngestOutcome {
  ready: ReadySession;
  transcriptFromCache: boolean;
  embeddedChunks: number;
  cachedEmbeddings: number;
}

export class VideoCompanion extends EventEmitter<CompanionEvents> {
  public readonly options: CompanionOptions;

  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly fetcher: TranscriptFetcher;

  private readonly cache: CacheStore;
  private readonly providerLimiter: RateLimiter;
  private readonly tokenLimiter: RateLimiter;
  private readonly callerLimiter: RateLimiter;
  private readonly selector: ModelFallbackSelector;
  private readonly transcriptRetry: RetryPolicy;
  private readonly pipeline: EmbedPipeline;
  private readonly summarizer: Summarizer;
  private readonly qa: QaEngine;

  private readonly sessions = new Map<string, VideoSession>();

  /**
   * Build a companion from a loaded runtime.yaml.
   */
  public static fromConfig(dependencies: VideoCompanionDependencies, config?: RuntimeConfig): VideoCompanion {
    return new VideoCompanion(dependencies, toCompanionOptions(config));
  }

  constructor(dependencies: VideoCompanionDependencies, options?: CompanionOptionsOverride) {
    super();
    this.options = mergeOptions(options);
    this.logger = dependencies.logger ?? createLogger('VideoCompanion');
    this.now = dependencies.now ?? Date.now;
    this.fetcher = dependencies.fetcher;

    const { cache, rateLimit, models, transcript, chunking, retrieval } = this.options;

    this.cache = new CacheStore({
      ttlMs: cache.ttlMs,
      maxEntries: cache.maxEntries,
      sweepIntervalMs: cache.sweepIntervalMs,
      persistence: cache.persistencePath
        ? { path: cache.persistencePath, saveIntervalMs: cache.saveIntervalMs }
        : undefined,
      logger: createLogger('CacheStore', this.logger),
      now: this.now,
    });

    this.providerLimiter = new RateLimiter({
      maxRequests: rateLimit.requestsPerMinute,
      windowMs: rateLimit.windowMs,
      logger: createLogger('ProviderRateLimiter', this.logger),
      now: this.now,
    });

    this.tokenLimiter = new RateLimiter({
      maxRequests: rateLimit.tokensPerMinute,
      windowMs: rateLimit.windowMs,
      logger: createLogger('TokenRateLimiter', this.logger),
      now: this.now,
    });

    this.callerLimiter = new RateLimiter({
      maxRequests: rateLimit.callerRequestsPerMinute,
      windowMs: rateLimit.windowMs,
      logger: createLogger('CallerRateLimiter', this.logger),
      now: this.now,
    });

    this.selector = new ModelFallbackSelector({
      ...models,
      rateLimiter: this.providerLimiter,
      tokenLimiter: this.tokenLimiter,
      onHealthChange: (event) => {
        this.emit('model:health', event);
      },
      logger: createLogger('ModelFallbackSelector', this.logger),
      now: this.now,
    });

    this.transcriptRetry = new RetryPolicy({
      maxAttempts: transcript.maxAttempts,
      initialDelayMs: transcript.initialDelayMs,
      maxDelayMs: transcript.maxDelayMs,
      backoffMultiplier: transcript.backoffMultiplier,
      jitter: transcript.jitter,
      retryableCodes: ['Timeout', 'ProviderError'],
      fallbackCode: 'ProviderError',
      logger: createLogger('TranscriptRetry', this.logger),
    });

    this.pipeline = new EmbedPipeline({
      cache: this.cache,
      selector: this.selector,
      embedder: dependencies.embedder,
      chunking,
      embeddingBatchSize: models.embeddingBatchSize,
      logger: createLogger('EmbedPipeline', this.logger),
    });

    this.summarizer = new Summarizer({
      cache: this.cache,
      selector: this.selector,
      completer: dependencies.completer,
      logger: createLogger('Summarizer', this.logger),
      now: this.now,
    });

    this.qa = new QaEngine({
      selector: this.selector,
      embedder: dependencies.embedder,
      completer: dependencies.completer,
      retrieval,
      logger: createLogger('QaEngine', this.logger),
    });
  }

  /**
   * Fetch, chunk, embed and index a video
   *
   * @throws {ValidationError} InvalidUrl, VideoTooLong, TranscriptTooLong, EmptyTranscript
   * @throws {CompanionError} IngestTimeout, NotFound, TranscriptDisabled, AllModelsExhausted, RateLimited, Cancelled
   */
  public async ingest(url: string, options: CallOptions = {}): Promise<SessionHandle> {
    const videoId = extractVideoId(url);
    throwIfAborted(options.signal, 'Ingestion');
    this.admit(options.callerId);

    const session = this.sessionFor(videoId);
    const ready = session.data;
    if (ready) {
      return ready.handle;
    }

    if (!session.ingestion) {
      session.ingestion = this.startIngestion(session);
    }
    return abandonOnAbort(session.ingestion, options.signal, 'Ingestion');
  }

  /**
   * Summary of an ingested video, computed once and shared
   *
   * @throws {CompanionError} SessionNotReady, AllModelsExhausted (first step), RateLimited, Cancelled
   */
  public async getSummary(handle: SessionHandle, options: CallOptions = {}): Promise<Summary> {
    throwIfAborted(options.signal, 'Summary');
    this.admit(options.callerId);
    const { session, ready } = this.requireReady(handle);

    const release = session.beginSummary();
    try {
      return await abandonOnAbort(this.sharedSummary(session, ready), options.signal, 'Summary');
    } finally {
      release();
    }
  }

  /**
   * Grounded answer from the video's own chunks
   *
   * @throws {ValidationError} QuestionRejected
   * @throws {CompanionError} SessionNotReady, ConfigurationError, AllModelsExhausted, RateLimited, Cancelled
   */
  public async ask(
    handle: SessionHandle,
    question: string,
    history: readonly ConversationTurn[] = [],
    options: CallOptions = {}
  ): Promise<Answer> {
    throwIfAborted(options.signal, 'Question');
    this.admit(options.callerId);
    const { session, ready } = this.requireReady(handle);

    const release = session.beginAnswer();
    try {
      return await abandonOnAbort(
        this.qa.ask(ready.index, question, history, { signal: options.signal }),
        options.signal,
        'Question'
      );
    } catch (error) {
      throw toCompanionError(error);
    } finally {
      release();
    }
  }

  public getSessionState(videoId: string): SessionState {
    return this.sessions.get(videoId)?.state ?? 'new';
  }

  /**
   * Reset the session and drop every cached artifact of the video
   *
   * @returns Number of cache entries removed
   */
  public invalidate(videoId: string): number {
    this.sessions.get(videoId)?.reset();
    return this.cache.invalidate({ videoId });
  }

  public getStats(): CompanionStats {
    const sessions: Record<string, SessionState> = {};
    for (const [videoId, session] of Array.from(this.sessions.entries())) {
      sessions[videoId] = session.state;
    }
    return {
      sessions,
      cache: this.cache.getStats(),
      providerRateLimit: this.providerLimiter.getStats(),
      tokenRateLimit: this.tokenLimiter.getStats(),
      callerRateLimit: this.callerLimiter.getStats(),
      models: this.selector.getStats(),
      transcriptRetry: this.transcriptRetry.getStats(),
    };
  }

  /**
   * Abort in-flight ingestions, persist the cache and drop listeners.
   */
  public shutdown(): void {
    for (const session of Array.from(this.sessions.values())) {
      session.reset();
    }
    this.sessions.clear();
    this.cache.shutdown();
    this.removeAllListeners();
    this.logger.debug('VideoCompanion shut down');
  }

  private admit(callerId: string | undefined): void {
    if (callerId === undefined) {
      return;
    }
    const admission = this.callerLimiter.tryAdmit(callerId);
    if (!admission.admitted) {
      throw new RateLimitedError(
        `Too many requests from ${callerId}; retry in ${admission.retryAfterMs}ms`,
        admission.retryAfterMs,
        { callerId }
      );
    }
  }

  private sessionFor(videoId: string): VideoSession {
    let session = this.sessions.get(videoId);
    if (!session) {
      session = new VideoSession(videoId, (id, previous, next) => {
        this.emit('session:state', { videoId: id, previous, next, timestamp: this.now() });
      });
      this.sessions.set(videoId, session);
    }
    return session;
  }

  private requireReady(handle: SessionHandle): { session: VideoSession; ready: ReadySession } {
    const session = this.sessions.get(handle.videoId);
    const ready = session?.data;
    if (!session || !ready) {
      throw new CompanionError(
        'SessionNotReady',
        `Video ${handle.videoId} is ${session?.state ?? 'new'}; ingest it first`,
        { videoId: handle.videoId }
      );
    }
    return { session, ready };
  }

  private startIngestion(session: VideoSession): Promise<SessionHandle> {
    const { videoId } = session;
    const epoch = session.startIngesting();
    const controller = new AbortController();
    session.ingestController = controller;
    const label = `Ingestion of ${videoId}`;
    const startedAt = this.now();

    return (async () => {
      try {
        const outcome = await withTimeout(
          (deadline) => {
            deadline.addEventListener('abort', () => controller.abort(), { once: true });
            return this.runIngestion(videoId, controller.signal);
          },
          this.options.session.ingestTimeoutMs,
          label
        );

        if (!session.markReady(epoch, outcome.ready)) {
          throw new CompanionError('Cancelled', `${label} was superseded by an invalidation`, { videoId });
        }
        session.ingestController = undefined;
        session.ingestion = undefined;

        this.emit('ingest:completed', {
          videoId,
          chunks: outcome.ready.chunks.length,
          embeddedChunks: outcome.embeddedChunks,
          cachedEmbeddings: outcome.cachedEmbeddings,
          transcriptFromCache: outcome.transcriptFromCache,
          durationMs: this.now() - startedAt,
          timestamp: this.now(),
        });

        if (this.options.session.eagerSummary) {
          const release = session.beginSummary();
          this.sharedSummary(session, outcome.ready)
            .catch((error: unknown) => {
              this.reportBackgroundError(error, 'eager summary', videoId);
            })
            .finally(release);
        }

        return outcome.ready.handle;
      } catch (error) {
        const failure =
          error instanceof TimeoutError && error.operation === label
            ? new CompanionError(
                'IngestTimeout',
                `${label} did not finish within ${this.options.session.ingestTimeoutMs}ms`,
                { videoId, timeoutMs: this.options.session.ingestTimeoutMs }
              )
            : toCompanionError(error);

        if (session.generation === epoch) {
          session.reset();
        }
        this.logger.warn({ videoId, code: failure.code, err: failure.message }, 'Ingestion failed');
        throw failure;
      }
    })();
  }

  private async runIngestion(videoId: string, signal: AbortSignal): Promise<IngestOutcome> {
    const { transcript, fromCache } = await this.loadTranscript(videoId, signal);
    const { video } = this.options;

    if (transcript.durationSeconds > video.maxVideoLengthSeconds) {
      throw new ValidationError(
        'VideoTooLong',
        `Video is ${Math.round(transcript.durationSeconds)}s long; the limit is ${video.maxVideoLengthSeconds}s`,
        { videoId, durationSeconds: transcript.durationSeconds }
      );
    }
    if (transcript.text.length > video.maxTranscriptChars) {
      throw new ValidationError(
        'TranscriptTooLong',
        `Transcript has ${transcript.text.length} characters; the limit is ${video.maxTranscriptChars}`,
        { videoId, length: transcript.text.length }
      );
    }

    const result = await this.pipeline.ingest(transcript, { signal });
    const handle: SessionHandle = {
      videoId,
      chunkCount: result.chunks.length,
      embeddingModelId: result.index.embeddingModelId,
      chunkingFingerprint: result.chunkingFingerprint,
    };

    return {
      ready: { handle, transcript, chunks: result.chunks, index: result.index },
      transcriptFromCache: fromCache,
      embeddedChunks: result.stats.embeddedChunks,
      cachedEmbeddings: result.stats.cachedEmbeddings,
    };
  }

  private async loadTranscript(
    videoId: string,
    signal: AbortSignal
  ): Promise<{ transcript: Transcript; fromCache: boolean }> {
    const namespace = { videoId, kind: 'transcript' } as const;
    const fp = fingerprint({ videoId });

    const cached = this.cache.get(namespace, fp, TranscriptSchema);
    if (cached) {
      return { transcript: cached, fromCache: true };
    }

    const { fetchTimeoutMs } = this.options.transcript;
    const fetched = await this.transcriptRetry.execute(
      () =>
        withTimeout(
          (callSignal) => this.fetcher.fetchTranscript(videoId, { signal: callSignal }),
          fetchTimeoutMs,
          `Transcript fetch for ${videoId}`,
          signal
        ),
      'transcript-fetch',
      signal
    );

    if (fetched.text.trim().length === 0) {
      throw new ValidationError('EmptyTranscript', `Transcript for ${videoId} is empty`, { videoId });
    }

    const transcript: Transcript = {
      videoId,
      text: fetched.text,
      language: fetched.language,
      durationSeconds: fetched.durationSeconds,
      fetchedAt: this.now(),
    };
    throwIfAborted(signal, `Ingestion of ${videoId}`);
    this.cache.put(namespace, fp, transcript);
    return { transcript, fromCache: false };
  }

  private sharedSummary(session: VideoSession, ready: ReadySession): Promise<Summary> {
    if (session.summary) {
      return session.summary;
    }

    const { videoId } = session;
    const controller = new AbortController();
    const settle = (): void => {
      if (session.summaryController === controller) {
        session.summaryController = undefined;
      }
    };
    const computation: Promise<Summary> = this.summarizer
      .summarize(videoId, ready.chunks, ready.handle.chunkingFingerprint, { signal: controller.signal })
      .then(
        (summary) => {
          settle();
          if (summary.status !== 'complete' && session.summary === computation) {
            session.summary = undefined;
          }
          this.emit('summary:completed', {
            videoId,
            status: summary.status,
            modelId: summary.modelId,
            timestamp: this.now(),
          });
          return summary;
        },
        (error: unknown) => {
          settle();
          if (session.summary === computation) {
            session.summary = undefined;
          }
          throw toCompanionError(error);
        }
      );

    session.summary = computation;
    session.summaryController = controller;
    return computation;
  }

  private reportBackgroundError(error: unknown, context: string, videoId: string): void {
    const companionError = toCompanionError(error);
    this.logger.warn({ videoId, context, code: companionError.code, err: companionError.message }, 'Background task failed');
    this.emit('error', { error: companionError.toObject(), context, videoId, timestamp: this.now() });
  }
}
