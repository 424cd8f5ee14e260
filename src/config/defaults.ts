/**
 * Default Configuration Constants
 *
 * Compile-time defaults for every component. `config/runtime.yaml` mirrors
 * these values; `toCompanionOptions()` converts a loaded file into the same
 * shape.
 */

/**
 * Video admission limits
 */
export const VIDEO = {
  /** Longest accepted video (seconds) */
  MAX_VIDEO_LENGTH_SECONDS: 7_200, // 2 hours

  /** Longest accepted transcript (characters) */
  MAX_TRANSCRIPT_CHARS: 100_000,
} as const;

/**
 * Rate limiting
 */
export const RATE_LIMIT = {
  /** Provider admissions per model per window */
  REQUESTS_PER_MINUTE: 30,

  /** Caller admissions per caller id per window */
  CALLER_REQUESTS_PER_MINUTE: 15,

  /** Estimated prompt tokens per model per window */
  TOKENS_PER_MINUTE: 6_000,

  /** Sliding window length (ms) */
  WINDOW_MS: 60_000,
} as const;

/**
 * Chunking
 */
export const CHUNKING = {
  CHUNK_SIZE: 1_000,
  CHUNK_OVERLAP: 200,
} as const;

/**
 * Retrieval QA
 */
export const RETRIEVAL = {
  TOP_K: 4,

  /** Most recent conversation turns included in the prompt */
  HISTORY_TURNS: 3,

  /** Per-field cap applied to each included turn */
  MAX_HISTORY_CHARS: 500,

  MAX_QUESTION_CHARS: 400,

  /** Rewrite follow-up questions into standalone ones before retrieval */
  CONDENSE_QUESTION: false,
} as const;

/**
 * Cache Store
 */
export const CACHE = {
  TTL_MS: 3_600_000, // 1 hour

  MAX_ENTRIES: 1_000,

  /** 0 disables the periodic sweep; expiry is still checked on read */
  SWEEP_INTERVAL_MS: 0,

  /** JSON snapshot file, or null for memory only */
  PERSISTENCE_PATH: null,

  SAVE_INTERVAL_MS: 300_000, // 5 minutes
} as const;

/**
 * Model selection and health
 */
export const MODELS = {
  PRIMARY_MODEL_ID: 'llama-3.3-70b-versatile',
  FALLBACK_MODEL_ID: 'llama-3.1-8b-instant',
  EMBEDDING_MODEL_ID: 'text-embedding-3-small',

  /** Consecutive failures before a model is disabled */
  FAILURE_THRESHOLD: 3,

  /** How long a disabled model is skipped (ms) */
  COOLDOWN_MS: 60_000,

  /** Per provider call (ms) */
  CALL_TIMEOUT_MS: 30_000,

  EMBEDDING_BATCH_SIZE: 64,
} as const;

/**
 * Transcript fetch
 */
export const TRANSCRIPT = {
  FETCH_TIMEOUT_MS: 15_000,
  MAX_ATTEMPTS: 3,
  INITIAL_DELAY_MS: 500,
  MAX_DELAY_MS: 4_000,
  BACKOFF_MULTIPLIER: 2,
  JITTER: 0.1,
} as const;

/**
 * Session orchestration
 */
export const SESSION = {
  INGEST_TIMEOUT_MS: 120_000, // 2 minutes
  EAGER_SUMMARY: false,
} as const;

export interface VideoOptions {
  maxVideoLengthSeconds: number;
  maxTranscriptChars: number;
}

export interface RateLimitOptions {
  requestsPerMinute: number;
  callerRequestsPerMinute: number;
  tokensPerMinute: number;
  windowMs: number;
}

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface RetrievalOptions {
  topK: number;
  historyTurns: number;
  maxHistoryChars: number;
  maxQuestionChars: number;
  condenseQuestion: boolean;
}

export interface CacheOptions {
  ttlMs: number;
  maxEntries: number;
  sweepIntervalMs: number;
  persistencePath: string | null;
  saveIntervalMs: number;
}

export interface ModelOptions {
  primaryModelId: string;
  fallbackModelId: string;
  embeddingModelId: string;
  failureThreshold: number;
  cooldownMs: number;
  callTimeoutMs: number;
  embeddingBatchSize: number;
}

export interface TranscriptOptions {
  fetchTimeoutMs: number;
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: number;
}

export interface SessionOptions {
  ingestTimeoutMs: number;
  eagerSummary: boolean;
}

/**
 * Fully resolved options consumed by the companion and its components.
 */
export interface CompanionOptions {
  video: VideoOptions;
  rateLimit: RateLimitOptions;
  chunking: ChunkingOptions;
  retrieval: RetrievalOptions;
  cache: CacheOptions;
  models: ModelOptions;
  transcript: TranscriptOptions;
  session: SessionOptions;
}

/**
 * Per-section partial overrides
 */
export type CompanionOptionsOverride = {
  [K in keyof CompanionOptions]?: Partial<CompanionOptions[K]>;
};

/**
 * Merge overrides with defaults
 */
export function mergeOptions(override?: CompanionOptionsOverride): CompanionOptions {
  return {
    video: {
      maxVideoLengthSeconds: VIDEO.MAX_VIDEO_LENGTH_SECONDS,
      maxTranscriptChars: VIDEO.MAX_TRANSCRIPT_CHARS,
      ...override?.video,
    },
    rateLimit: {
      requestsPerMinute: RATE_LIMIT.REQUESTS_PER_MINUTE,
      callerRequestsPerMinute: RATE_LIMIT.CALLER_REQUESTS_PER_MINUTE,
      tokensPerMinute: RATE_LIMIT.TOKENS_PER_MINUTE,
      windowMs: RATE_LIMIT.WINDOW_MS,
      ...override?.rateLimit,
    },
    chunking: {
      chunkSize: CHUNKING.CHUNK_SIZE,
      chunkOverlap: CHUNKING.CHUNK_OVERLAP,
      ...override?.chunking,
    },
    retrieval: {
      topK: RETRIEVAL.TOP_K,
      historyTurns: RETRIEVAL.HISTORY_TURNS,
      maxHistoryChars: RETRIEVAL.MAX_HISTORY_CHARS,
      maxQuestionChars: RETRIEVAL.MAX_QUESTION_CHARS,
      condenseQuestion: RETRIEVAL.CONDENSE_QUESTION,
      ...override?.retrieval,
    },
    cache: {
      ttlMs: CACHE.TTL_MS,
      maxEntries: CACHE.MAX_ENTRIES,
      sweepIntervalMs: CACHE.SWEEP_INTERVAL_MS,
      persistencePath: CACHE.PERSISTENCE_PATH,
      saveIntervalMs: CACHE.SAVE_INTERVAL_MS,
      ...override?.cache,
    },
    models: {
      primaryModelId: MODELS.PRIMARY_MODEL_ID,
      fallbackModelId: MODELS.FALLBACK_MODEL_ID,
      embeddingModelId: MODELS.EMBEDDING_MODEL_ID,
      failureThreshold: MODELS.FAILURE_THRESHOLD,
      cooldownMs: MODELS.COOLDOWN_MS,
      callTimeoutMs: MODELS.CALL_TIMEOUT_MS,
      embeddingBatchSize: MODELS.EMBEDDING_BATCH_SIZE,
      ...override?.models,
    },
    transcript: {
      fetchTimeoutMs: TRANSCRIPT.FETCH_TIMEOUT_MS,
      maxAttempts: TRANSCRIPT.MAX_ATTEMPTS,
      initialDelayMs: TRANSCRIPT.INITIAL_DELAY_MS,
      maxDelayMs: TRANSCRIPT.MAX_DELAY_MS,
      backoffMultiplier: TRANSCRIPT.BACKOFF_MULTIPLIER,
      jitter: TRANSCRIPT.JITTER,
      ...override?.transcript,
    },
    session: {
      ingestTimeoutMs: SESSION.INGEST_TIMEOUT_MS,
      eagerSummary: SESSION.EAGER_SUMMARY,
      ...override?.session,
    },
  };
}
