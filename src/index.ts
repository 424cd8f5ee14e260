export { VideoCompanion, type VideoCompanionDependencies, type CompanionStats } from './api/companion.js';
export {
  CompanionError,
  ValidationError,
  RateLimitedError,
  AllModelsExhaustedError,
  TimeoutError,
  toCompanionError,
  describeError,
  isValidationError,
  type CompanionErrorCode,
  type CompanionErrorShape,
  type ModelAttempt,
} from './api/errors.js';
export type * from './api/events.js';

export {
  loadConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  toCompanionOptions,
  type ConfigEnvironment,
} from './config/loader.js';
export { mergeOptions, type CompanionOptions, type CompanionOptionsOverride } from './config/defaults.js';

export { CacheStore, type CacheStoreConfig, type CacheStoreStats } from './core/cache-store.js';
export { RateLimiter, type RateLimiterConfig, type AdmissionResult } from './core/rate-limiter.js';
export { ModelFallbackSelector, type ModelFallbackConfig, type ModelHealthChangeEvent } from './core/model-fallback.js';
export { chunkTranscript, chunkingFingerprint } from './pipeline/chunker.js';
export { VectorIndex } from './pipeline/vector-index.js';

export { OpenAiCompleter, OpenAiEmbedder, type OpenAiProviderOptions } from './providers/openai.js';
export { YoutubeTranscriptFetcher, type YoutubeTranscriptFetcherOptions } from './providers/youtube-transcript.js';
export type * from './providers/types.js';

export { extractVideoId, isValidVideoId } from './utils/video-id.js';

export * from './types/index.js';
