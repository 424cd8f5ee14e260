/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, with cross-field
 * checks where one value bounds another.
 *
 * @module schemas/config
 */

import { z } from 'zod';

/**
 * Video admission limits
 */
export const VideoConfigSchema = z.object({
  max_video_length_seconds: z.number().int().positive('Max video length must be positive'),
  max_transcript_chars: z.number().int().positive('Max transcript chars must be positive'),
});

/**
 * Sliding-window rate limits
 */
export const RateLimitConfigSchema = z.object({
  requests_per_minute: z.number().int().min(1, 'must be >= 1'),
  caller_requests_per_minute: z.number().int().min(1, 'must be >= 1'),
  /** Must cover the largest single prompt estimate (4000) */
  tokens_per_minute: z.number().int().min(4000, 'must be >= 4000'),
  window_ms: z.number().int().positive('Window must be positive'),
});

/**
 * Chunking Configuration
 */
export const ChunkingConfigSchema = z
  .object({
    chunk_size: z.number().int().min(1, 'must be >= 1'),
    chunk_overlap: z.number().int().min(0, 'must be >= 0'),
  })
  .refine((data) => data.chunk_overlap < data.chunk_size, {
    message: 'must be < chunk_size',
    path: ['chunk_overlap'],
  });

/**
 * Retrieval Configuration
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1, 'must be >= 1'),
  history_turns: z.number().int().min(0, 'must be >= 0'),
  max_history_chars: z.number().int().positive('must be positive'),
  max_question_chars: z.number().int().positive('must be positive'),
  condense_question: z.boolean(),
});

/**
 * Cache Persistence Configuration
 */
export const CachePersistenceConfigSchema = z.object({
  enabled: z.boolean(),
  path: z.string().min(1, 'Persistence path cannot be empty'),
  save_interval_ms: z.number().int().min(0, 'must be >= 0'),
});

/**
 * Cache Configuration
 */
export const CacheConfigSchema = z.object({
  ttl_seconds: z.number().int().positive('TTL must be positive'),
  max_entries: z.number().int().min(1, 'must be >= 1'),
  sweep_interval_ms: z.number().int().min(0, 'must be >= 0'),
  persistence: CachePersistenceConfigSchema,
});

/**
 * Model Configuration
 */
export const ModelsConfigSchema = z.object({
  primary_model_id: z.string().min(1, 'Primary model id cannot be empty'),
  fallback_model_id: z.string().min(1, 'Fallback model id cannot be empty'),
  embedding_model_id: z.string().min(1, 'Embedding model id cannot be empty'),
  failure_threshold: z.number().int().min(1, 'must be >= 1'),
  cooldown_ms: z.number().int().positive('Cooldown must be positive'),
  call_timeout_ms: z.number().int().positive('Call timeout must be positive'),
  embedding_batch_size: z.number().int().min(1, 'must be >= 1'),
});

/**
 * Transcript Fetch Retry Configuration
 */
export const TranscriptRetryConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1, 'must be >= 1'),
    initial_delay_ms: z.number().int().min(0, 'must be >= 0'),
    max_delay_ms: z.number().int().positive('must be positive'),
    backoff_multiplier: z.number().min(1, 'must be >= 1'),
    jitter: z.number().min(0).max(1).optional(),
  })
  .refine((data) => data.max_delay_ms >= data.initial_delay_ms, {
    message: 'must be >= initial_delay_ms',
    path: ['max_delay_ms'],
  });

/**
 * Transcript Fetch Configuration
 */
export const TranscriptConfigSchema = z.object({
  fetch_timeout_ms: z.number().int().positive('Fetch timeout must be positive'),
  retry: TranscriptRetryConfigSchema,
});

/**
 * Session Configuration
 */
export const SessionConfigSchema = z.object({
  ingest_timeout_ms: z.number().int().positive('Ingest timeout must be positive'),
  eager_summary: z.boolean(),
});

/**
 * Runtime Configuration Schema
 *
 * Defines the complete structure for runtime.yaml after the environment block
 * has been merged in.
 */
export const RuntimeConfigSchema = z.object({
  video: VideoConfigSchema,
  rate_limit: RateLimitConfigSchema,
  chunking: ChunkingConfigSchema,
  retrieval: RetrievalConfigSchema,
  cache: CacheConfigSchema,
  models: ModelsConfigSchema,
  transcript: TranscriptConfigSchema,
  session: SessionConfigSchema,
});

/**
 * Type inference for RuntimeConfig
 */
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
