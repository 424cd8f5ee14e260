/**
 * Main type exports for transcript-companion
 */

export * from './companion.js';
export type {
  CacheKind,
  Transcript,
  CharSpan,
  Chunk,
  EmbeddingRecord,
  Summary,
} from './schemas/artifacts.js';
export type { RuntimeConfig } from './schemas/config.js';
