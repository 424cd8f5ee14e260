/**
 * Cached artifact schemas
 *
 * Every payload read back from the cache store is validated against one of
 * these before it is handed to a component.
 *
 * @module schemas/artifacts
 */

import { z } from 'zod';

export const CacheKindSchema = z.enum(['transcript', 'chunks', 'embeddings', 'summary']);

export const TranscriptSchema = z.object({
  videoId: z.string().length(11),
  text: z.string(),
  language: z.string(),
  durationSeconds: z.number().min(0),
  fetchedAt: z.number().int(),
});

export const CharSpanSchema = z
  .object({
    start: z.number().int().min(0),
    end: z.number().int().min(0),
  })
  .refine((span) => span.end >= span.start, { message: 'end must be >= start', path: ['end'] });

export const ChunkSchema = z.object({
  index: z.number().int().min(0),
  text: z.string().min(1),
  charSpan: CharSpanSchema,
  overlapWithPrev: z.number().int().min(0),
});

export const ChunkListSchema = z.array(ChunkSchema);

export const EmbeddingRecordSchema = z.object({
  chunkIndex: z.number().int().min(0),
  modelId: z.string().min(1),
  vector: z.array(z.number().finite()).min(1),
});

export const SummarySchema = z.object({
  overviewText: z.string(),
  keyPoints: z.array(z.string()),
  generatedAt: z.number().int(),
  modelId: z.string(),
  status: z.enum(['complete', 'partial']),
  chunksProcessed: z.number().int().min(0),
  totalChunks: z.number().int().min(0),
});

export type CacheKind = z.infer<typeof CacheKindSchema>;
export type Transcript = z.infer<typeof TranscriptSchema>;
export type CharSpan = z.infer<typeof CharSpanSchema>;
export type Chunk = z.infer<typeof ChunkSchema>;
export type EmbeddingRecord = z.infer<typeof EmbeddingRecordSchema>;
export type Summary = z.infer<typeof SummarySchema>;
