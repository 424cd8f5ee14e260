/**
 * Chunk & Embed Pipeline
 *
 * transcript -> chunks -> embeddings -> VectorIndex
 *
 * Chunks and per-chunk embeddings are read from the cache first. Only the
 * misses are embedded, in batches of `embeddingBatchSize`, through the
 * model fallback selector. A fully cached transcript is re-ingested with
 * zero embedding calls.
 */

import type { Logger } from 'pino';
import { CompanionError, ValidationError } from '../api/errors.js';
import type { CacheStore } from '../core/cache-store.js';
import type { ModelFallbackSelector } from '../core/model-fallback.js';
import type { Embedder } from '../providers/types.js';
import {
  ChunkListSchema,
  EmbeddingRecordSchema,
  type Chunk,
  type EmbeddingRecord,
  type Transcript,
} from '../types/schemas/artifacts.js';
import { fingerprint, sha256 } from '../utils/fingerprint.js';
import { throwIfAborted } from '../utils/timeout.js';
import { chunkTranscript, chunkingFingerprint, type ChunkingParams } from './chunker.js';
import { VectorIndex } from './vector-index.js';

export interface EmbedPipelineConfig {
  cache: CacheStore;
  selector: ModelFallbackSelector;
  embedder: Embedder;
  chunking: ChunkingParams;
  embeddingBatchSize: number;
  logger?: Logger;
}

export interface IngestStats {
  chunks: number;
  chunksFromCache: boolean;
  cachedEmbeddings: number;
  embeddedChunks: number;
  embeddingCalls: number;
}

export interface IngestResult {
  chunks: Chunk[];
  index: VectorIndex;
  chunkingFingerprint: string;
  stats: IngestStats;
}

/**
 * Cache fingerprint of one chunk's embedding.
 */
export function embeddingFingerprint(chunk: Chunk, chunksFingerprint: string, modelId: string): string {
  return fingerprint({
    chunkingFingerprint: chunksFingerprint,
    chunkIndex: chunk.index,
    textHash: sha256(chunk.text),
    modelId,
  });
}

export class EmbedPipeline {
  private readonly config: EmbedPipelineConfig;
  private readonly logger?: Logger;

  constructor(config: EmbedPipelineConfig) {
    if (!Number.isInteger(config.embeddingBatchSize) || config.embeddingBatchSize < 1) {
      throw new CompanionError(
        'ConfigurationError',
        `embeddingBatchSize must be a positive integer, got ${config.embeddingBatchSize}`
      );
    }
    this.config = config;
    this.logger = config.logger;
  }

  public get embeddingModelId(): string {
    return this.config.selector.candidates('embedding')[0];
  }

  /**
   * Chunk the transcript (or reuse cached chunks) under the current parameters.
   */
  public prepareChunks(transcript: Transcript): { chunks: Chunk[]; chunkingFingerprint: string; fromCache: boolean } {
    if (transcript.text.trim().length === 0) {
      throw new ValidationError('EmptyTranscript', `Transcript for ${transcript.videoId} is empty`);
    }

    const fp = chunkingFingerprint(transcript.text, this.config.chunking);
    const namespace = { videoId: transcript.videoId, kind: 'chunks' } as const;

    const cached = this.config.cache.get(namespace, fp, ChunkListSchema);
    if (cached && cached.length > 0) {
      return { chunks: cached, chunkingFingerprint: fp, fromCache: true };
    }

    const chunks = chunkTranscript(transcript.text, this.config.chunking);
    this.config.cache.put(namespace, fp, chunks);
    return { chunks, chunkingFingerprint: fp, fromCache: false };
  }

  /**
   * @throws {ValidationError} EmptyTranscript before any embedding call
   * @throws {CompanionError} ProviderError on malformed vectors, AllModelsExhausted, Cancelled
   */
  public async ingest(transcript: Transcript, options: { signal?: AbortSignal } = {}): Promise<IngestResult> {
    throwIfAborted(options.signal, 'Embedding');
    const { chunks, chunkingFingerprint: chunksFp, fromCache } = this.prepareChunks(transcript);
    const modelId = this.embeddingModelId;
    const namespace = { videoId: transcript.videoId, kind: 'embeddings' } as const;

    const vectors: Array<number[] | undefined> = chunks.map((chunk) => {
      const record = this.config.cache.get(
        namespace,
        embeddingFingerprint(chunk, chunksFp, modelId),
        EmbeddingRecordSchema
      );
      return record && record.modelId === modelId && record.chunkIndex === chunk.index
        ? record.vector
        : undefined;
    });

    const missing = chunks.map((_, i) => i).filter((i) => vectors[i] === undefined);
    const cachedEmbeddings = chunks.length - missing.length;
    let expectedDim = vectors.find((vector) => vector !== undefined)?.length;
    let embeddingCalls = 0;

    for (let offset = 0; offset < missing.length; offset += this.config.embeddingBatchSize) {
      throwIfAborted(options.signal, 'Embedding');
      const batch = missing.slice(offset, offset + this.config.embeddingBatchSize);
      const texts = batch.map((position) => chunks[position].text);

      const result = await this.config.selector.call({
        capability: 'embedding',
        label: 'embed',
        signal: options.signal,
        invoke: (candidate, signal) => this.config.embedder.embed(texts, candidate, { signal }),
      });
      embeddingCalls++;

      if (result.modelId !== modelId) {
        throw new CompanionError(
          'ConfigurationError',
          `Embedding served by ${result.modelId}, index expects ${modelId}`
        );
      }
      expectedDim = this.validateVectors(result.value, batch.length, expectedDim);
      throwIfAborted(options.signal, 'Embedding');

      batch.forEach((position, i) => {
        const chunk = chunks[position];
        const record: EmbeddingRecord = { chunkIndex: chunk.index, modelId, vector: result.value[i] };
        this.config.cache.put(namespace, embeddingFingerprint(chunk, chunksFp, modelId), record);
        vectors[position] = record.vector;
      });
    }

    const index = new VectorIndex(transcript.videoId, modelId);
    chunks.forEach((chunk, i) => {
      const vector = vectors[i];
      if (!vector) {
        throw new CompanionError('ProviderError', `No embedding produced for chunk ${chunk.index}`);
      }
      index.add(chunk, vector);
    });

    const stats: IngestStats = {
      chunks: chunks.length,
      chunksFromCache: fromCache,
      cachedEmbeddings,
      embeddedChunks: missing.length,
      embeddingCalls,
    };
    this.logger?.info({ videoId: transcript.videoId, modelId, ...stats }, 'Vector index built');

    return { chunks, index, chunkingFingerprint: chunksFp, stats };
  }

  private validateVectors(vectors: number[][], expectedCount: number, expectedDim: number | undefined): number {
    if (!Array.isArray(vectors) || vectors.length !== expectedCount) {
      throw new CompanionError(
        'ProviderError',
        `Embedder returned ${Array.isArray(vectors) ? vectors.length : 0} vectors for ${expectedCount} texts`
      );
    }

    let dim = expectedDim;
    for (const vector of vectors) {
      if (vector.length === 0 || !vector.every((value) => Number.isFinite(value))) {
        throw new CompanionError('ProviderError', 'Embedder returned an empty or non-finite vector');
      }
      if (dim !== undefined && vector.length !== dim) {
        throw new CompanionError(
          'ProviderError',
          `Embedding dimension mismatch: expected ${dim}, got ${vector.length}`
        );
      }
      dim = vector.length;
    }

    return dim ?? 0;
  }
}
