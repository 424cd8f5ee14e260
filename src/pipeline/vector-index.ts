/**
 * In-memory vector index over the chunks of one video.
 *
 * Exact search: vectors are L2-normalized on insert, so the dot product is
 * the cosine similarity. Equal scores rank by chunk index.
 */

import { CompanionError } from '../api/errors.js';
import type { Chunk } from '../types/schemas/artifacts.js';
import type { RetrievedChunk } from '../types/companion.js';

interface IndexedChunk {
  chunk: Chunk;
  unit: Float64Array;
}

function normalize(vector: readonly number[]): Float64Array {
  const unit = Float64Array.from(vector);
  let norm = 0;
  for (let i = 0; i < unit.length; i++) {
    norm += unit[i] * unit[i];
  }
  norm = Math.sqrt(norm);
  if (norm > 0) {
    for (let i = 0; i < unit.length; i++) {
      unit[i] /= norm;
    }
  }
  return unit;
}

export class VectorIndex {
  public readonly videoId: string;
  public readonly embeddingModelId: string;

  private readonly entries: IndexedChunk[] = [];
  private dim: number | null = null;

  constructor(videoId: string, embeddingModelId: string) {
    this.videoId = videoId;
    this.embeddingModelId = embeddingModelId;
  }

  public get size(): number {
    return this.entries.length;
  }

  /** Vector length, or 0 while empty */
  public get dimension(): number {
    return this.dim ?? 0;
  }

  /**
   * @throws {CompanionError} ProviderError when the dimension differs from earlier vectors
   */
  public add(chunk: Chunk, vector: readonly number[]): void {
    if (vector.length === 0) {
      throw new CompanionError('ProviderError', `Empty embedding for chunk ${chunk.index}`);
    }
    if (this.dim !== null && vector.length !== this.dim) {
      throw new CompanionError(
        'ProviderError',
        `Embedding dimension mismatch for chunk ${chunk.index}: expected ${this.dim}, got ${vector.length}`
      );
    }
    this.dim = vector.length;
    this.entries.push({ chunk, unit: normalize(vector) });
  }

  /**
   * Top-k chunks by cosine similarity, highest first
   */
  public search(query: readonly number[], k: number): RetrievedChunk[] {
    if (this.entries.length === 0 || k <= 0) {
      return [];
    }
    if (query.length !== this.dim) {
      throw new CompanionError(
        'ConfigurationError',
        `Query dimension ${query.length} does not match index dimension ${this.dimension}`
      );
    }

    const unitQuery = normalize(query);
    const scored = this.entries.map(({ chunk, unit }) => {
      let score = 0;
      for (let i = 0; i < unit.length; i++) {
        score += unit[i] * unitQuery[i];
      }
      return { chunk, score };
    });

    scored.sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index);

    return scored.slice(0, k).map(({ chunk, score }) => ({
      index: chunk.index,
      text: chunk.text,
      score,
      charSpan: { ...chunk.charSpan },
    }));
  }

  public chunks(): Chunk[] {
    return this.entries.map(({ chunk }) => chunk);
  }
}
