/**
 * Deterministic transcript chunking
 *
 * Splits text into windows of at most `chunkSize` characters with about
 * `chunkOverlap` characters shared between neighbours. Boundaries depend only
 * on the text and the two parameters, so chunks (and everything keyed on
 * them) can be reused from the cache.
 */

import { CompanionError } from '../api/errors.js';
import type { Chunk } from '../types/schemas/artifacts.js';
import { fingerprint, sha256 } from '../utils/fingerprint.js';

/** Bumped whenever the boundary rules change, so old cached chunks miss. */
export const CHUNKER_VERSION = 1;

export interface ChunkingParams {
  chunkSize: number;
  chunkOverlap: number;
}

const WHITESPACE = /\s/;

function isSpace(text: string, index: number): boolean {
  return WHITESPACE.test(text.charAt(index));
}

/**
 * @throws {CompanionError} ConfigurationError on sizes that cannot make progress
 */
export function validateChunkingParams({ chunkSize, chunkOverlap }: ChunkingParams): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new CompanionError('ConfigurationError', `chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new CompanionError('ConfigurationError', `chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new CompanionError(
      'ConfigurationError',
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Cache fingerprint for the chunks of one text under one configuration.
 */
export function chunkingFingerprint(text: string, params: ChunkingParams): string {
  return fingerprint({
    textHash: sha256(text),
    chunkSize: params.chunkSize,
    chunkOverlap: params.chunkOverlap,
    chunkerVersion: CHUNKER_VERSION,
  });
}

/**
 * Split text into overlapping chunks
 *
 * - A window whose end would split a word ends at the last whitespace inside
 *   it instead (hard cut when the window has none).
 * - Trailing whitespace is excluded from each span.
 * - The next window starts `chunkOverlap` characters before the previous
 *   window end, moved forward to a word start.
 */
export function chunkTranscript(text: string, params: ChunkingParams): Chunk[] {
  validateChunkingParams(params);
  const { chunkSize, chunkOverlap } = params;
  const length = text.length;
  const chunks: Chunk[] = [];

  let start = 0;
  while (start < length && isSpace(text, start)) start++;

  let previousEnd: number | null = null;

  while (start < length) {
    const limit = Math.min(start + chunkSize, length);
    let end = limit;

    if (limit < length && !isSpace(text, limit - 1) && !isSpace(text, limit)) {
      for (let i = limit - 1; i > start; i--) {
        if (isSpace(text, i)) {
          end = i;
          break;
        }
      }
    }

    let spanEnd = end;
    while (spanEnd > start && isSpace(text, spanEnd - 1)) spanEnd--;

    chunks.push({
      index: chunks.length,
      text: text.slice(start, spanEnd),
      charSpan: { start, end: spanEnd },
      overlapWithPrev: previousEnd === null ? 0 : Math.max(0, previousEnd - start),
    });
    previousEnd = spanEnd;

    if (end >= length) {
      break;
    }

    let next = end - chunkOverlap;
    if (next <= start) next = end;
    while (next < end && !isSpace(text, next - 1) && !isSpace(text, next)) next++;
    while (next < length && isSpace(text, next)) next++;

    start = next;
  }

  return chunks;
}
