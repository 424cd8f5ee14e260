/**
 * Public result types returned by the companion.
 */

import type { CharSpan } from './schemas/artifacts.js';

/**
 * A chunk selected by similarity search, with its cosine score.
 */
export interface RetrievedChunk {
  index: number;
  text: string;
  score: number;
  charSpan: CharSpan;
}

export interface ConversationTurn {
  question: string;
  answer: string;
}

export interface Answer {
  text: string;
  /** Retrieval set, ranked by similarity descending */
  sources: RetrievedChunk[];
  modelId: string;
  /** Model reported the context did not contain the answer */
  insufficientContext: boolean;
}

/**
 * Opaque handle returned by ingest().
 */
export interface SessionHandle {
  readonly videoId: string;
  readonly chunkCount: number;
  readonly embeddingModelId: string;
  readonly chunkingFingerprint: string;
}

export type SessionState = 'new' | 'ingesting' | 'ready' | 'answering' | 'summarizing';

/**
 * Per-call options shared by the public operations.
 */
export interface CallOptions {
  /** Abandons this caller's wait; shared work keeps running */
  signal?: AbortSignal;
  /** Identity for caller admission; no caller limit when omitted */
  callerId?: string;
}
