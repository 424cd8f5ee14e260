/**
 * Companion Event System
 *
 * Defines event types and payloads for the VideoCompanion class.
 */

import type { ModelHealthChangeEvent } from '../core/model-fallback.js';
import type { SessionState } from '../types/index.js';
import type { CompanionErrorShape } from './errors.js';

/**
 * Event payload when a session changes state
 */
export interface SessionStateEvent {
  videoId: string;
  previous: SessionState;
  next: SessionState;
  timestamp: number;
}

/**
 * Event payload when a vector index is ready
 */
export interface IngestCompletedEvent {
  videoId: string;
  chunks: number;
  embeddedChunks: number;
  cachedEmbeddings: number;
  transcriptFromCache: boolean;
  durationMs: number;
  timestamp: number;
}

/**
 * Event payload when a summary is produced
 */
export interface SummaryCompletedEvent {
  videoId: string;
  status: 'complete' | 'partial';
  modelId: string;
  timestamp: number;
}

/**
 * Event payload when background work fails (eager summary, late ingestion)
 */
export interface ErrorEvent {
  error: CompanionErrorShape;
  context: string;
  videoId?: string;
  timestamp: number;
}

/**
 * Map of all companion events
 */
export interface CompanionEvents {
  'session:state': (event: SessionStateEvent) => void;
  'ingest:completed': (event: IngestCompletedEvent) => void;
  'summary:completed': (event: SummaryCompletedEvent) => void;
  'model:health': (event: ModelHealthChangeEvent) => void;
  'error': (event: ErrorEvent) => void;
}

export type CompanionEventName = keyof CompanionEvents;
