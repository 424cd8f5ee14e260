/**
 * Per-video session state machine.
 *
 *   new -> ingesting -> ready
 *   ingesting -> new        (failure or IngestTimeout)
 *   ready -> new            (invalidate)
 *
 * `answering` and `summarizing` are transient sub-states of `ready`, derived
 * from in-flight counters so that concurrent requests never block each
 * other.
 */

import type { VectorIndex } from '../pipeline/vector-index.js';
import type { SessionHandle, SessionState } from '../types/companion.js';
import type { Chunk, Summary, Transcript } from '../types/schemas/artifacts.js';

type CoreState = 'new' | 'ingesting' | 'ready';

const TRANSITIONS: Readonly<Record<CoreState, readonly CoreState[]>> = {
  new: ['ingesting'],
  ingesting: ['ready', 'new'],
  ready: ['new'],
};

export interface ReadySession {
  handle: SessionHandle;
  transcript: Transcript;
  chunks: Chunk[];
  index: VectorIndex;
}

export type StateListener = (videoId: string, previous: SessionState, next: SessionState) => void;

export class VideoSession {
  public readonly videoId: string;

  /** Shared in-flight ingestion, if any */
  public ingestion?: Promise<SessionHandle>;

  /** Aborts the in-flight ingestion's internal work */
  public ingestController?: AbortController;

  /** Shared in-flight summary computation, if any */
  public summary?: Promise<Summary>;
  public summaryController?: AbortController;

  private core: CoreState = 'new';
  private ready?: ReadySession;
  private answering = 0;
  private summarizing = 0;
  private epoch = 0;
  private readonly onChange?: StateListener;

  constructor(videoId: string, onChange?: StateListener) {
    this.videoId = videoId;
    this.onChange = onChange;
  }

  public get state(): SessionState {
    if (this.core !== 'ready') return this.core;
    if (this.answering > 0) return 'answering';
    if (this.summarizing > 0) return 'summarizing';
    return 'ready';
  }

  /**
   * Incremented on every reset. Work started under an older epoch must not
   * publish its result.
   */
  public get generation(): number {
    return this.epoch;
  }

  public get data(): ReadySession | undefined {
    return this.core === 'ready' ? this.ready : undefined;
  }

  public startIngesting(): number {
    this.move('ingesting');
    return this.epoch;
  }

  /**
   * @returns false when the session was reset since `epoch`; the result is discarded
   */
  public markReady(epoch: number, ready: ReadySession): boolean {
    if (epoch !== this.epoch || this.core !== 'ingesting') {
      return false;
    }
    this.ready = ready;
    this.move('ready');
    return true;
  }

  /**
   * Back to `new`, dropping the index and any shared in-flight work.
   */
  public reset(): void {
    this.epoch++;
    this.ingestController?.abort();
    this.ingestController = undefined;
    this.ingestion = undefined;
    this.summaryController?.abort();
    this.summaryController = undefined;
    this.summary = undefined;
    this.ready = undefined;
    if (this.core !== 'new') {
      this.move('new');
    }
  }

  public beginAnswer(): () => void {
    return this.track('answering');
  }

  public beginSummary(): () => void {
    return this.track('summarizing');
  }

  private track(kind: 'answering' | 'summarizing'): () => void {
    const previous = this.state;
    if (kind === 'answering') this.answering++;
    else this.summarizing++;
    this.notify(previous);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const before = this.state;
      if (kind === 'answering') this.answering = Math.max(0, this.answering - 1);
      else this.summarizing = Math.max(0, this.summarizing - 1);
      this.notify(before);
    };
  }

  private move(next: CoreState): void {
    if (!TRANSITIONS[this.core].includes(next)) {
      throw new Error(`Invalid session transition ${this.core} -> ${next} for ${this.videoId}`);
    }
    const previous = this.state;
    this.core = next;
    this.notify(previous);
  }

  private notify(previous: SessionState): void {
    const next = this.state;
    if (previous !== next) {
      this.onChange?.(this.videoId, previous, next);
    }
  }
}
