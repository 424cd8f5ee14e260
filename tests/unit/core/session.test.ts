import { describe, it, expect } from 'vitest';
import { VideoSession, type ReadySession } from '../../../src/core/session.js';
import { VectorIndex } from '../../../src/pipeline/vector-index.js';
import type { SessionState } from '../../../src/types/companion.js';
import type { Summary } from '../../../src/types/schemas/artifacts.js';

const VIDEO = 'abcDEF12345';

function readySession(): ReadySession {
  return {
    handle: { videoId: VIDEO, chunkCount: 0, embeddingModelId: 'embed', chunkingFingerprint: 'fp' },
    transcript: { videoId: VIDEO, text: 'hello', language: 'en', durationSeconds: 10, fetchedAt: 0 },
    chunks: [],
    index: new VectorIndex(VIDEO, 'embed'),
  };
}

function track(): { session: VideoSession; transitions: Array<[SessionState, SessionState]> } {
  const transitions: Array<[SessionState, SessionState]> = [];
  const session = new VideoSession(VIDEO, (_, previous, next) => transitions.push([previous, next]));
  return { session, transitions };
}

describe('VideoSession', () => {
  it('moves new -> ingesting -> ready and exposes data only when ready', () => {
    const { session, transitions } = track();
    expect(session.state).toBe('new');

    const epoch = session.startIngesting();
    expect(session.data).toBeUndefined();

    expect(session.markReady(epoch, readySession())).toBe(true);
    expect(session.state).toBe('ready');
    expect(session.data?.handle.videoId).toBe(VIDEO);
    expect(transitions).toEqual([
      ['new', 'ingesting'],
      ['ingesting', 'ready'],
    ]);
  });

  it('rejects transitions the state machine does not allow', () => {
    const { session } = track();
    session.startIngesting();
    expect(() => session.startIngesting()).toThrow('Invalid session transition ingesting -> ingesting');
  });

  it('discards results from an ingestion that was reset', () => {
    const { session } = track();
    const epoch = session.startIngesting();
    const controller = new AbortController();
    session.ingestController = controller;

    session.reset();
    expect(controller.signal.aborted).toBe(true);
    expect(session.state).toBe('new');

    expect(session.markReady(epoch, readySession())).toBe(false);
    expect(session.state).toBe('new');
    expect(session.generation).toBe(epoch + 1);
  });

  it('derives answering and summarizing from in-flight work', () => {
    const { session, transitions } = track();
    session.markReady(session.startIngesting(), readySession());
    transitions.length = 0;

    const endSummary = session.beginSummary();
    expect(session.state).toBe('summarizing');
    const endAnswer = session.beginAnswer();
    expect(session.state).toBe('answering');

    endAnswer();
    endAnswer();
    expect(session.state).toBe('summarizing');
    endSummary();
    expect(session.state).toBe('ready');

    expect(transitions).toEqual([
      ['ready', 'summarizing'],
      ['summarizing', 'answering'],
      ['answering', 'summarizing'],
      ['summarizing', 'ready'],
    ]);
  });

  it('drops the index and shared work on reset', () => {
    const { session } = track();
    session.markReady(session.startIngesting(), readySession());
    const summary: Summary = {
      overviewText: 'x',
      keyPoints: [],
      generatedAt: 0,
      modelId: 'm',
      status: 'complete',
      chunksProcessed: 1,
      totalChunks: 1,
    };
    session.summary = Promise.resolve(summary);

    session.reset();
    expect(session.data).toBeUndefined();
    expect(session.summary).toBeUndefined();
    expect(session.state).toBe('new');
  });
});
