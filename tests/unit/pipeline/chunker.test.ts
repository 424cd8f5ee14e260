import { describe, it, expect } from 'vitest';
import { CompanionError } from '../../../src/api/errors.js';
import { chunkTranscript, chunkingFingerprint, validateChunkingParams } from '../../../src/pipeline/chunker.js';

function configurationError(run: () => unknown): string | undefined {
  try {
    run();
    return undefined;
  } catch (error) {
    return error instanceof CompanionError && error.code === 'ConfigurationError' ? error.message : undefined;
  }
}

describe('chunkTranscript', () => {
  it('cuts on word boundaries with overlap', () => {
    expect(chunkTranscript('alpha beta gamma delta', { chunkSize: 12, chunkOverlap: 5 })).toEqual([
      { index: 0, text: 'alpha beta', charSpan: { start: 0, end: 10 }, overlapWithPrev: 0 },
      { index: 1, text: 'beta gamma', charSpan: { start: 6, end: 16 }, overlapWithPrev: 4 },
      { index: 2, text: 'gamma delta', charSpan: { start: 11, end: 22 }, overlapWithPrev: 5 },
    ]);
  });

  it('hard-cuts a window without whitespace', () => {
    const chunks = chunkTranscript('abcdefghij', { chunkSize: 4, chunkOverlap: 1 });
    expect(chunks.map((chunk) => chunk.text)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('trims surrounding whitespace from a single chunk', () => {
    expect(chunkTranscript('  hello world  ', { chunkSize: 100, chunkOverlap: 10 })).toEqual([
      { index: 0, text: 'hello world', charSpan: { start: 2, end: 13 }, overlapWithPrev: 0 },
    ]);
  });

  it('returns no chunks for blank text', () => {
    expect(chunkTranscript('', { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
    expect(chunkTranscript('   \n  ', { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
  });

  it('keeps every chunk within size and consistent with its span', () => {
    const text = Array.from({ length: 60 }, (_, i) => `word${i}`).join(' ');
    const chunks = chunkTranscript(text, { chunkSize: 50, chunkOverlap: 10 });

    expect(chunks.length).toBeGreaterThan(1);
    chunks.forEach((chunk, i) => {
      expect(chunk.index).toBe(i);
      expect(chunk.text.length).toBeLessThanOrEqual(50);
      expect(text.slice(chunk.charSpan.start, chunk.charSpan.end)).toBe(chunk.text);
    });
    expect(chunks[chunks.length - 1].charSpan.end).toBe(text.length);
  });

  it('is deterministic', () => {
    const text = 'The quick brown fox jumps over the lazy dog. '.repeat(20);
    const params = { chunkSize: 64, chunkOverlap: 16 };
    expect(chunkTranscript(text, params)).toEqual(chunkTranscript(text, params));
  });

  it('rejects parameters that cannot make progress', () => {
    expect(configurationError(() => validateChunkingParams({ chunkSize: 100, chunkOverlap: 100 }))).toBe(
      'chunkOverlap (100) must be smaller than chunkSize (100)'
    );
    expect(configurationError(() => chunkTranscript('text', { chunkSize: 0, chunkOverlap: 0 }))).toBe(
      'chunkSize must be a positive integer, got 0'
    );
    expect(configurationError(() => chunkTranscript('text', { chunkSize: 10, chunkOverlap: -1 }))).toBe(
      'chunkOverlap must be a non-negative integer, got -1'
    );
  });
});

describe('chunkingFingerprint', () => {
  it('changes with the text and with either parameter', () => {
    const base = chunkingFingerprint('text', { chunkSize: 1000, chunkOverlap: 200 });

    expect(chunkingFingerprint('text', { chunkSize: 1000, chunkOverlap: 200 })).toBe(base);
    expect(chunkingFingerprint('text', { chunkSize: 500, chunkOverlap: 200 })).not.toBe(base);
    expect(chunkingFingerprint('text', { chunkSize: 1000, chunkOverlap: 100 })).not.toBe(base);
    expect(chunkingFingerprint('other', { chunkSize: 1000, chunkOverlap: 200 })).not.toBe(base);
  });
});
