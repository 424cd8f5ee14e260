/**
 * Transcript fetcher backed by the `youtube-transcript` package.
 */

import { YoutubeTranscript } from 'youtube-transcript';
import { CompanionError, RateLimitedError } from '../api/errors.js';
import type { FetchedTranscript, ProviderCallOptions, TranscriptFetcher } from './types.js';

export interface TranscriptSegment {
  text: string;
  offset: number;
  duration: number;
  lang?: string;
}

export type SegmentSource = (videoId: string, config?: { lang?: string }) => Promise<TranscriptSegment[]>;

export interface YoutubeTranscriptFetcherOptions {
  /** Preferred caption language, e.g. "en" */
  lang?: string;
  /** Unit of `offset` and `duration` in the fetched segments */
  timeUnit?: 'seconds' | 'milliseconds';
  /** Replaces the network call; used by tests */
  source?: SegmentSource;
}

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  '&amp;': '&',
  '&#39;': "'",
  '&quot;': '"',
  '&lt;': '<',
  '&gt;': '>',
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|#39|quot|lt|gt);/g, (entity) => HTML_ENTITIES[entity] ?? entity);
}

/**
 * Map library errors, which carry no codes, by their message text.
 */
export function mapTranscriptError(error: unknown, videoId: string): CompanionError {
  if (error instanceof CompanionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (/disabled/i.test(message)) {
    return new CompanionError('TranscriptDisabled', `Transcripts are disabled for ${videoId}`, { videoId });
  }
  if (/not available|no transcripts|unavailable/i.test(message)) {
    return new CompanionError('NotFound', `No transcript found for ${videoId}`, { videoId });
  }
  if (/too many/i.test(message)) {
    return new RateLimitedError(`Transcript source is rate limiting requests for ${videoId}`, 60_000, { videoId });
  }
  return new CompanionError('ProviderError', `Transcript fetch for ${videoId} failed: ${message}`, { videoId });
}

export class YoutubeTranscriptFetcher implements TranscriptFetcher {
  private readonly lang?: string;
  private readonly divisor: number;
  private readonly source: SegmentSource;

  constructor(options: YoutubeTranscriptFetcherOptions = {}) {
    this.lang = options.lang;
    this.divisor = options.timeUnit === 'milliseconds' ? 1000 : 1;
    this.source = options.source ?? ((videoId, config) => YoutubeTranscript.fetchTranscript(videoId, config));
  }

  public async fetchTranscript(videoId: string, options: ProviderCallOptions = {}): Promise<FetchedTranscript> {
    let segments: TranscriptSegment[];
    try {
      segments = await this.source(videoId, this.lang ? { lang: this.lang } : undefined);
    } catch (error) {
      throw mapTranscriptError(error, videoId);
    }
    if (options.signal?.aborted) {
      throw new CompanionError('Cancelled', `Transcript fetch for ${videoId} was cancelled`, { videoId });
    }

    const text = segments
      .map((segment) => decodeEntities(segment.text).trim())
      .filter((line) => line.length > 0)
      .join('\n');

    const last = segments[segments.length - 1];
    const durationSeconds = last ? (last.offset + last.duration) / this.divisor : 0;

    return {
      text,
      language: this.lang ?? last?.lang ?? 'unknown',
      durationSeconds,
    };
  }
}
