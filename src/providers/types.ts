/**
 * Provider boundaries
 *
 * The companion talks to the outside world only through these interfaces.
 * Implementations translate their own failures into CompanionError codes:
 * NotFound / TranscriptDisabled for fetchers, ProviderError / RateLimited /
 * Timeout for embedders and completers.
 */

export interface ProviderCallOptions {
  signal?: AbortSignal;
}

export interface FetchedTranscript {
  text: string;
  /** BCP-47-ish tag, or "unknown" */
  language: string;
  durationSeconds: number;
}

export interface TranscriptFetcher {
  fetchTranscript(videoId: string, options?: ProviderCallOptions): Promise<FetchedTranscript>;
}

export interface Embedder {
  /** One vector per input text, in input order */
  embed(texts: string[], modelId: string, options?: ProviderCallOptions): Promise<number[][]>;
}

export interface Completer {
  complete(prompt: string, modelId: string, options?: ProviderCallOptions): Promise<string>;
}
