/**
 * OpenAI-compatible completer and embedder.
 *
 * Works against any endpoint that speaks the OpenAI wire format (OpenAI,
 * Groq, a local gateway) through `baseURL`. The SDK's own retries are
 * disabled: fallback and backoff belong to ModelFallbackSelector.
 */

import OpenAI from 'openai';
import { CompanionError, RateLimitedError } from '../api/errors.js';
import type { Completer, Embedder, ProviderCallOptions } from './types.js';

/**
 * Subset of the SDK client the adapters use. Tests pass a stand-in.
 */
export interface OpenAiClientLike {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          messages: Array<{ role: 'system' | 'user'; content: string }>;
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal }
      ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
  embeddings: {
    create(
      body: { model: string; input: string[] },
      options?: { signal?: AbortSignal }
    ): PromiseLike<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAiProviderOptions {
  apiKey?: string;
  baseURL?: string;
  client?: OpenAiClientLike;
  /** System message prepended to every completion */
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

const DEFAULT_SYSTEM_PROMPT = 'You are a careful assistant that answers only from the material you are given.';
const DEFAULT_RETRY_AFTER_MS = 1000;

function createClient(options: OpenAiProviderOptions): OpenAiClientLike {
  if (options.client) {
    return options.client;
  }
  const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new CompanionError('ConfigurationError', 'Missing API key: pass apiKey or set OPENAI_API_KEY');
  }
  return new OpenAI({ apiKey, baseURL: options.baseURL, maxRetries: 0 });
}

function retryAfterMs(headers: Record<string, string | null | undefined> | undefined): number {
  const raw = headers?.['retry-after'];
  const seconds = raw ? Number(raw) : NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : DEFAULT_RETRY_AFTER_MS;
}

/**
 * Translate SDK failures into CompanionError codes.
 */
export function mapOpenAiError(error: unknown, modelId: string): CompanionError {
  if (error instanceof CompanionError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new CompanionError('Cancelled', `Request to ${modelId} was aborted`, { modelId });
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new CompanionError('Timeout', `Request to ${modelId} timed out`, { modelId });
  }
  if (error instanceof OpenAI.APIError) {
    if (error.status === 429) {
      return new RateLimitedError(`${modelId} is rate limited`, retryAfterMs(error.headers), { modelId });
    }
    return new CompanionError('ProviderError', `${modelId} failed: ${error.message}`, {
      modelId,
      status: error.status,
    });
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new CompanionError('Cancelled', `Request to ${modelId} was aborted`, { modelId });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CompanionError('ProviderError', `${modelId} failed: ${message}`, { modelId });
}

export class OpenAiCompleter implements Completer {
  private readonly client: OpenAiClientLike;
  private readonly systemPrompt: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAiProviderOptions = {}) {
    this.client = createClient(options);
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 1024;
  }

  public async complete(prompt: string, modelId: string, options: ProviderCallOptions = {}): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: modelId,
          messages: [
            { role: 'system', content: this.systemPrompt },
            { role: 'user', content: prompt },
          ],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        { signal: options.signal }
      );
      return response.choices[0]?.message.content ?? '';
    } catch (error) {
      throw mapOpenAiError(error, modelId);
    }
  }
}

export class OpenAiEmbedder implements Embedder {
  private readonly client: OpenAiClientLike;

  constructor(options: OpenAiProviderOptions = {}) {
    this.client = createClient(options);
  }

  public async embed(texts: string[], modelId: string, options: ProviderCallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    try {
      const response = await this.client.embeddings.create(
        { model: modelId, input: texts.map((text) => text.replace(/\n/g, ' ').trim()) },
        { signal: options.signal }
      );
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      throw mapOpenAiError(error, modelId);
    }
  }
}
