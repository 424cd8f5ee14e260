/**
 * Retrieval QA Engine
 *
 * question -> (optional condense) -> embed -> top-K chunks -> grounded prompt -> answer
 *
 * Only chunks of the index passed in are ever placed in the prompt, and the
 * conversation history is capped in turns and characters so prompt size
 * stays flat over long sessions.
 */

import type { Logger } from 'pino';
import { CompanionError } from '../api/errors.js';
import type { RetrievalOptions } from '../config/defaults.js';
import type { VectorIndex } from '../pipeline/vector-index.js';
import type { Completer, Embedder } from '../providers/types.js';
import type { Answer, ConversationTurn } from '../types/companion.js';
import { cleanOutput, validateQuestion } from '../utils/input-guard.js';
import type { ModelFallbackSelector } from './model-fallback.js';
import {
  NOT_AVAILABLE_ANSWER,
  condenseQuestionPrompt,
  groundedAnswerPrompt,
  historyWindow,
} from './prompts.js';

export interface QaEngineConfig {
  selector: ModelFallbackSelector;
  embedder: Embedder;
  completer: Completer;
  retrieval: RetrievalOptions;
  logger?: Logger;
}

export interface AskOptions {
  signal?: AbortSignal;
}

export class QaEngine {
  private readonly config: QaEngineConfig;
  private readonly logger?: Logger;

  constructor(config: QaEngineConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  /**
   * @throws {ValidationError} QuestionRejected, before any provider call
   * @throws {CompanionError} ConfigurationError when the index was built with another embedding model
   */
  public async ask(
    index: VectorIndex,
    question: string,
    history: readonly ConversationTurn[],
    options: AskOptions = {}
  ): Promise<Answer> {
    const { retrieval, selector } = this.config;
    const validated = validateQuestion(question, retrieval.maxQuestionChars);
    const turns = historyWindow(history, retrieval.historyTurns, retrieval.maxHistoryChars);

    const configuredModel = selector.candidates('embedding')[0];
    if (configuredModel !== index.embeddingModelId) {
      throw new CompanionError(
        'ConfigurationError',
        `Embedding model ${configuredModel} does not match index model ${index.embeddingModelId}`,
        { configured: configuredModel, index: index.embeddingModelId, videoId: index.videoId }
      );
    }

    const query = retrieval.condenseQuestion && turns.length > 0
      ? await this.condense(turns, validated, options.signal)
      : validated;

    const embedded = await selector.call({
      capability: 'embedding',
      label: 'embed question',
      signal: options.signal,
      invoke: (modelId, signal) => this.config.embedder.embed([query], modelId, { signal }),
    });
    if (embedded.modelId !== index.embeddingModelId) {
      throw new CompanionError(
        'ConfigurationError',
        `Question embedded with ${embedded.modelId}, index expects ${index.embeddingModelId}`
      );
    }
    const vector = embedded.value[0];
    if (embedded.value.length !== 1 || !vector || vector.length !== index.dimension) {
      throw new CompanionError(
        'ProviderError',
        `Question embedding has unexpected shape (vectors=${embedded.value.length}, dimension=${vector?.length ?? 0})`
      );
    }

    const sources = index.search(vector, retrieval.topK);
    const prompt = groundedAnswerPrompt(sources, turns, validated);

    const completion = await selector.call({
      capability: 'chat-completion',
      label: 'answer',
      prompt,
      signal: options.signal,
      invoke: async (modelId, signal) => {
        const reply = cleanOutput(await this.config.completer.complete(prompt, modelId, { signal }));
        if (!reply) {
          throw new CompanionError('ProviderError', `${modelId} returned an empty answer`);
        }
        return reply;
      },
    });

    const insufficientContext = sources.length === 0 || completion.value.includes(NOT_AVAILABLE_ANSWER);
    this.logger?.debug(
      {
        videoId: index.videoId,
        modelId: completion.modelId,
        sources: sources.map((source) => source.index),
        insufficientContext,
      },
      'Question answered'
    );

    return {
      text: completion.value,
      sources,
      modelId: completion.modelId,
      insufficientContext,
    };
  }

  private async condense(
    turns: readonly ConversationTurn[],
    question: string,
    signal?: AbortSignal
  ): Promise<string> {
    const prompt = condenseQuestionPrompt(turns, question);
    const result = await this.config.selector.call({
      capability: 'chat-completion',
      label: 'condense question',
      prompt,
      signal,
      invoke: async (modelId, callSignal) =>
        cleanOutput(await this.config.completer.complete(prompt, modelId, { signal: callSignal })),
    });
    return result.value || question;
  }
}
