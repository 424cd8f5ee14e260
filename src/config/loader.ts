/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 * and environment-variable overrides on top.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { CompanionError } from '../api/errors.js';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import type { CompanionOptions } from './defaults.js';

export type ConfigEnvironment = 'production' | 'development' | 'test';

type RawConfig = Record<string, unknown>;

/**
 * Environment variables that override a single config field.
 */
const ENV_OVERRIDES: ReadonlyArray<{ variable: string; path: string[]; kind: 'number' | 'string' }> = [
  { variable: 'MAX_VIDEO_LENGTH', path: ['video', 'max_video_length_seconds'], kind: 'number' },
  { variable: 'MAX_TRANSCRIPT_LENGTH', path: ['video', 'max_transcript_chars'], kind: 'number' },
  { variable: 'RATE_LIMIT_REQUESTS', path: ['rate_limit', 'requests_per_minute'], kind: 'number' },
  { variable: 'CALLER_RATE_LIMIT_REQUESTS', path: ['rate_limit', 'caller_requests_per_minute'], kind: 'number' },
  { variable: 'RATE_LIMIT_TOKENS', path: ['rate_limit', 'tokens_per_minute'], kind: 'number' },
  { variable: 'CHUNK_SIZE', path: ['chunking', 'chunk_size'], kind: 'number' },
  { variable: 'CHUNK_OVERLAP', path: ['chunking', 'chunk_overlap'], kind: 'number' },
  { variable: 'TOP_K_RETRIEVAL', path: ['retrieval', 'top_k'], kind: 'number' },
  { variable: 'CACHE_TTL', path: ['cache', 'ttl_seconds'], kind: 'number' },
  { variable: 'EMBEDDING_MODEL_ID', path: ['models', 'embedding_model_id'], kind: 'string' },
  { variable: 'PRIMARY_MODEL_ID', path: ['models', 'primary_model_id'], kind: 'string' },
  { variable: 'FALLBACK_MODEL_ID', path: ['models', 'fallback_model_id'], kind: 'string' },
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const output: RawConfig = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

function setPath(target: RawConfig, path: string[], value: unknown): void {
  let cursor = target;
  for (const segment of path.slice(0, -1)) {
    const next = cursor[segment];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: RawConfig = {};
      cursor[segment] = created;
      cursor = created;
    }
  }
  cursor[path[path.length - 1]] = value;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Apply recognised environment variables.
 *
 * Values that do not parse as numbers are left as strings so that validation
 * reports them against the field they target.
 */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const output = structuredClone(config);

  for (const { variable, path, kind } of ENV_OVERRIDES) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    const parsed = kind === 'number' ? Number(raw) : raw.trim();
    setPath(output, path, typeof parsed === 'number' && Number.isNaN(parsed) ? raw : parsed);
  }

  return output;
}

/**
 * Validate configuration values
 *
 * @throws {CompanionError} ConfigurationError listing every invalid field
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new CompanionError(
      'ConfigurationError',
      `Configuration validation failed:\n${errors.join('\n')}`,
      { errors }
    );
  }
  return parseResult.data;
}

/**
 * Load configuration from YAML file
 *
 * @param configPath - Defaults to `config/runtime.yaml` in the package root
 * @param environment - Defaults to NODE_ENV, then `development`
 * @param env - Variables consulted for field overrides
 */
export function loadConfig(
  configPath?: string,
  environment?: ConfigEnvironment,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    throw new CompanionError(
      'ConfigurationError',
      `Configuration file not found: ${finalPath}. ` +
        `Please ensure config/runtime.yaml exists in the project root.`,
      { path: finalPath, cause: error instanceof Error ? error.message : String(error) }
    );
  }

  let document: unknown;
  try {
    document = yaml.load(fileContents);
  } catch (error) {
    throw new CompanionError(
      'ConfigurationError',
      `Failed to parse configuration: ${error instanceof Error ? error.message : String(error)}`,
      { path: finalPath }
    );
  }

  if (!isRecord(document)) {
    throw new CompanionError('ConfigurationError', `Configuration root must be a mapping: ${finalPath}`);
  }

  const { environments, ...baseConfig } = document;
  const envName = environment ?? env.NODE_ENV ?? 'development';

  let merged: RawConfig = baseConfig;
  if (isRecord(environments)) {
    const envConfig =
      envName === 'production'
        ? environments.production
        : envName === 'test'
        ? environments.test
        : environments.development;

    if (isRecord(envConfig)) {
      merged = deepMerge(baseConfig, envConfig);
    }
  }

  return validateConfig(applyEnvOverrides(merged, env));
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): RuntimeConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML config (snake_case) to component options (camelCase)
 */
export function toCompanionOptions(config: RuntimeConfig = getConfig()): CompanionOptions {
  return {
    video: {
      maxVideoLengthSeconds: config.video.max_video_length_seconds,
      maxTranscriptChars: config.video.max_transcript_chars,
    },
    rateLimit: {
      requestsPerMinute: config.rate_limit.requests_per_minute,
      callerRequestsPerMinute: config.rate_limit.caller_requests_per_minute,
      tokensPerMinute: config.rate_limit.tokens_per_minute,
      windowMs: config.rate_limit.window_ms,
    },
    chunking: {
      chunkSize: config.chunking.chunk_size,
      chunkOverlap: config.chunking.chunk_overlap,
    },
    retrieval: {
      topK: config.retrieval.top_k,
      historyTurns: config.retrieval.history_turns,
      maxHistoryChars: config.retrieval.max_history_chars,
      maxQuestionChars: config.retrieval.max_question_chars,
      condenseQuestion: config.retrieval.condense_question,
    },
    cache: {
      ttlMs: config.cache.ttl_seconds * 1000,
      maxEntries: config.cache.max_entries,
      sweepIntervalMs: config.cache.sweep_interval_ms,
      persistencePath: config.cache.persistence.enabled ? config.cache.persistence.path : null,
      saveIntervalMs: config.cache.persistence.save_interval_ms,
    },
    models: {
      primaryModelId: config.models.primary_model_id,
      fallbackModelId: config.models.fallback_model_id,
      embeddingModelId: config.models.embedding_model_id,
      failureThreshold: config.models.failure_threshold,
      cooldownMs: config.models.cooldown_ms,
      callTimeoutMs: config.models.call_timeout_ms,
      embeddingBatchSize: config.models.embedding_batch_size,
    },
    transcript: {
      fetchTimeoutMs: config.transcript.fetch_timeout_ms,
      maxAttempts: config.transcript.retry.max_attempts,
      initialDelayMs: config.transcript.retry.initial_delay_ms,
      maxDelayMs: config.transcript.retry.max_delay_ms,
      backoffMultiplier: config.transcript.retry.backoff_multiplier,
      jitter: config.transcript.retry.jitter ?? 0,
    },
    session: {
      ingestTimeoutMs: config.session.ingest_timeout_ms,
      eagerSummary: config.session.eager_summary,
    },
  };
}
