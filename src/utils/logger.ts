/**
 * Structured logger factory
 *
 * Every component accepts an optional pino `Logger`; this helper builds the
 * default one. Log level can be controlled via the COMPANION_LOG_LEVEL
 * environment variable.
 *
 * @example
 * ```typescript
 * const logger = createLogger('CacheStore');
 * logger.info({ entries: 12 }, 'Cache loaded from disk');
 * ```
 */

import { pino, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL = process.env.COMPANION_LOG_LEVEL ?? 'info';

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ name: 'transcript-companion', level: DEFAULT_LOG_LEVEL });
  }
  return rootLogger;
}

/**
 * Create a logger instance namespaced by component
 *
 * @param component - Component name (e.g., 'ModelFallbackSelector')
 * @param parent - Optional parent logger; defaults to the process-wide root logger
 */
export function createLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getRootLogger()).child({ component });
}
