/**
 * Lazy logging helpers
 *
 * The request loop runs thousands of iterations per second; per-request
 * context objects are only built when the level is enabled.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;

/**
 * Log with a context builder that only runs when `level` is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ path, status }), 'Request finished');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: () => LogContext,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
