/**
 * Structured logging
 *
 * Every component logs through a pino child logger carrying a `component`
 * field. The root level can be set with LOADTEST_LOG_LEVEL.
 *
 * Logs go to stderr; stdout carries reports.
 */

import { destination, pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(value: string | undefined): LevelWithSilent {
  const normalized = value?.toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? 'info';
}

let rootLogger: Logger | null = null;

/**
 * Root logger shared by all components
 */
function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        name: 'loadtest',
        level: resolveLevel(process.env.LOADTEST_LOG_LEVEL),
      },
      destination(2)
    );
  }
  return rootLogger;
}

/**
 * Replace the root logger (CLI verbosity flags, tests)
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Create a component logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('LoadTester');
 * logger.info({ users: 50 }, 'Starting benchmark');
 * ```
 */
export function createLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getRootLogger()).child({ component });
}
