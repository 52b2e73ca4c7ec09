/**
 * Logger helpers
 *
 * Lazy evaluation of log context objects: telemetry and routing sit on the
 * request path, so debug contexts are only built when the level is enabled.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export const LOG_LEVEL_ENV = 'MODEL_SERVER_LOG_LEVEL';

/**
 * Create the root logger, honouring MODEL_SERVER_LOG_LEVEL over the configured level
 */
export function createRootLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({ name: 'model-dispatcher', level: process.env[LOG_LEVEL_ENV] ?? level });
}

/**
 * Child logger tagged with the component name
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ records: batch.length, partitionKey }), 'Telemetry batch flushed');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
