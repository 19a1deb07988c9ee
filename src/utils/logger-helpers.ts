/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects: the dispatcher logs on every
 * attempt, so context is only built when the level is enabled.
 */

import { pino, type Logger } from 'pino';
import { LOGGING } from '../config/defaults.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * // Context only created if debug is enabled
 * lazyLog(logger, 'debug', () => ({ endpointKey, attempt }), 'Hedge fired');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger) {
    return;
  }

  if (!logger.isLevelEnabled(level)) {
    return;
  }

  const context = contextBuilder();
  logger[level](context, message);
}

export interface LoggerOptions {
  level?: LogLevel | 'silent';
  name?: string;
}

/**
 * Root logger used when none is injected.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? LOGGING.NAME,
    level: options.level ?? LOGGING.LEVEL,
  });
}
