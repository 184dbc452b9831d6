/**
 * Console-backed leveled logger.
 *
 * Lines look like `2026-01-01T00:00:00.000Z INFO [rotation] DNS changed to: ...`.
 * Debug and info go to stdout, warn and error to stderr, so a service manager
 * can route them to separate files.
 */

import { LOG_LEVELS } from '../types/logger.js';
import type { Logger, LogLevel } from '../types/logger.js';

/**
 * Sink for formatted lines. Defaults to the global console.
 */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Creates a logger that drops messages below `level`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (messageLevel: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(messageLevel) < threshold) return;
    const tag = options.scope ? ` [${options.scope}]` : '';
    const line = `${now().toISOString()} ${messageLevel.toUpperCase()}${tag} ${message}`;
    if (messageLevel === 'error') {
      sink.error(line);
    } else if (messageLevel === 'warn') {
      sink.warn(line);
    } else {
      sink.log(line);
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    child: (scope) =>
      createLogger({
        ...options,
        level,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
