/**
 * Logging type definitions.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Ordered from most to least verbose. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Leveled logger handed to every component at construction time.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Returns a logger that tags each line with `scope`. */
  child(scope: string): Logger;
}
