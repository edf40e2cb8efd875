import type { PackEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout codepack.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'FilePacked', ... });
 *
 * // Standard logging
 * logger.info('  Packed: src/index.ts');
 * logger.error('❌ Error: Operation failed');
 * ```
 */
export interface Logger {
  /**
   * Persist a structured pack event.
   */
  log(event: PackEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, shown only in verbose mode) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational status line */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /** Log an error line to stderr, shown even when silent */
  error(message: string): MaybePromise<void>;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines and events */
  verbose?: boolean;
  /** Suppress info and debug lines (warnings and errors still go to stderr) */
  silent?: boolean;
}
