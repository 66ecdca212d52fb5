import type { LifecycleEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout adapterlab.
 * Supports both structured lifecycle events and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventBase(runId), type: 'RunCreated', payload: { runDir, baseModel } });
 *
 * // Standard logging
 * logger.info('Created run');
 * logger.error(new Error('Failed'), 'Conversion failed');
 *
 * // Create a child logger with additional context
 * const runLogger = logger.child({ runId });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured lifecycle event.
   */
  log(event: LifecycleEvent): MaybePromise<void>;

  /**
   * High-signal event with a human-readable message.
   */
  trace(event: LifecycleEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages are prefixed with the bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
