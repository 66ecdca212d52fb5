import type { LifecycleEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Drops everything. Default for library classes constructed without a logger.
 */
export class NoopLogger implements Logger {
  log(_event: LifecycleEvent): void {}
  trace(_event: LifecycleEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}

  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
