import * as fs from 'fs/promises';
import type { LifecycleEvent } from '../types/events';
import { ensureDir } from '../fs/io';
import type { Logger } from './types';

/**
 * Appends lifecycle events to a JSONL file; plain messages go to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: LifecycleEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await ensureDir(this.filePath);
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail the operation being logged.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: LifecycleEvent, message: string): Promise<void> {
    this.info(message);
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
