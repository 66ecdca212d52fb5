import pc from 'picocolors';
import type { LifecycleEvent, Logger } from '@adapterlab/shared';

export interface TerminalLoggerOptions {
  verbose?: boolean;
  /** Receives lifecycle events; they are dropped when unset */
  events?: Logger;
}

/**
 * Human-facing logger for the CLI. Messages go to stderr so that stdout
 * carries only command output (JSON included).
 */
export class TerminalLogger implements Logger {
  constructor(
    private readonly options: TerminalLoggerOptions = {},
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  log(event: LifecycleEvent) {
    return this.options.events?.log(event);
  }

  trace(event: LifecycleEvent, message: string) {
    this.info(message);
    return this.log(event);
  }

  debug(message: string): void {
    if (this.options.verbose) {
      console.error(pc.gray(this.withPrefix(message)));
    }
  }

  info(message: string): void {
    console.error(this.withPrefix(message));
  }

  warn(message: string): void {
    console.error(pc.yellow(`warning: ${this.withPrefix(message)}`));
  }

  error(error: Error, message?: string): void {
    console.error(pc.red(this.withPrefix(message ?? error.message)));
    if (message) {
      console.error(pc.red(`  ${error.message}`));
    }
    if (this.options.verbose && error.stack) {
      console.error(pc.gray(error.stack));
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new TerminalLogger(this.options, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
