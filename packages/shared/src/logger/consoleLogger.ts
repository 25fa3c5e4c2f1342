import type { PipelineEvent } from '../types/events';
import type { Logger } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  log(event: PipelineEvent): void {
    if (this.enabled('debug')) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: PipelineEvent, message: string): void {
    if (this.enabled('info')) {
      console.log(message, JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(message);
    }
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PipelineEvent) {
    return this.base.log(event);
  }

  trace(event: PipelineEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

/**
 * Logger that discards everything. Used as the default where no logger is injected.
 */
export class NoopLogger implements Logger {
  log(_event: PipelineEvent): void {}
  trace(_event: PipelineEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}
  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
