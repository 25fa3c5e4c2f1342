import type { PipelineEvent } from '../types/events';
import type { Logger } from './types';

export interface LoggedMessage {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  error?: Error;
}

/**
 * Keeps events and messages in memory. Children share the parent's buffers.
 */
export class MemoryLogger implements Logger {
  readonly events: PipelineEvent[];
  readonly messages: LoggedMessage[];

  constructor(
    private readonly bindings: Record<string, unknown> = {},
    buffers?: { events: PipelineEvent[]; messages: LoggedMessage[] },
  ) {
    this.events = buffers?.events ?? [];
    this.messages = buffers?.messages ?? [];
  }

  log(event: PipelineEvent): void {
    this.events.push(event);
  }

  trace(event: PipelineEvent, message: string): void {
    this.events.push(event);
    this.messages.push({ level: 'info', message: this.withPrefix(message) });
  }

  debug(message: string): void {
    this.messages.push({ level: 'debug', message: this.withPrefix(message) });
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message: this.withPrefix(message) });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message: this.withPrefix(message) });
  }

  error(error: Error, message?: string): void {
    this.messages.push({ level: 'error', message: this.withPrefix(message ?? error.message), error });
  }

  child(bindings: Record<string, unknown>): Logger {
    return new MemoryLogger({ ...this.bindings, ...bindings }, {
      events: this.events,
      messages: this.messages,
    });
  }

  eventsOfType<T extends PipelineEvent['type']>(type: T): Extract<PipelineEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<PipelineEvent, { type: T }> => e.type === type);
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
