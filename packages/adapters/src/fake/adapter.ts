import type {
  ModelPricing,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
  StreamEvent,
  Usage,
} from '@crucible/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

/** A scripted reply: text to return, or an error to throw */
export type FakeReply = string | Error;

/**
 * Computes the reply for a request. `call` counts from 0 across the adapter's lifetime.
 */
export type FakeResponder = (req: ModelRequest, call: number) => FakeReply | Promise<FakeReply>;

export interface FakeAdapterOptions {
  id?: string;
  model?: string;
  /** Replies handed out in order; the last one repeats once the script runs out */
  replies?: FakeReply[];
  responder?: FakeResponder;
  usage?: Usage;
  /** Emit replies through `stream` in chunks of this many characters */
  streamChunkSize?: number;
  /** Artificial latency per call */
  delayMs?: number;
  pricing?: ModelPricing;
}

export const FAKE_DEFAULT_REPLY = [
  '```typescript',
  '/** Returns the input unchanged. */',
  'export function identity<T>(value: T): T {',
  '  return value;',
  '}',
  '```',
].join('\n');

/**
 * Deterministic provider for tests and dry runs. Replies come from a script or a
 * responder function; every request is recorded.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly requests: ModelRequest[] = [];
  private calls = 0;
  private readonly options: FakeAdapterOptions;

  constructor(options: FakeAdapterOptions | ProviderConfig = {}) {
    this.options = 'type' in options ? { model: options.model, pricing: options.pricing } : options;
  }

  id(): string {
    return this.options.id ?? 'fake';
  }

  model(): string {
    return this.options.model ?? 'fake-model';
  }

  get callCount(): number {
    return this.calls;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: this.options.streamChunkSize !== undefined,
      supportsSeed: true,
      supportsJsonMode: true,
      latencyClass: 'fast',
      pricing: this.options.pricing,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    const text = await this.nextText(req, ctx);
    return { text, usage: this.options.usage };
  }

  async *stream(req: ModelRequest, ctx: AdapterContext): AsyncIterable<StreamEvent> {
    const text = await this.nextText(req, ctx);
    const size = Math.max(1, this.options.streamChunkSize ?? text.length);
    for (let i = 0; i < text.length; i += size) {
      yield { type: 'text-delta', content: text.slice(i, i + size) };
    }
    if (this.options.usage) {
      yield { type: 'usage', usage: this.options.usage };
    }
  }

  private async nextText(req: ModelRequest, ctx: AdapterContext): Promise<string> {
    const call = this.calls++;
    this.requests.push(req);

    if (this.options.delayMs) {
      await sleep(this.options.delayMs, ctx.abortSignal);
    }

    const reply = await this.replyFor(req, call);
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  private async replyFor(req: ModelRequest, call: number): Promise<FakeReply> {
    if (this.options.responder) {
      return this.options.responder(req, call);
    }
    const replies = this.options.replies;
    if (!replies || replies.length === 0) {
      return FAKE_DEFAULT_REPLY;
    }
    return replies[Math.min(call, replies.length - 1)];
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}
