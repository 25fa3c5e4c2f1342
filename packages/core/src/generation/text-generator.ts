import { BoundedChannel, type ChatMessage, type Logger, type ModelRequest } from '@crucible/shared';
import type { AdapterContext, ProviderAdapter } from '@crucible/adapters';

export interface TextGenerationRequest {
  prompt: string;
  system?: string;
  temperature: number;
  seed: number;
  /** Aborted when the caller gives up on the request */
  signal?: AbortSignal;
}

/**
 * The one capability the generator needs from a model: text in, text out.
 */
export interface TextGenerationPort {
  readonly modelName: string;
  generate(req: TextGenerationRequest): Promise<string>;
}

export interface ProviderTextGeneratorOptions {
  runId: string;
  logger: Logger;
  maxTokens?: number;
  /** Longest gap allowed between two streamed chunks */
  readTimeoutMs?: number;
  /** Chunks buffered between the stream reader and the consumer */
  channelCapacity?: number;
}

const DEFAULT_READ_TIMEOUT_MS = 30_000;
const DEFAULT_CHANNEL_CAPACITY = 64;

/**
 * Adapts a ProviderAdapter to the generation port. Streaming adapters are read
 * by a background pump into a bounded channel; the caller drains the channel
 * with a per-read timeout, so a stalled stream surfaces as a TimeoutError.
 */
export class ProviderTextGenerator implements TextGenerationPort {
  private readonly readTimeoutMs: number;
  private readonly channelCapacity: number;

  constructor(
    private readonly adapter: ProviderAdapter,
    private readonly options: ProviderTextGeneratorOptions,
  ) {
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.channelCapacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
  }

  get modelName(): string {
    return this.adapter.model();
  }

  async generate(req: TextGenerationRequest): Promise<string> {
    const messages: ChatMessage[] = [];
    if (req.system) {
      messages.push({ role: 'system', content: req.system });
    }
    messages.push({ role: 'user', content: req.prompt });

    const request: ModelRequest = {
      messages,
      temperature: req.temperature,
      seed: req.seed,
      maxTokens: this.options.maxTokens,
    };

    if (this.adapter.stream && this.adapter.capabilities().supportsStreaming) {
      return this.readStream(this.adapter.stream.bind(this.adapter), request, req.signal);
    }

    const response = await this.adapter.generate(request, this.context(req.signal));
    return response.text ?? '';
  }

  private async readStream(
    stream: NonNullable<ProviderAdapter['stream']>,
    request: ModelRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    const channel = new BoundedChannel<string>(this.channelCapacity);
    const abort = new AbortController();
    const cancel = () => {
      abort.abort();
      channel.close(new Error('Generation aborted'));
    };
    if (signal?.aborted) {
      cancel();
    } else {
      signal?.addEventListener('abort', cancel, { once: true });
    }

    const pump = async (): Promise<void> => {
      try {
        for await (const event of stream(request, this.context(abort.signal))) {
          if (event.type === 'text-delta') {
            await channel.send(event.content);
          }
        }
        channel.close();
      } catch (err) {
        channel.close(err);
      }
    };
    const pumping = pump();

    let text = '';
    try {
      for (;;) {
        const next = await channel.receive(this.readTimeoutMs);
        if (next.done) break;
        text += next.value;
      }
    } catch (err) {
      abort.abort();
      channel.close();
      throw err;
    } finally {
      signal?.removeEventListener('abort', cancel);
    }

    await pumping;
    return text;
  }

  private context(abortSignal?: AbortSignal): AdapterContext {
    return { runId: this.options.runId, logger: this.options.logger, abortSignal };
  }
}
