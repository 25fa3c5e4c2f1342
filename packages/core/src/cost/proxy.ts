import type { AdapterContext, ProviderAdapter } from '@crucible/adapters';
import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  StreamEvent,
} from '@crucible/shared';
import type { CostTracker } from './tracker';

/**
 * Forwards every call to the wrapped adapter and records reported usage,
 * priced with the adapter's own capabilities when the config has no rates.
 */
export class CostTrackingAdapter implements ProviderAdapter {
  constructor(
    private providerId: string,
    private adapter: ProviderAdapter,
    private tracker: CostTracker,
  ) {}

  id(): string {
    return this.adapter.id();
  }

  model(): string {
    return this.adapter.model();
  }

  capabilities(): ProviderCapabilities {
    return this.adapter.capabilities();
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    const response = await this.adapter.generate(req, ctx);
    if (response.usage) {
      this.tracker.recordUsage(this.providerId, response.usage, this.adapter.capabilities().pricing);
    }
    return response;
  }

  async *stream(req: ModelRequest, ctx: AdapterContext): AsyncIterable<StreamEvent> {
    if (!this.adapter.stream) {
      const response = await this.generate(req, ctx);
      if (response.text) {
        yield { type: 'text-delta', content: response.text };
      }
      return;
    }

    for await (const event of this.adapter.stream(req, ctx)) {
      if (event.type === 'usage') {
        this.tracker.recordUsage(this.providerId, event.usage, this.adapter.capabilities().pricing);
      }
      yield event;
    }
  }
}
