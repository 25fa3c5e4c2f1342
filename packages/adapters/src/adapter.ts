import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  StreamEvent,
} from '@crucible/shared';
import type { AdapterContext } from './types';

/**
 * Interface for LLM provider adapters.
 * Adapters provide a unified interface for interacting with different LLM providers.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsStreaming: false, ... }; }
 *   async generate(req, ctx) { return { text: 'response' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /**
   * Returns the unique identifier for this adapter instance.
   */
  id(): string;
  /**
   * Returns the model this adapter sends requests to.
   */
  model(): string;
  /**
   * Returns the capabilities of this provider.
   */
  capabilities(): ProviderCapabilities;
  /**
   * Generate a response from the model.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
  /**
   * Stream a response from the model (optional).
   */
  stream?(req: ModelRequest, ctx: AdapterContext): AsyncIterable<StreamEvent>;
}
