import { ConfigError, type Config, type ProviderConfig } from '@crucible/shared';
import {
  AnthropicAdapter,
  FakeAdapter,
  OpenAIAdapter,
  type ProviderAdapter,
} from '@crucible/adapters';
import type { CostTracker } from './cost/tracker';
import { CostTrackingAdapter } from './cost/proxy';

/**
 * Factory function type for creating provider adapters.
 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter;

export interface GetAdapterOptions {
  /**
   * Wrap the adapter so its usage lands in the registry's cost tracker.
   * Callers that price their own calls (the reviewer) turn this off.
   */
  trackCost?: boolean;
}

/**
 * Registry for LLM provider adapters. Creates adapters lazily from the
 * `providers` section of the config and caches one instance per provider id.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry(config, costTracker);
 * registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
 *
 * const adapter = registry.getAdapter('local-coder');
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();
  private adapters = new Map<string, ProviderAdapter>();

  constructor(
    private config: Pick<Config, 'providers'>,
    private costTracker?: CostTracker,
  ) {}

  registerFactory(type: string, factory: AdapterFactory): void {
    this.factories.set(type, factory);
  }

  hasProvider(providerId: string): boolean {
    return providerId in this.config.providers;
  }

  /**
   * @throws {ConfigError} If the provider is not configured or its type has no factory
   */
  getAdapter(providerId: string, options: GetAdapterOptions = {}): ProviderAdapter {
    const trackCost = (options.trackCost ?? true) && this.costTracker !== undefined;
    const cacheKey = `${providerId}:${trackCost ? 'tracked' : 'raw'}`;

    const cached = this.adapters.get(cacheKey);
    if (cached) {
      return cached;
    }

    const providerConfig = this.config.providers[providerId];
    if (!providerConfig) {
      throw new ConfigError(`Provider '${providerId}' not found`);
    }

    const factory = this.factories.get(providerConfig.type);
    if (!factory) {
      throw new ConfigError(
        `Unknown provider type '${providerConfig.type}' for provider '${providerId}'`,
      );
    }

    let adapter = factory(providerConfig);
    if (trackCost && this.costTracker) {
      adapter = new CostTrackingAdapter(providerId, adapter, this.costTracker);
    }

    this.adapters.set(cacheKey, adapter);
    return adapter;
  }
}

/**
 * Registry with factories for every built-in provider type.
 */
export function createDefaultRegistry(
  config: Pick<Config, 'providers'>,
  costTracker?: CostTracker,
): ProviderRegistry {
  const registry = new ProviderRegistry(config, costTracker);
  registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
  registry.registerFactory('anthropic', (cfg) => new AnthropicAdapter(cfg));
  registry.registerFactory('fake', (cfg) => new FakeAdapter(cfg));
  return registry;
}
