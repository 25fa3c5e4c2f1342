import {
  ConfigError,
  ConsoleLogger,
  JsonlLogger,
  type Config,
  type Logger,
} from '@crucible/shared';
import type { ProcessRunner } from '@crucible/exec';
import { CostTracker } from '../cost/tracker';
import { ProviderTextGenerator } from '../generation/text-generator';
import { JsonlOutcomeRecorder, type OutcomeRecorder } from '../outcomes/recorder';
import { createDefaultRegistry, type ProviderRegistry } from '../registry';
import { Pipeline } from './pipeline';

export interface CreatePipelineDeps {
  runId?: string;
  logger?: Logger;
  /** Defaults to a registry with the built-in provider types */
  registry?: ProviderRegistry;
  /** Generation spend; hand the same tracker to a custom registry */
  generationCosts?: CostTracker;
  outcomes?: OutcomeRecorder;
  processRunner?: ProcessRunner;
  now?: () => number;
}

function defaultLogger(config: Config): Logger {
  return config.logging.eventsPath
    ? new JsonlLogger(config.logging.eventsPath)
    : new ConsoleLogger(config.logging.level);
}

/**
 * Builds a pipeline from configuration: the generator adapter from
 * `defaults.generator` (or the first provider), the reviewer adapter from
 * `defaults.reviewer` when review is enabled, and a JSONL outcome recorder
 * when `outcomes.path` is set.
 *
 * @throws {ConfigError} If no provider is configured for generation
 */
export function createPipeline(config: Config, deps: CreatePipelineDeps = {}): Pipeline {
  const runId = deps.runId ?? new Date().toISOString().replace(/[:.]/g, '-');
  const logger = deps.logger ?? defaultLogger(config);
  const generationCosts = deps.generationCosts ?? new CostTracker(config);
  const registry = deps.registry ?? createDefaultRegistry(config, generationCosts);

  const generatorId = config.defaults.generator ?? Object.keys(config.providers)[0];
  if (!generatorId) {
    throw new ConfigError('No generator provider configured');
  }
  const generatorAdapter = registry.getAdapter(generatorId);
  const port = new ProviderTextGenerator(generatorAdapter, {
    runId,
    logger,
    maxTokens: config.providers[generatorId]?.maxTokens,
    readTimeoutMs: config.candidates.perCandidateTimeoutMs,
  });

  const reviewerId = config.review.enabled ? config.defaults.reviewer : undefined;
  const reviewerAdapter = reviewerId
    ? registry.getAdapter(reviewerId, { trackCost: false })
    : undefined;
  if (config.review.enabled && !reviewerAdapter) {
    void logger.warn('Review is enabled but defaults.reviewer is not set; reviews will be skipped');
  }

  const outcomes =
    deps.outcomes ??
    (config.outcomes.path ? new JsonlOutcomeRecorder(config.outcomes.path, logger) : undefined);

  return new Pipeline(config, {
    port,
    runId,
    logger,
    reviewerAdapter,
    reviewerProviderId: reviewerId,
    generationCosts,
    outcomes,
    processRunner: deps.processRunner,
    now: deps.now,
  });
}
