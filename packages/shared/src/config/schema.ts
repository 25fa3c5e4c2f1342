import { z } from 'zod';

export const ValidationProfileNameSchema = z.enum(['fast_dev', 'balanced', 'safe_fix', 'critical']);
export type ValidationProfileName = z.infer<typeof ValidationProfileNameSchema>;

export const PricingSchema = z.object({
  inputPerMTokUsd: z.number().nonnegative().optional(),
  outputPerMTokUsd: z.number().nonnegative().optional(),
});

export const ProviderConfigSchema = z
  .object({
    type: z.enum(['openai', 'anthropic', 'fake']),
    model: z.string(),
    api_key_env: z.string().optional(),
    api_key: z.string().optional(),
    /** OpenAI-compatible servers (vLLM, Ollama, llama.cpp) are reached through a custom base URL */
    baseURL: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
    maxTokens: z.number().int().positive().optional(),
    pricing: PricingSchema.optional(),
  })
  .passthrough();

export const CandidatesConfigSchema = z.object({
  count: z.number().int().min(1).max(10).default(3),
  temperatures: z.array(z.number().min(0).max(2)).min(1).default([0.2, 0.5, 0.8]),
  baseSeed: z.number().int().default(42),
  perCandidateTimeoutMs: z.number().int().positive().default(30_000),
  parallel: z.boolean().default(true),
});

export const ValidationConfigSchema = z.object({
  /** Fixed profile; when unset the profile is chosen from the task's risk tag */
  profile: ValidationProfileNameSchema.optional(),
  failFast: z.boolean().optional(),
  maxWorkers: z.number().int().min(1).default(4),
  /** Number of candidates validated at the same time */
  parallelCandidates: z.number().int().min(1).default(3),
  externalTimeoutMs: z.number().int().positive().default(30_000),
  forbiddenModules: z.array(z.string()).optional(),
  cache: z
    .object({
      enabled: z.boolean().default(true),
      maxSize: z.number().int().min(1).default(256),
    })
    .default({}),
});

export const ScoringConfigSchema = z.object({
  weights: z.record(z.string(), z.number().nonnegative()).default({}),
  criticalErrorPenalty: z.number().min(0).max(1).default(0.5),
  allPassedBonus: z.number().min(0).max(1).default(0.15),
});

export const CorrectionConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxIterations: z.number().int().min(1).default(3),
  minScore: z.number().min(0).max(1).default(0.1),
  recurringThreshold: z.number().int().min(1).default(2),
  maxErrorsInPrompt: z.number().int().min(1).default(10),
});

export const BlackboardConfigSchema = z.object({
  maxEntries: z.number().int().min(1).default(50),
  maxGood: z.number().int().min(0).default(5),
  maxBad: z.number().int().min(0).default(8),
  maxErrorsPerValidator: z.number().int().min(1).default(3),
});

export const ReviewConfigSchema = z.object({
  enabled: z.boolean().default(false),
  riskTags: z.array(z.string()).default(['security', 'infrastructure', 'performance-critical']),
  lineThreshold: z.number().int().min(0).default(50),
  timeoutMs: z.number().int().positive().default(60_000),
  maxTokens: z.number().int().positive().default(2048),
  budgetUsd: z.number().nonnegative().default(5),
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(3),
      cooldownMs: z.number().int().min(0).default(60_000),
    })
    .default({}),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  providers: z.record(z.string(), ProviderConfigSchema).default({}),
  defaults: z
    .object({
      generator: z.string().optional(),
      reviewer: z.string().optional(),
    })
    .default({}),
  candidates: CandidatesConfigSchema.default({}),
  validation: ValidationConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  correction: CorrectionConfigSchema.default({}),
  blackboard: BlackboardConfigSchema.default({}),
  review: ReviewConfigSchema.default({}),
  outcomes: z
    .object({
      /** JSONL file that receives one outcome record per pipeline round */
      path: z.string().optional(),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      /** When set, structured events are appended here instead of printed */
      eventsPath: z.string().optional(),
    })
    .default({}),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type CandidatesConfig = z.infer<typeof CandidatesConfigSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type CorrectionConfig = z.infer<typeof CorrectionConfigSchema>;
export type BlackboardConfig = z.infer<typeof BlackboardConfigSchema>;
export type ReviewConfig = z.infer<typeof ReviewConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** Input shape accepted by the schema, where every defaulted field is optional */
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Fully defaulted configuration.
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
