import type { ValidationProfileName } from '@crucible/shared';
import { EXTERNAL_RULES, IN_PROCESS_RULES } from './rules';

/** Validator name (or name prefix) to relative weight */
export type ScoringWeights = Readonly<Record<string, number>>;

export interface ValidationProfile {
  name: ValidationProfileName;
  rules: readonly string[];
  failFast: boolean;
  /** When false, rules run one at a time regardless of maxWorkers */
  parallel: boolean;
  weights: ScoringWeights;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  syntax: 10,
  no_dynamic_execution: 8,
  no_forbidden_imports: 5,
  code_length: 2,
  complexity: 1.5,
  type_annotations: 1,
  jsdoc_coverage: 0.5,
  eslint: 3,
  tsc: 2,
  cross_review: 4,
};

export const VALIDATION_PROFILES: Readonly<Record<ValidationProfileName, ValidationProfile>> = {
  fast_dev: {
    name: 'fast_dev',
    rules: ['syntax'],
    failFast: false,
    parallel: true,
    weights: { syntax: 10 },
  },
  balanced: {
    name: 'balanced',
    rules: ['syntax', 'no_forbidden_imports', 'no_dynamic_execution', 'complexity', 'code_length'],
    failFast: false,
    parallel: true,
    weights: DEFAULT_WEIGHTS,
  },
  safe_fix: {
    name: 'safe_fix',
    rules: IN_PROCESS_RULES,
    failFast: true,
    parallel: true,
    weights: { ...DEFAULT_WEIGHTS, complexity: 2, no_forbidden_imports: 6 },
  },
  critical: {
    name: 'critical',
    rules: [...IN_PROCESS_RULES, ...EXTERNAL_RULES],
    failFast: true,
    parallel: false,
    weights: { ...DEFAULT_WEIGHTS, complexity: 2, no_dynamic_execution: 10, eslint: 4, tsc: 3 },
  },
};

/**
 * Picks a profile from a task's risk tag: security-sensitive work gets every
 * check, throwaway work only the syntax check.
 */
export function resolveProfile(riskTag: string | undefined): ValidationProfileName {
  switch (riskTag?.toLowerCase()) {
    case 'security':
    case 'critical':
      return 'critical';
    case 'infrastructure':
    case 'high':
      return 'safe_fix';
    case 'low':
      return 'fast_dev';
    default:
      return 'balanced';
  }
}

export function getProfile(name: ValidationProfileName): ValidationProfile {
  return VALIDATION_PROFILES[name];
}
