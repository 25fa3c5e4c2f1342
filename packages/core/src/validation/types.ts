export type Severity = 'critical' | 'error' | 'warning' | 'info';

/** Execution order for fail-fast runs: most severe first */
export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'error', 'warning', 'info'];

/**
 * Outcome of one validator against one artifact.
 * A failed result carries at least one error; a passing one may carry warnings.
 */
export interface RuleResult {
  ruleName: string;
  passed: boolean;
  /** 0 (worst) to 1 (perfect) */
  score: number;
  severity: Severity;
  errors: string[];
  warnings: string[];
  durationMs: number;
  cached: boolean;
  /** Depends on the environment rather than the artifact (tool missing, timed out); never cached */
  transient?: boolean;
}

/**
 * An independent check over artifact text. The rule runner depends only on
 * this interface; new checks are added by implementing it.
 */
export interface Validator {
  readonly name: string;
  readonly severity: Severity;
  /** Bumped whenever the check's behaviour changes, so cached results are dropped */
  readonly version: string;
  /** Effective parameters; part of the cache key */
  config(): Record<string, unknown>;
  check(artifact: string): RuleResult | Promise<RuleResult>;
}
