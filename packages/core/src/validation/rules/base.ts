import type { RuleResult, Severity, Validator } from '../types';

/**
 * Convenience base for validators: `ok()` and `fail()` build results stamped
 * with the rule's name and severity.
 */
export abstract class BaseRule implements Validator {
  abstract readonly name: string;
  abstract readonly severity: Severity;
  readonly version: string = '1';

  config(): Record<string, unknown> {
    return {};
  }

  abstract check(artifact: string): RuleResult | Promise<RuleResult>;

  protected ok(score = 1, warnings: string[] = []): RuleResult {
    return {
      ruleName: this.name,
      passed: true,
      score,
      severity: this.severity,
      errors: [],
      warnings,
      durationMs: 0,
      cached: false,
    };
  }

  protected fail(score: number, errors: string[], warnings: string[] = []): RuleResult {
    return {
      ruleName: this.name,
      passed: false,
      score,
      severity: this.severity,
      errors: errors.length > 0 ? errors : [`${this.name} failed`],
      warnings,
      durationMs: 0,
      cached: false,
    };
  }
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
