import { BaseRule } from '../rules/base';
import type { RuleResult, Severity } from '../types';

export interface StubRuleOptions {
  severity?: Severity;
  passed?: boolean;
  score?: number;
  delayMs?: number;
  throws?: string;
  rejects?: string;
  params?: Record<string, unknown>;
  transient?: boolean;
}

/** Scripted validator that counts how often it is checked */
export class StubRule extends BaseRule {
  readonly severity: Severity;
  calls = 0;

  constructor(
    readonly name: string,
    private readonly options: StubRuleOptions = {},
  ) {
    super();
    this.severity = options.severity ?? 'error';
  }

  config(): Record<string, unknown> {
    return this.options.params ?? {};
  }

  async check(): Promise<RuleResult> {
    this.calls++;
    if (this.options.throws) {
      throw new Error(this.options.throws);
    }
    if (this.options.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
    }
    if (this.options.rejects) {
      throw new Error(this.options.rejects);
    }
    const result =
      this.options.passed === false
        ? this.fail(this.options.score ?? 0, [`${this.name} found a problem`])
        : this.ok(this.options.score ?? 1);
    return this.options.transient ? { ...result, transient: true } : result;
  }
}
