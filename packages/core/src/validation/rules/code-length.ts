import { BaseRule, round2 } from './base';
import type { RuleResult } from '../types';

/** Generated code should be neither empty nor excessively long. */
export class CodeLengthRule extends BaseRule {
  readonly name = 'code_length';
  readonly severity = 'error';

  constructor(
    private readonly minLines = 1,
    private readonly maxLines = 500,
  ) {
    super();
  }

  config(): Record<string, unknown> {
    return { minLines: this.minLines, maxLines: this.maxLines };
  }

  check(artifact: string): RuleResult {
    const trimmed = artifact.trim();
    const n = trimmed === '' ? 0 : trimmed.split(/\r?\n/).length;

    if (n < this.minLines) {
      return this.fail(0, [`Code is empty or too short (${n} lines)`]);
    }
    if (n > this.maxLines) {
      const score = Math.max(0.2, 1 - (n - this.maxLines) / this.maxLines);
      return this.fail(round2(score), [`Code too long: ${n} lines (max ${this.maxLines})`]);
    }
    if (n < 3) {
      return this.ok(0.7, [`Very short code (${n} lines)`]);
    }
    return this.ok(1);
  }
}
