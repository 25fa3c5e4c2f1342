import { BaseRule, round2 } from './base';
import { collectDeclarations, functionComplexity, parseArtifact } from './ast';
import type { RuleResult } from '../types';

export class ComplexityRule extends BaseRule {
  readonly name = 'complexity';
  readonly severity = 'warning';

  constructor(private readonly maxComplexity = 15) {
    super();
  }

  config(): Record<string, unknown> {
    return { maxComplexity: this.maxComplexity };
  }

  check(artifact: string): RuleResult {
    const { sourceFile, syntaxErrors } = parseArtifact(artifact);
    if (syntaxErrors.length > 0) {
      return this.ok(1, ['Skipped: syntax errors']);
    }

    const high: string[] = [];
    let maxSeen = 0;

    for (const decl of collectDeclarations(sourceFile)) {
      if (!decl.fn) continue;
      const cc = functionComplexity(decl.fn);
      maxSeen = Math.max(maxSeen, cc);
      if (cc > this.maxComplexity) {
        high.push(`${decl.name}: complexity ${cc} > ${this.maxComplexity} (line ${decl.line})`);
      }
    }

    if (high.length === 0) {
      // 0 functions → 1.0, at the threshold → 0.7
      const score = maxSeen === 0 ? 1 : Math.max(0.3, 1 - (maxSeen / this.maxComplexity) * 0.3);
      return this.ok(round2(score));
    }

    return this.fail(round2(Math.max(0, 1 - high.length * 0.3)), high);
  }
}
