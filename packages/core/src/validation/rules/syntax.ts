import { BaseRule } from './base';
import { parseArtifact } from './ast';
import type { RuleResult } from '../types';

/** Artifact must parse as TypeScript. */
export class SyntaxRule extends BaseRule {
  readonly name = 'syntax';
  readonly severity = 'critical';

  check(artifact: string): RuleResult {
    const { syntaxErrors } = parseArtifact(artifact);
    if (syntaxErrors.length === 0) {
      return this.ok(1);
    }
    return this.fail(
      0,
      syntaxErrors.map((e) => `SyntaxError at line ${e.line}: ${e.message}`),
    );
  }
}
