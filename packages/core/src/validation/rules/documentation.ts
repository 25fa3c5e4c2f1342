import { BaseRule, round2 } from './base';
import { collectDeclarations, hasJsDoc, parseArtifact } from './ast';
import type { RuleResult } from '../types';

/**
 * Functions, classes and methods should carry a JSDoc comment.
 * Score is the documented ratio; passes when at least `minRatio` are documented.
 */
export class JsDocCoverageRule extends BaseRule {
  readonly name = 'jsdoc_coverage';
  readonly severity = 'warning';

  constructor(private readonly minRatio = 0.5) {
    super();
  }

  config(): Record<string, unknown> {
    return { minRatio: this.minRatio };
  }

  check(artifact: string): RuleResult {
    const { sourceFile, syntaxErrors } = parseArtifact(artifact);
    if (syntaxErrors.length > 0) {
      return this.ok(1, ['Skipped: syntax errors']);
    }

    const declarations = collectDeclarations(sourceFile);
    if (declarations.length === 0) {
      return this.ok(1, ['No functions or classes found']);
    }

    const missing = declarations
      .filter((d) => !hasJsDoc(d.node))
      .map((d) => `Missing JSDoc: ${d.name} (line ${d.line})`);
    const ratio = (declarations.length - missing.length) / declarations.length;

    return ratio >= this.minRatio
      ? this.ok(round2(ratio), missing)
      : this.fail(round2(ratio), missing);
  }
}
