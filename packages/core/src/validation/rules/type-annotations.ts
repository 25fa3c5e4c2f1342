import { BaseRule, round2 } from './base';
import { collectDeclarations, parseArtifact } from './ast';
import type { RuleResult } from '../types';

const MAX_REPORTED = 5;

/**
 * Named functions and methods should declare a return type. Underscore-prefixed
 * helpers are exempt.
 */
export class TypeAnnotationsRule extends BaseRule {
  readonly name = 'type_annotations';
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

    const functions = collectDeclarations(sourceFile).filter(
      (d) => d.fn !== undefined && !d.name.startsWith('_'),
    );
    if (functions.length === 0) {
      return this.ok(1, ['No functions found']);
    }

    const missing = functions
      .filter((d) => d.fn?.type === undefined)
      .map((d) => `No return type: ${d.name} (line ${d.line})`);
    const ratio = (functions.length - missing.length) / functions.length;
    const reported = missing.slice(0, MAX_REPORTED);

    return ratio >= this.minRatio
      ? this.ok(round2(ratio), reported)
      : this.fail(round2(ratio), reported);
  }
}
