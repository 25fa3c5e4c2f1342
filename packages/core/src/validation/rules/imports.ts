import ts from 'typescript';
import { BaseRule } from './base';
import { parseArtifact, walk } from './ast';
import type { RuleResult } from '../types';

export const DEFAULT_FORBIDDEN_MODULES: readonly string[] = [
  'child_process',
  'cluster',
  'dgram',
  'fs',
  'net',
  'os',
  'vm',
  'worker_threads',
];

/** `node:fs/promises` and `fs/promises` both resolve to `fs` */
function moduleRoot(specifier: string): string {
  const bare = specifier.startsWith('node:') ? specifier.slice('node:'.length) : specifier;
  return bare.split('/')[0];
}

function specifierOf(node: ts.Node): string | undefined {
  if (
    (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) &&
    node.moduleSpecifier &&
    ts.isStringLiteral(node.moduleSpecifier)
  ) {
    return node.moduleSpecifier.text;
  }
  if (
    ts.isImportEqualsDeclaration(node) &&
    ts.isExternalModuleReference(node.moduleReference) &&
    ts.isStringLiteral(node.moduleReference.expression)
  ) {
    return node.moduleReference.expression.text;
  }
  if (ts.isCallExpression(node)) {
    const [first] = node.arguments;
    const isRequire = ts.isIdentifier(node.expression) && node.expression.text === 'require';
    const isDynamicImport = node.expression.kind === ts.SyntaxKind.ImportKeyword;
    if ((isRequire || isDynamicImport) && first && ts.isStringLiteralLike(first)) {
      return first.text;
    }
  }
  return undefined;
}

/**
 * Rejects imports of modules that reach the host system. Covers static
 * imports, re-exports, `import x = require()`, `require()` and `import()`.
 */
export class NoForbiddenImportsRule extends BaseRule {
  readonly name = 'no_forbidden_imports';
  readonly severity = 'error';
  private readonly forbidden: ReadonlySet<string>;

  constructor(modules: readonly string[] = DEFAULT_FORBIDDEN_MODULES) {
    super();
    this.forbidden = new Set(modules);
  }

  config(): Record<string, unknown> {
    return { modules: [...this.forbidden].sort() };
  }

  check(artifact: string): RuleResult {
    const { sourceFile, syntaxErrors } = parseArtifact(artifact);
    if (syntaxErrors.length > 0) {
      return this.ok(1, ['Skipped: syntax errors']);
    }

    const found: string[] = [];
    walk(sourceFile, (node) => {
      const specifier = specifierOf(node);
      if (specifier === undefined) return;
      const root = moduleRoot(specifier);
      if (this.forbidden.has(root) && !found.includes(root)) {
        found.push(root);
      }
    });

    if (found.length > 0) {
      return this.fail(
        0,
        found.map((m) => `Forbidden import: ${m}`),
      );
    }
    return this.ok(1);
  }
}
