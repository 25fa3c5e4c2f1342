import ts from 'typescript';
import { BaseRule } from './base';
import { nodeLine, parseArtifact, walk } from './ast';
import type { RuleResult } from '../types';

const DIRECT_CALLS = new Set(['eval', 'Function']);
const VM_METHODS = new Set(['runInThisContext', 'runInNewContext', 'runInContext', 'compileFunction']);

function dangerousCallee(node: ts.Node): string | undefined {
  if (!ts.isCallExpression(node) && !ts.isNewExpression(node)) {
    return undefined;
  }
  const callee = node.expression;
  if (ts.isIdentifier(callee) && DIRECT_CALLS.has(callee.text)) {
    return callee.text;
  }
  if (ts.isPropertyAccessExpression(callee)) {
    const method = callee.name.text;
    if (VM_METHODS.has(method) || (ts.isCallExpression(node) && method === 'eval')) {
      return method;
    }
  }
  return undefined;
}

/** Flags code that evaluates strings as code at run time. */
export class NoDynamicExecutionRule extends BaseRule {
  readonly name = 'no_dynamic_execution';
  readonly severity = 'critical';

  check(artifact: string): RuleResult {
    const { sourceFile, syntaxErrors } = parseArtifact(artifact);
    if (syntaxErrors.length > 0) {
      return this.ok(1, ['Skipped: syntax errors']);
    }

    const found: string[] = [];
    walk(sourceFile, (node) => {
      const callee = dangerousCallee(node);
      if (callee) {
        found.push(`Dangerous call: ${callee} (line ${nodeLine(sourceFile, node)})`);
      }
    });

    return found.length > 0 ? this.fail(0, found) : this.ok(1);
  }
}
