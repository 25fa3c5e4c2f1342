import { ConfigError } from '@crucible/shared';
import type { ProcessRunner, RunnerContext } from '@crucible/exec';
import type { Validator } from '../types';
import { SyntaxRule } from './syntax';
import { NoForbiddenImportsRule } from './imports';
import { NoDynamicExecutionRule } from './dynamic-execution';
import { JsDocCoverageRule } from './documentation';
import { TypeAnnotationsRule } from './type-annotations';
import { ComplexityRule } from './complexity';
import { CodeLengthRule } from './code-length';
import { EslintRule, TscRule } from './external';

export { BaseRule } from './base';
export { SyntaxRule } from './syntax';
export { NoForbiddenImportsRule, DEFAULT_FORBIDDEN_MODULES } from './imports';
export { NoDynamicExecutionRule } from './dynamic-execution';
export { JsDocCoverageRule } from './documentation';
export { TypeAnnotationsRule } from './type-annotations';
export { ComplexityRule } from './complexity';
export { CodeLengthRule } from './code-length';
export { ExternalRule, EslintRule, TscRule } from './external';
export type { ExternalRuleOptions, ExternalFindings } from './external';

export interface RuleBuildOptions {
  forbiddenModules?: readonly string[];
  externalTimeoutMs?: number;
  runner?: ProcessRunner;
  context?: RunnerContext;
}

type RuleFactory = (options: RuleBuildOptions) => Validator;

const RULE_FACTORIES: Record<string, RuleFactory> = {
  syntax: () => new SyntaxRule(),
  no_forbidden_imports: (o) => new NoForbiddenImportsRule(o.forbiddenModules),
  no_dynamic_execution: () => new NoDynamicExecutionRule(),
  jsdoc_coverage: () => new JsDocCoverageRule(),
  type_annotations: () => new TypeAnnotationsRule(),
  complexity: () => new ComplexityRule(),
  code_length: () => new CodeLengthRule(),
  eslint: (o) =>
    new EslintRule({ timeoutMs: o.externalTimeoutMs, runner: o.runner, context: o.context }),
  tsc: (o) => new TscRule({ timeoutMs: o.externalTimeoutMs, runner: o.runner, context: o.context }),
};

export const IN_PROCESS_RULES = [
  'syntax',
  'no_forbidden_imports',
  'no_dynamic_execution',
  'jsdoc_coverage',
  'type_annotations',
  'complexity',
  'code_length',
] as const;

export const EXTERNAL_RULES = ['eslint', 'tsc'] as const;

export function availableRules(): string[] {
  return Object.keys(RULE_FACTORIES);
}

/**
 * Instantiates rules by name, in the given order.
 * @throws {ConfigError} For a name with no registered rule
 */
export function buildRules(names: readonly string[], options: RuleBuildOptions = {}): Validator[] {
  return names.map((name) => {
    const factory = RULE_FACTORIES[name];
    if (!factory) {
      throw new ConfigError(
        `Unknown validation rule "${name}". Available: ${availableRules().join(', ')}`,
      );
    }
    return factory(options);
  });
}
