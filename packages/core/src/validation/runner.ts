import { errorMessage, mapWithConcurrency, type Logger } from '@crucible/shared';
import type { ValidationCache } from './cache';
import { hashArtifact, ruleIdentity } from './cache';
import { SEVERITY_ORDER, type RuleResult, type Validator } from './types';

export interface RunOptions {
  /** Run sequentially in severity order and stop after the first failed critical result */
  failFast?: boolean;
  /** Upper bound on rules checked at the same time; 1 means sequential */
  maxWorkers?: number;
}

export interface RuleRunnerOptions {
  cache?: ValidationCache;
  logger?: Logger;
}

/**
 * Applies validators to an artifact. One result per rule that ran, always in
 * the order the rules were given. A rule that throws becomes a failed critical
 * result; its siblings still run. Crashed and transient results are never cached.
 */
export class RuleRunner {
  private readonly cache?: ValidationCache;
  private readonly logger?: Logger;

  constructor(options: RuleRunnerOptions = {}) {
    this.cache = options.cache;
    this.logger = options.logger;
  }

  async run(
    artifact: string,
    rules: readonly Validator[],
    options: RunOptions = {},
  ): Promise<RuleResult[]> {
    if (rules.length === 0) {
      return [];
    }
    const artifactHash = this.cache ? hashArtifact(artifact) : '';

    if (options.failFast) {
      return this.runFailFast(artifact, artifactHash, rules);
    }

    const workers = Math.max(1, options.maxWorkers ?? 4);
    return mapWithConcurrency(rules, workers, (rule) => this.runOne(artifact, artifactHash, rule));
  }

  private async runFailFast(
    artifact: string,
    artifactHash: string,
    rules: readonly Validator[],
  ): Promise<RuleResult[]> {
    const order = rules
      .map((rule, index) => ({ rule, index }))
      .sort(
        (a, b) =>
          SEVERITY_ORDER.indexOf(a.rule.severity) - SEVERITY_ORDER.indexOf(b.rule.severity) ||
          a.index - b.index,
      );

    const byIndex = new Map<number, RuleResult>();
    for (const { rule, index } of order) {
      const result = await this.runOne(artifact, artifactHash, rule);
      byIndex.set(index, result);
      if (!result.passed && result.severity === 'critical') {
        void this.logger?.debug(`failFast: stopping after ${rule.name}`);
        break;
      }
    }

    return [...byIndex.entries()].sort(([a], [b]) => a - b).map(([, result]) => result);
  }

  private async runOne(artifact: string, artifactHash: string, rule: Validator): Promise<RuleResult> {
    const ruleId = this.cache ? ruleIdentity(rule) : '';
    const hit = this.cache?.get(artifactHash, ruleId);
    if (hit) {
      return hit;
    }

    const start = performance.now();
    let result: RuleResult;
    let crashed = false;
    try {
      result = { ...(await rule.check(artifact)) };
    } catch (err) {
      crashed = true;
      void this.logger?.error(
        err instanceof Error ? err : new Error(String(err)),
        `Rule ${rule.name} crashed`,
      );
      result = {
        ruleName: rule.name,
        passed: false,
        score: 0,
        severity: 'critical',
        errors: [`Rule crashed: ${errorMessage(err)}`],
        warnings: [],
        durationMs: 0,
        cached: false,
      };
    }
    result.durationMs = performance.now() - start;
    result.cached = false;

    if (this.cache && !crashed && !result.transient) {
      this.cache.put(artifactHash, ruleId, result);
    }
    return result;
  }
}
