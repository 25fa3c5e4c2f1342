import { describe, it, expect } from 'vitest';
import { MemoryLogger } from '@crucible/shared';
import { RuleRunner } from './runner';
import { ValidationCache } from './cache';
import { StubRule } from './__fixtures__/stub-rule';
import { EslintRule } from './rules/external';
import type { RuleResult, Validator } from './types';

const names = (results: RuleResult[]) => results.map((r) => r.ruleName);

class SyncThrowingRule implements Validator {
  readonly name = 'sync_thrower';
  readonly severity = 'warning';
  readonly version = '1';
  config() {
    return {};
  }
  check(): RuleResult {
    throw new Error('kaboom');
  }
}

describe('RuleRunner', () => {
  const mixed = () => [
    new StubRule('slow_pass', { delayMs: 30 }),
    new StubRule('fast_fail', { passed: false, score: 0.4 }),
    new StubRule('crasher', { rejects: 'boom', delayMs: 5 }),
    new SyncThrowingRule(),
    new StubRule('medium_pass', { delayMs: 10, score: 0.8 }),
  ];

  it.each([1, 2, 4])('keeps input order with maxWorkers=%i', async (maxWorkers) => {
    const results = await new RuleRunner().run('code', mixed(), { maxWorkers });

    expect(names(results)).toEqual([
      'slow_pass',
      'fast_fail',
      'crasher',
      'sync_thrower',
      'medium_pass',
    ]);
    expect(results.map((r) => r.passed)).toEqual([true, false, false, false, true]);
  });

  it('turns a crashing rule into a failed critical result without stopping siblings', async () => {
    const logger = new MemoryLogger();
    const results = await new RuleRunner({ logger }).run('code', mixed());

    expect(results[2]).toMatchObject({
      ruleName: 'crasher',
      passed: false,
      score: 0,
      severity: 'critical',
      errors: ['Rule crashed: boom'],
    });
    expect(results[3].errors).toEqual(['Rule crashed: kaboom']);
    expect(results[4].score).toBe(0.8);
    expect(logger.messages.filter((m) => m.level === 'error').map((m) => m.message)).toEqual(
      expect.arrayContaining(['Rule crasher crashed', 'Rule sync_thrower crashed']),
    );
  });

  it('measures each rule', async () => {
    const [result] = await new RuleRunner().run('code', [new StubRule('slow', { delayMs: 20 })]);

    expect(result.durationMs).toBeGreaterThanOrEqual(15);
    expect(result.cached).toBe(false);
  });

  it('returns nothing for an empty rule list', async () => {
    expect(await new RuleRunner().run('code', [])).toEqual([]);
  });

  describe('failFast', () => {
    it('runs critical rules first and stops at the first critical failure', async () => {
      const warning = new StubRule('style', { severity: 'warning' });
      const critical = new StubRule('syntax', { severity: 'critical', passed: false });
      const error = new StubRule('length', { severity: 'error' });

      const results = await new RuleRunner().run('code', [warning, critical, error], {
        failFast: true,
      });

      expect(names(results)).toEqual(['syntax']);
      expect(warning.calls).toBe(0);
      expect(error.calls).toBe(0);
    });

    it('reports every rule in input order when nothing critical fails', async () => {
      const results = await new RuleRunner().run(
        'code',
        [
          new StubRule('style', { severity: 'warning' }),
          new StubRule('syntax', { severity: 'critical' }),
          new StubRule('length', { severity: 'error', passed: false }),
        ],
        { failFast: true },
      );

      expect(names(results)).toEqual(['style', 'syntax', 'length']);
    });
  });

  describe('with a cache', () => {
    it('serves the second run from the cache without re-checking', async () => {
      const cache = new ValidationCache();
      const runner = new RuleRunner({ cache });
      const rule = new StubRule('counted', { score: 0.9 });

      const [first] = await runner.run('const a = 1;', [rule]);
      const [second] = await runner.run('const a = 1;', [rule]);

      expect(rule.calls).toBe(1);
      expect(first.cached).toBe(false);
      expect(second).toMatchObject({ ruleName: 'counted', score: 0.9, cached: true, durationMs: 0 });
      expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
    });

    it('re-checks when the rule parameters change', async () => {
      const runner = new RuleRunner({ cache: new ValidationCache() });
      const strict = new StubRule('param', { params: { max: 10 } });
      const lenient = new StubRule('param', { params: { max: 20 } });

      await runner.run('code', [strict]);
      await runner.run('code', [lenient]);

      expect(strict.calls).toBe(1);
      expect(lenient.calls).toBe(1);
    });

    it('keys on the exact text, leading blank lines included', async () => {
      const runner = new RuleRunner({ cache: new ValidationCache() });
      const rule = new StubRule('lines');

      await runner.run('const a = 1;', [rule]);
      const [shifted] = await runner.run('\n\nconst a = 1;', [rule]);

      expect(rule.calls).toBe(2);
      expect(shifted.cached).toBe(false);
    });

    it('re-runs transient results such as a tool timeout', async () => {
      const cache = new ValidationCache();
      const runner = new RuleRunner({ cache });
      const flaky = new StubRule('external', { passed: false, score: 0.5, transient: true });

      await runner.run('code', [flaky]);
      const [again] = await runner.run('code', [flaky]);

      expect(flaky.calls).toBe(2);
      expect(again.cached).toBe(false);
      expect(cache.stats().size).toBe(0);
    });

    it('does not serve a timeout once the external timeout is raised', async () => {
      const runner = new RuleRunner({ cache: new ValidationCache() });
      const tool = { command: process.execPath, args: ['-e', 'setTimeout(() => {}, 300)'] };
      const quick = new EslintRule({ ...tool, timeoutMs: 50 });
      const patient = new EslintRule({ ...tool, timeoutMs: 5_000 });

      const [first] = await runner.run('code', [quick]);
      const [second] = await runner.run('code', [patient]);

      expect(first.errors).toEqual(['eslint: timed out after 50ms']);
      expect(second).toMatchObject({ passed: true, cached: false, errors: [] });
    });

    it('does not cache crashes', async () => {
      const runner = new RuleRunner({ cache: new ValidationCache() });
      const crasher = new StubRule('crasher', { throws: 'boom' });

      await runner.run('code', [crasher]);
      await runner.run('code', [crasher]);

      expect(crasher.calls).toBe(2);
    });
  });
});
