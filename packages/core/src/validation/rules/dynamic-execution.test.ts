import { describe, it, expect } from 'vitest';
import { NoDynamicExecutionRule } from './dynamic-execution';

describe('NoDynamicExecutionRule', () => {
  const rule = new NoDynamicExecutionRule();

  it('flags eval, Function and vm execution calls with their lines', () => {
    const code = [
      "const a = eval('1 + 1');",
      "const f = new Function('return 1');",
      "vm.runInNewContext('x');",
      "globalThis.eval('2');",
    ].join('\n');

    const result = rule.check(code);

    expect(result).toMatchObject({ passed: false, score: 0, severity: 'critical' });
    expect(result.errors).toEqual([
      'Dangerous call: eval (line 1)',
      'Dangerous call: Function (line 2)',
      'Dangerous call: runInNewContext (line 3)',
      'Dangerous call: eval (line 4)',
    ]);
  });

  it('passes ordinary code', () => {
    expect(rule.check('export const evaluate = (x: number): number => x * 2;').passed).toBe(true);
  });
});
