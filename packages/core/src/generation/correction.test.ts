import { describe, it, expect } from 'vitest';
import { EmptyPoolError, MemoryLogger } from '@crucible/shared';
import { Blackboard } from './blackboard';
import type { ValidationScore } from './candidate';
import {
  SelfCorrectionLoop,
  buildCorrectionPrompt,
  collectErrors,
  type CorrectionOptions,
  type CorrectionRound,
  type RoundOutcome,
} from './correction';
import type { GenerationTask } from './generator';
import { makeCandidate, score } from './__fixtures__/candidates';

function outcome(value: number, scores: ValidationScore[], artifact = `// score ${value}`): RoundOutcome {
  const best = makeCandidate(0, scores, { artifact });
  return {
    best,
    score: value,
    allPassed: best.allPassed,
    artifact,
    nCandidates: 3,
    generationMs: 5,
    validationMs: 3,
    totalMs: 9,
  };
}

const passing = (value = 1) => outcome(value, [score('syntax')]);
const failing = (value: number, artifact?: string) =>
  outcome(
    value,
    [
      score('syntax'),
      score('complexity', { passed: false, errors: ['run: complexity 17 > 15 (line 1)'] }),
    ],
    artifact,
  );

class ScriptedRound implements CorrectionRound<GenerationTask, RoundOutcome> {
  readonly tasks: GenerationTask[] = [];

  constructor(private readonly script: Array<RoundOutcome | Error>) {}

  async run(task: GenerationTask): Promise<RoundOutcome> {
    this.tasks.push(task);
    const next = this.script[Math.min(this.tasks.length - 1, this.script.length - 1)];
    if (next instanceof Error) throw next;
    return next;
  }
}

const options: CorrectionOptions = {
  maxIterations: 3,
  minScore: 0.1,
  recurringThreshold: 2,
  maxErrorsInPrompt: 10,
};

const task: GenerationTask = { taskId: 'task-1', prompt: 'Write a retry helper' };

function loopFor(round: ScriptedRound, extra: { logger?: MemoryLogger; onIteration?: () => void } = {}) {
  return new SelfCorrectionLoop(round, options, {
    blackboard: new Blackboard(),
    runId: 'run-1',
    ...extra,
  });
}

describe('SelfCorrectionLoop', () => {
  it('stops after one iteration when the first round passes', async () => {
    const round = new ScriptedRound([passing()]);
    const result = await loopFor(round).run(task);

    expect(result.totalIterations).toBe(1);
    expect(result.corrected).toBe(false);
    expect(result.stopReason).toBe('all_passed');
    expect(result.improvement).toBe(0);
    expect(round.tasks.map((t) => t.taskId)).toEqual(['task-1_iter1']);
  });

  it('corrects on the second iteration using the validation feedback', async () => {
    const round = new ScriptedRound([failing(0.4, 'function run() {}'), passing(1)]);
    const result = await loopFor(round).run(task);

    expect(result.totalIterations).toBe(2);
    expect(result.corrected).toBe(true);
    expect(result.stopReason).toBe('all_passed');
    expect(result.initialScore).toBe(0.4);
    expect(result.finalScore).toBe(1);
    expect(result.finalScore).toBeGreaterThan(result.initialScore);
    expect(result.allPassed).toBe(true);

    const second = round.tasks[1];
    expect(second.taskId).toBe('task-1_iter2');
    expect(second.prompt).toContain('--- CORRECTION ATTEMPT 2/3 ---');
    expect(second.prompt).toContain('```\nfunction run() {}\n```');
    expect(second.prompt).toContain('  - [complexity] run: complexity 17 > 15 (line 1)');
    expect(second.prompt).toContain('AVOID these issues found in previous attempts:');
  });

  it('does not correct a round below the minimum score', async () => {
    const round = new ScriptedRound([failing(0.05), passing()]);
    const result = await loopFor(round).run(task);

    expect(result.totalIterations).toBe(1);
    expect(result.stopReason).toBe('below_min_score');
    expect(result.corrected).toBe(false);
  });

  it('keeps the best round across all iterations', async () => {
    const round = new ScriptedRound([
      failing(0.5, 'first'),
      failing(0.6, 'second'),
      failing(0.4, 'third'),
    ]);
    const result = await loopFor(round).run(task);

    expect(result.totalIterations).toBe(3);
    expect(result.stopReason).toBe('max_iterations');
    expect(result.bestArtifact).toBe('second');
    expect(result.bestScore).toBe(0.6);
    expect(result.attempts.map((a) => a.score)).toEqual([0.5, 0.6, 0.4]);
    expect(result.improvement).toBeCloseTo(0.1);
    expect(result.corrected).toBe(true);
  });

  it('puts validators that keep failing at the top of the hints', async () => {
    const round = new ScriptedRound([failing(0.5), failing(0.5), failing(0.5)]);
    await loopFor(round).run(task);

    expect(round.tasks[1].prompt).not.toContain('RECURRING ISSUES');
    expect(round.tasks[2].prompt).toContain(
      '--- CORRECTION ATTEMPT 3/3 ---\nRECURRING ISSUES (these keep appearing, pay special attention):\n  ! complexity (failed 2x)',
    );
  });

  it('stops when the winner failed without any error to feed back', async () => {
    const round = new ScriptedRound([outcome(0.5, []), passing()]);
    const result = await loopFor(round).run(task);

    expect(result.stopReason).toBe('no_errors');
    expect(result.totalIterations).toBe(1);
  });

  it('logs and ignores a throwing iteration callback', async () => {
    const logger = new MemoryLogger();
    const round = new ScriptedRound([failing(0.5), passing()]);
    const result = await loopFor(round, {
      logger,
      onIteration: () => {
        throw new Error('listener gone');
      },
    }).run(task);

    expect(result.totalIterations).toBe(2);
    expect(logger.messages.filter((m) => m.level === 'warn').map((m) => m.message)).toEqual([
      'onIteration callback failed: listener gone',
      'onIteration callback failed: listener gone',
    ]);
  });

  it('emits an event pair per iteration', async () => {
    const logger = new MemoryLogger();
    await loopFor(new ScriptedRound([failing(0.5), passing()]), { logger }).run(task);

    expect(logger.eventsOfType('CorrectionIterationStarted').map((e) => e.payload.hintCount)).toEqual([
      0, 2,
    ]);
    expect(logger.eventsOfType('CorrectionIterationFinished').map((e) => e.payload)).toEqual([
      { taskId: 'task-1', iteration: 1, score: 0.5, allPassed: false, errorCount: 1 },
      { taskId: 'task-1', iteration: 2, score: 1, allPassed: true, errorCount: 0 },
    ]);
  });

  it('ends early with the best so far when a later round throws', async () => {
    const logger = new MemoryLogger();
    const round = new ScriptedRound([failing(0.5, 'kept'), new EmptyPoolError('task-1_iter2')]);
    const result = await loopFor(round, { logger }).run(task);

    expect(result.stopReason).toBe('pipeline_error');
    expect(result.bestArtifact).toBe('kept');
    expect(logger.messages.some((m) => m.level === 'error')).toBe(true);
  });

  it('propagates a failure of the first round', async () => {
    const round = new ScriptedRound([new EmptyPoolError('task-1_iter1')]);

    await expect(loopFor(round).run(task)).rejects.toBeInstanceOf(EmptyPoolError);
  });
});

describe('collectErrors', () => {
  it('prefixes errors and warnings of failed validators', () => {
    const candidate = makeCandidate(0, [
      score('syntax', { warnings: ['ignored'] }),
      score('jsdoc_coverage', {
        passed: false,
        errors: ['Missing JSDoc: run (line 1)'],
        warnings: ['coverage 0.00'],
      }),
    ]);

    expect(collectErrors(candidate)).toEqual([
      '[jsdoc_coverage] Missing JSDoc: run (line 1)',
      '[jsdoc_coverage] WARNING: coverage 0.00',
    ]);
  });
});

describe('buildCorrectionPrompt', () => {
  it('lays out the corrective request', () => {
    expect(
      buildCorrectionPrompt({
        originalPrompt: 'Write add',
        previousArtifact: 'const x = ;',
        errors: ['[syntax] SyntaxError at line 1: Expression expected.'],
        iteration: 2,
        maxIterations: 3,
      }),
    ).toBe(
      [
        'Write add',
        '',
        '--- CORRECTION ATTEMPT 2/3 ---',
        'Your previous code had validation errors. Fix them.',
        '',
        'Previous code:',
        '```',
        'const x = ;',
        '```',
        '',
        'Validation errors found:',
        '  - [syntax] SyntaxError at line 1: Expression expected.',
        '',
        'Generate corrected code that fixes ALL the above errors.',
        'Output ONLY the corrected source code.',
      ].join('\n'),
    );
  });

  it('caps the number of listed errors', () => {
    const prompt = buildCorrectionPrompt({
      originalPrompt: 'p',
      previousArtifact: 'a',
      errors: ['e1', 'e2', 'e3'],
      iteration: 2,
      maxIterations: 3,
      maxErrors: 2,
    });

    expect(prompt).toContain('  - e1\n  - e2\n\n');
    expect(prompt).not.toContain('e3');
  });

  it('puts the hints right under the attempt header', () => {
    const prompt = buildCorrectionPrompt({
      originalPrompt: 'Write add',
      previousArtifact: 'a',
      errors: ['e1'],
      iteration: 2,
      maxIterations: 3,
      hints: 'RECURRING ISSUES (these keep appearing, pay special attention):\n  ! e1\n',
    });

    const lines = prompt.split('\n');
    expect(lines.slice(2, 6)).toEqual([
      '--- CORRECTION ATTEMPT 2/3 ---',
      'RECURRING ISSUES (these keep appearing, pay special attention):',
      '  ! e1',
      '',
    ]);
    expect(prompt.indexOf('RECURRING ISSUES')).toBeLessThan(
      prompt.indexOf('Your previous code had validation errors.'),
    );
  });
});
