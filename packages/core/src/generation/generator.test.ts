import { describe, it, expect } from 'vitest';
import { MemoryLogger } from '@crucible/shared';
import { Generator, buildPrompt, buildSystemPrompt, type GenerateOptions } from './generator';
import type { TextGenerationPort, TextGenerationRequest } from './text-generator';

type Reply = (req: TextGenerationRequest, callForSeed: number) => Promise<string> | string;

class ScriptedPort implements TextGenerationPort {
  readonly modelName = 'scripted-model';
  readonly requests: TextGenerationRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private readonly callsBySeed = new Map<number, number>();

  constructor(
    private readonly reply: Reply = () => 'export const ok = true;',
    private readonly delayMs = 0,
  ) {}

  async generate(req: TextGenerationRequest): Promise<string> {
    this.requests.push(req);
    const call = this.callsBySeed.get(req.seed) ?? 0;
    this.callsBySeed.set(req.seed, call + 1);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      return await this.reply(req, call);
    } finally {
      this.inFlight--;
    }
  }

  callsFor(seed: number): number {
    return this.callsBySeed.get(seed) ?? 0;
  }
}

const options = (overrides: Partial<GenerateOptions> = {}): GenerateOptions => ({
  n: 3,
  temperatures: [0.2, 0.5, 0.8],
  baseSeed: 42,
  parallel: true,
  perCandidateTimeoutMs: 1_000,
  ...overrides,
});

const task = { taskId: 'task-1', prompt: 'Write a debounce helper' };

describe('Generator', () => {
  it('fills n slots with cycling temperatures and consecutive seeds', async () => {
    const port = new ScriptedPort();
    const pool = await new Generator({ port, runId: 'run-1' }).generate(task, options({ n: 5 }));

    expect(pool.size()).toBe(5);
    expect(pool.candidates.map((c) => c.id)).toEqual([0, 1, 2, 3, 4]);
    expect(pool.candidates.map((c) => c.temperature)).toEqual([0.2, 0.5, 0.8, 0.2, 0.5]);
    expect(pool.candidates.map((c) => c.seed)).toEqual([42, 43, 44, 45, 46]);
    expect(pool.candidates.every((c) => c.model === 'scripted-model')).toBe(true);
    expect(pool.candidates.every((c) => c.status === 'generated')).toBe(true);
  });

  it('lets the task override the base seed', async () => {
    const port = new ScriptedPort();
    const pool = await new Generator({ port, runId: 'run-1' }).generate(
      { ...task, baseSeed: 100 },
      options(),
    );

    expect(pool.candidates.map((c) => c.seed)).toEqual([100, 101, 102]);
  });

  it('unwraps fenced responses', async () => {
    const port = new ScriptedPort(() => 'Here you go:\n```ts\nexport const a = 1;\n```\n');
    const pool = await new Generator({ port, runId: 'run-1' }).generate(task, options({ n: 1 }));

    expect(pool.candidates[0].artifact).toBe('export const a = 1;');
  });

  it('retries a failed slot once', async () => {
    const port = new ScriptedPort((req, call) => {
      if (req.seed === 43 && call === 0) throw new Error('transient');
      return `export const seed = ${req.seed};`;
    });
    const pool = await new Generator({ port, runId: 'run-1' }).generate(task, options());

    expect(port.callsFor(43)).toBe(2);
    expect(pool.candidates[1].error).toBeUndefined();
    expect(pool.candidates[1].artifact).toBe('export const seed = 43;');
  });

  it('turns a slot that fails twice into an error candidate', async () => {
    const logger = new MemoryLogger();
    const port = new ScriptedPort((req) => {
      if (req.seed === 43) throw new Error('model unavailable');
      return 'export const ok = true;';
    });
    const pool = await new Generator({ port, runId: 'run-1', logger }).generate(task, options());

    expect(pool.size()).toBe(3);
    expect(pool.candidates[1]).toMatchObject({ artifact: '', error: 'model unavailable' });
    expect(port.callsFor(43)).toBe(2);
    const events = logger.eventsOfType('CandidateGenerated');
    expect(events).toHaveLength(3);
    expect(events.filter((e) => e.payload.error).map((e) => e.payload.candidateId)).toEqual([1]);
  });

  it('returns an empty pool when every slot fails', async () => {
    const port = new ScriptedPort(() => {
      throw new Error('down');
    });
    const pool = await new Generator({ port, runId: 'run-1' }).generate(task, options());

    expect(pool.size()).toBe(0);
    expect(pool.taskId).toBe('task-1');
  });

  it('treats a slot timeout as a failure', async () => {
    const port = new ScriptedPort(async (req) => {
      if (req.seed === 42) {
        await new Promise((resolve) => setTimeout(resolve, 200));
      }
      return 'export const ok = true;';
    });
    const pool = await new Generator({ port, runId: 'run-1' }).generate(
      task,
      options({ perCandidateTimeoutMs: 20 }),
    );

    expect(pool.candidates[0].error).toBe('Candidate 0 timed out after 20ms');
    expect(pool.candidates[1].error).toBeUndefined();
  });

  it('cancels a timed-out attempt before retrying it', async () => {
    let started = 0;
    let inFlight = 0;
    const port: TextGenerationPort = {
      modelName: 'slow-model',
      async generate(req) {
        started++;
        inFlight++;
        try {
          return await new Promise<string>((resolve, reject) => {
            const timer = setTimeout(() => resolve('late'), 200);
            req.signal?.addEventListener('abort', () => {
              clearTimeout(timer);
              reject(new Error('aborted'));
            });
          });
        } finally {
          inFlight--;
        }
      },
    };

    const pool = await new Generator({ port, runId: 'run-1' }).generate(
      task,
      options({ perCandidateTimeoutMs: 20 }),
    );
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(pool.size()).toBe(0);
    expect(started).toBe(6);
    expect(inFlight).toBe(0);
  });

  it('issues slots together when parallel and one at a time otherwise', async () => {
    const parallelPort = new ScriptedPort(undefined, 15);
    await new Generator({ port: parallelPort, runId: 'run-1' }).generate(task, options());

    const sequentialPort = new ScriptedPort(undefined, 5);
    await new Generator({ port: sequentialPort, runId: 'run-1' }).generate(
      task,
      options({ parallel: false }),
    );

    expect(parallelPort.maxInFlight).toBe(3);
    expect(sequentialPort.maxInFlight).toBe(1);
  });

  it('sends the same prompt and system prompt to every slot', async () => {
    const port = new ScriptedPort();
    await new Generator({ port, runId: 'run-1' }).generate(
      { ...task, taskType: 'refactor', riskTag: 'security', hints: 'AVOID eval' },
      options({ n: 2 }),
    );

    expect(port.requests.map((r) => r.prompt)).toEqual([
      'Write a debounce helper\n\nAVOID eval',
      'Write a debounce helper\n\nAVOID eval',
    ]);
    expect(port.requests[0].system).toContain('Task type: refactor\nRisk level: security');
  });
});

describe('buildPrompt', () => {
  it('appends affected files and context', () => {
    expect(
      buildPrompt({
        taskId: 't',
        prompt: 'Fix the parser',
        affectedFiles: ['src/a.ts', 'src/b.ts'],
        context: 'export type Token = string;',
      }),
    ).toBe(
      'Fix the parser\n\nAffected files: src/a.ts, src/b.ts\n\nContext:\nexport type Token = string;',
    );
  });
});

describe('buildSystemPrompt', () => {
  it('defaults the task type and risk level', () => {
    expect(buildSystemPrompt({ taskId: 't', prompt: 'p' })).toBe(
      [
        'You are an expert TypeScript code generator.',
        'Task type: general',
        'Risk level: unknown',
        '',
        'Output ONLY valid source code. No markdown fences, no explanations.',
        'Include error handling and comments inside the code.',
      ].join('\n'),
    );
  });
});
