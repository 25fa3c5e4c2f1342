import {
  errorMessage,
  mapWithConcurrency,
  stripCodeFence,
  withTimeout,
  type CandidatesConfig,
  type Logger,
} from '@crucible/shared';
import { Candidate } from './candidate';
import { CandidatePool } from './pool';
import type { TextGenerationPort } from './text-generator';

/**
 * What to generate. `hints` carries corrective feedback between rounds.
 */
export interface GenerationTask {
  taskId: string;
  prompt: string;
  taskType?: string;
  riskTag?: string;
  context?: string;
  affectedFiles?: string[];
  hints?: string;
  /** Overrides the configured base seed */
  baseSeed?: number;
}

export type GenerateOptions = Pick<
  CandidatesConfig,
  'temperatures' | 'baseSeed' | 'parallel' | 'perCandidateTimeoutMs'
> & { n: number };

export interface GeneratorDeps {
  port: TextGenerationPort;
  runId: string;
  logger?: Logger;
}

export function buildPrompt(task: GenerationTask): string {
  const parts = [task.prompt];
  if (task.affectedFiles && task.affectedFiles.length > 0) {
    parts.push(`\nAffected files: ${task.affectedFiles.join(', ')}`);
  }
  if (task.context) {
    parts.push(`\nContext:\n${task.context}`);
  }
  if (task.hints) {
    parts.push(`\n${task.hints}`);
  }
  return parts.join('\n');
}

export function buildSystemPrompt(task: GenerationTask): string {
  return [
    'You are an expert TypeScript code generator.',
    `Task type: ${task.taskType ?? 'general'}`,
    `Risk level: ${task.riskTag ?? 'unknown'}`,
    '',
    'Output ONLY valid source code. No markdown fences, no explanations.',
    'Include error handling and comments inside the code.',
  ].join('\n');
}

/**
 * Produces `n` candidate artifacts for a task, one per slot, each with its own
 * temperature and seed.
 */
export class Generator {
  constructor(private readonly deps: GeneratorDeps) {}

  async generate(task: GenerationTask, options: GenerateOptions): Promise<CandidatePool> {
    const pool = new CandidatePool(task.taskId);
    const prompt = buildPrompt(task);
    const system = buildSystemPrompt(task);
    const slots = Array.from({ length: options.n }, (_, i) => i);

    void this.deps.logger?.info(`Generating ${options.n} candidates for ${task.taskId}`);

    const candidates = await mapWithConcurrency(
      slots,
      options.parallel ? options.n : 1,
      (index) => this.generateSlot(task, index, prompt, system, options),
    );

    if (candidates.every((c) => c.error !== undefined)) {
      void this.deps.logger?.warn(`Every generation slot failed for ${task.taskId}`);
      return pool;
    }

    for (const candidate of candidates) {
      pool.add(candidate);
    }
    return pool;
  }

  private async generateSlot(
    task: GenerationTask,
    index: number,
    prompt: string,
    system: string,
    options: GenerateOptions,
  ): Promise<Candidate> {
    const temperature = options.temperatures[index % options.temperatures.length];
    const seed = (task.baseSeed ?? options.baseSeed) + index;
    const { port } = this.deps;
    const start = Date.now();

    let artifact = '';
    let error: string | undefined;
    for (let attempt = 1; attempt <= 2; attempt++) {
      // A timed-out attempt is cancelled before the retry starts
      const abort = new AbortController();
      try {
        const raw = await withTimeout(
          port.generate({ prompt, system, temperature, seed, signal: abort.signal }),
          options.perCandidateTimeoutMs,
          `Candidate ${index} timed out after ${options.perCandidateTimeoutMs}ms`,
        );
        artifact = stripCodeFence(raw);
        error = undefined;
        break;
      } catch (err) {
        abort.abort();
        error = errorMessage(err);
        void this.deps.logger?.warn(`Candidate ${index} attempt ${attempt} failed: ${error}`);
      }
    }

    const candidate = new Candidate({
      id: index,
      taskId: task.taskId,
      artifact,
      temperature,
      seed,
      model: port.modelName,
      generationTimeMs: Date.now() - start,
      error,
    });

    if (this.deps.logger) {
      await this.deps.logger.log({
        type: 'CandidateGenerated',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: this.deps.runId,
        payload: {
          taskId: task.taskId,
          candidateId: index,
          temperature,
          seed,
          model: port.modelName,
          durationMs: candidate.generationTimeMs,
          error,
        },
      });
    }

    return candidate;
  }
}
