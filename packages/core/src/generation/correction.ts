import {
  errorMessage,
  type CorrectionConfig,
  type CorrectionIterationFinished,
  type CorrectionIterationStarted,
  type Logger,
} from '@crucible/shared';
import type { Blackboard } from './blackboard';
import type { Candidate } from './candidate';
import type { GenerationTask } from './generator';

/**
 * The parts of a pipeline round the loop reads.
 */
export interface RoundOutcome {
  best: Candidate;
  score: number;
  allPassed: boolean;
  artifact: string;
  nCandidates: number;
  generationMs: number;
  validationMs: number;
  totalMs: number;
}

export interface CorrectionRound<T extends GenerationTask, R extends RoundOutcome> {
  run(task: T): Promise<R>;
}

export interface CorrectionAttempt {
  iteration: number;
  score: number;
  allPassed: boolean;
  artifact: string;
  errors: string[];
  nCandidates: number;
  generationMs: number;
  validationMs: number;
  totalMs: number;
}

export type CorrectionStopReason =
  | 'all_passed'
  | 'below_min_score'
  | 'max_iterations'
  | 'no_errors'
  | 'pipeline_error';

export interface CorrectionResult<R extends RoundOutcome> {
  bestArtifact: string;
  bestScore: number;
  allPassed: boolean;
  attempts: CorrectionAttempt[];
  totalIterations: number;
  initialScore: number;
  finalScore: number;
  improvement: number;
  corrected: boolean;
  stopReason: CorrectionStopReason;
  bestResult: R;
}

export type CorrectionOptions = Pick<
  CorrectionConfig,
  'maxIterations' | 'minScore' | 'recurringThreshold' | 'maxErrorsInPrompt'
> & {
  maxGoodHints?: number;
  maxBadHints?: number;
};

export interface CorrectionDeps {
  blackboard: Blackboard;
  runId: string;
  logger?: Logger;
  onIteration?: (attempt: CorrectionAttempt) => void;
}

/**
 * Flattens the failed validators of a candidate into prompt-ready lines.
 */
export function collectErrors(candidate: Candidate): string[] {
  const errors: string[] = [];
  for (const vs of candidate.failedScores) {
    for (const err of vs.errors) errors.push(`[${vs.validatorName}] ${err}`);
    for (const warn of vs.warnings) errors.push(`[${vs.validatorName}] WARNING: ${warn}`);
  }
  return errors;
}

export interface CorrectionPromptInput {
  originalPrompt: string;
  previousArtifact: string;
  errors: string[];
  iteration: number;
  maxIterations: number;
  hints?: string;
  maxErrors?: number;
}

/** Hints from the blackboard sit directly under the attempt header. */
export function buildCorrectionPrompt(input: CorrectionPromptInput): string {
  const errorLines = input.errors
    .slice(0, input.maxErrors ?? 10)
    .map((e) => `  - ${e}`)
    .join('\n');

  return [
    input.originalPrompt,
    '',
    `--- CORRECTION ATTEMPT ${input.iteration}/${input.maxIterations} ---`,
    ...(input.hints ? [input.hints] : []),
    'Your previous code had validation errors. Fix them.',
    '',
    'Previous code:',
    '```',
    input.previousArtifact,
    '```',
    '',
    'Validation errors found:',
    errorLines,
    '',
    'Generate corrected code that fixes ALL the above errors.',
    'Output ONLY the corrected source code.',
  ].join('\n');
}

/**
 * Reruns the pipeline with validation feedback until the winner passes every
 * validator, is too broken to fix, or the iteration cap is reached. Returns
 * the best round seen across all iterations.
 */
export class SelfCorrectionLoop<T extends GenerationTask, R extends RoundOutcome> {
  constructor(
    private readonly pipeline: CorrectionRound<T, R>,
    private readonly options: CorrectionOptions,
    private readonly deps: CorrectionDeps,
  ) {}

  async run(task: T): Promise<CorrectionResult<R>> {
    const { blackboard, logger } = this.deps;
    const maxIterations = Math.max(1, this.options.maxIterations);
    const attempts: CorrectionAttempt[] = [];
    let best: R | undefined;
    let stopReason: CorrectionStopReason = 'max_iterations';
    let current: T = { ...task, taskId: `${task.taskId}_iter1` };

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      await this.emit({
        type: 'CorrectionIterationStarted',
        payload: { taskId: task.taskId, iteration, maxIterations, hintCount: blackboard.size },
      });

      let result: R;
      try {
        result = await this.pipeline.run(current);
      } catch (err) {
        if (!best) throw err;
        void logger?.error(
          err instanceof Error ? err : new Error(errorMessage(err)),
          `Pipeline failed on correction iteration ${iteration}`,
        );
        stopReason = 'pipeline_error';
        break;
      }

      const errors = collectErrors(result.best);
      const attempt: CorrectionAttempt = {
        iteration,
        score: result.score,
        allPassed: result.allPassed,
        artifact: result.artifact,
        errors,
        nCandidates: result.nCandidates,
        generationMs: result.generationMs,
        validationMs: result.validationMs,
        totalMs: result.totalMs,
      };
      attempts.push(attempt);

      await this.emit({
        type: 'CorrectionIterationFinished',
        payload: {
          taskId: task.taskId,
          iteration,
          score: result.score,
          allPassed: result.allPassed,
          errorCount: errors.length,
        },
      });
      this.notify(attempt);

      if (!best || result.score > best.score) {
        best = result;
      }

      if (result.allPassed) {
        stopReason = 'all_passed';
        break;
      }
      if (result.score < this.options.minScore) {
        void logger?.info(
          `Score ${result.score.toFixed(4)} below ${this.options.minScore}, not correcting`,
        );
        stopReason = 'below_min_score';
        break;
      }
      if (iteration >= maxIterations) {
        stopReason = 'max_iterations';
        break;
      }
      if (errors.length === 0) {
        stopReason = 'no_errors';
        break;
      }

      blackboard.extract(result.best, iteration);
      current = {
        ...task,
        taskId: `${task.taskId}_iter${iteration + 1}`,
        hints: undefined,
        prompt: buildCorrectionPrompt({
          originalPrompt: task.prompt,
          previousArtifact: result.artifact,
          errors,
          iteration: iteration + 1,
          maxIterations,
          hints: blackboard.buildHints(
            this.options.maxGoodHints,
            this.options.maxBadHints,
            this.options.recurringThreshold,
          ),
          maxErrors: this.options.maxErrorsInPrompt,
        }),
      };
    }

    if (!best) {
      throw new Error(`Self-correction for ${task.taskId} produced no result`);
    }

    const initialScore = attempts[0].score;
    const finalScore = best.score;
    const improvement = finalScore - initialScore;
    return {
      bestArtifact: best.artifact,
      bestScore: best.score,
      allPassed: best.allPassed,
      attempts,
      totalIterations: attempts.length,
      initialScore,
      finalScore,
      improvement,
      corrected: improvement > 0.01 && attempts.length > 1,
      stopReason,
      bestResult: best,
    };
  }

  private notify(attempt: CorrectionAttempt): void {
    if (!this.deps.onIteration) return;
    try {
      this.deps.onIteration(attempt);
    } catch (err) {
      void this.deps.logger?.warn(`onIteration callback failed: ${errorMessage(err)}`);
    }
  }

  private async emit(
    event:
      | Pick<CorrectionIterationStarted, 'type' | 'payload'>
      | Pick<CorrectionIterationFinished, 'type' | 'payload'>,
  ): Promise<void> {
    if (!this.deps.logger) return;
    await this.deps.logger.log({
      ...event,
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: this.deps.runId,
    });
  }
}
