import {
  EmptyPoolError,
  errorMessage,
  mapWithConcurrency,
  type CandidateSelected,
  type CandidateValidated,
  type Config,
  type Logger,
  type PipelineFinished,
  type PipelineStarted,
  type ValidationProfileName,
} from '@crucible/shared';
import type { ProviderAdapter } from '@crucible/adapters';
import type { ProcessRunner } from '@crucible/exec';
import { CostTracker } from '../cost/tracker';
import { Blackboard } from '../generation/blackboard';
import { toValidationScore, type Candidate } from '../generation/candidate';
import {
  SelfCorrectionLoop,
  type CorrectionAttempt,
  type CorrectionResult,
} from '../generation/correction';
import { Generator, type GenerationTask } from '../generation/generator';
import { Selector, resolveWeight } from '../generation/selector';
import type { TextGenerationPort } from '../generation/text-generator';
import { promptHash, type OutcomeRecorder } from '../outcomes/recorder';
import { CircuitBreaker } from '../review/circuit-breaker';
import { CrossReviewer, type ReviewResult } from '../review/reviewer';
import { ValidationCache } from '../validation/cache';
import { getProfile, resolveProfile, type ScoringWeights } from '../validation/profiles';
import { buildRules } from '../validation/rules';
import { RuleRunner } from '../validation/runner';
import type { RuleResult, Validator } from '../validation/types';
import { PoolResult, type CandidateValidationTime, type ValidationStats } from './result';

export interface PipelineRequest extends GenerationTask {
  /** Fixed validation profile; otherwise taken from config or the risk tag */
  profile?: ValidationProfileName;
  /** Review the winner regardless of risk tag and length */
  forceReview?: boolean;
}

export interface PipelineDeps {
  port: TextGenerationPort;
  runId: string;
  logger?: Logger;
  reviewerAdapter?: ProviderAdapter;
  reviewerProviderId?: string;
  /** Spend on reviewer calls, capped by `review.budgetUsd` */
  reviewCosts?: CostTracker;
  /** Spend on generation calls; reported only, never gates the reviewer */
  generationCosts?: CostTracker;
  outcomes?: OutcomeRecorder;
  processRunner?: ProcessRunner;
  /** Clock for the circuit breaker */
  now?: () => number;
}

export interface CorrectionRunOptions {
  onIteration?: (attempt: CorrectionAttempt) => void;
}

interface CandidateValidation {
  time: CandidateValidationTime;
  results: RuleResult[];
}

/**
 * One generate → validate → select round, plus the self-correction loop on
 * top of it. Owns the blackboard, circuit breaker and cost trackers for the
 * task it is running; `resetTaskState` clears them between unrelated tasks.
 */
export class Pipeline {
  readonly blackboard: Blackboard;
  readonly breaker: CircuitBreaker;
  readonly reviewCosts: CostTracker;
  readonly generationCosts: CostTracker;
  readonly reviewer: CrossReviewer;
  readonly cache?: ValidationCache;

  private readonly generator: Generator;
  private readonly ruleRunner: RuleRunner;

  constructor(
    private readonly config: Config,
    private readonly deps: PipelineDeps,
  ) {
    this.blackboard = new Blackboard(config.blackboard);
    this.breaker = new CircuitBreaker({ ...config.review.circuitBreaker, now: deps.now });
    this.reviewCosts =
      deps.reviewCosts ?? new CostTracker(config, { budgetUsd: config.review.budgetUsd });
    this.generationCosts = deps.generationCosts ?? new CostTracker(config);
    this.reviewer = new CrossReviewer(config.review, {
      adapter: deps.reviewerAdapter,
      providerId: deps.reviewerProviderId ?? deps.reviewerAdapter?.id() ?? 'reviewer',
      breaker: this.breaker,
      costTracker: this.reviewCosts,
      runId: deps.runId,
      logger: deps.logger,
    });
    this.cache = config.validation.cache.enabled
      ? new ValidationCache(config.validation.cache.maxSize)
      : undefined;
    this.generator = new Generator({ port: deps.port, runId: deps.runId, logger: deps.logger });
    this.ruleRunner = new RuleRunner({ cache: this.cache, logger: deps.logger });
  }

  resetTaskState(): void {
    this.blackboard.clear();
    this.breaker.reset();
    this.reviewCosts.reset();
    this.generationCosts.reset();
  }

  /**
   * @throws {EmptyPoolError} When no generation slot produced anything
   */
  async run(request: PipelineRequest): Promise<PoolResult> {
    const { config, deps } = this;
    const start = Date.now();
    const profileName =
      request.profile ?? config.validation.profile ?? resolveProfile(request.riskTag);
    const profile = getProfile(profileName);
    const weights: ScoringWeights = { ...profile.weights, ...config.scoring.weights };

    await this.emit({
      type: 'PipelineStarted',
      payload: {
        taskId: request.taskId,
        taskType: request.taskType ?? 'general',
        riskTag: request.riskTag ?? 'unknown',
        profile: profileName,
        nCandidates: config.candidates.count,
      },
    });

    const pool = await this.generator.generate(request, {
      ...config.candidates,
      n: config.candidates.count,
    });
    const generationMs = Date.now() - start;
    if (pool.size() === 0) {
      throw new EmptyPoolError(request.taskId);
    }

    const rules = buildRules(profile.rules, {
      forbiddenModules: config.validation.forbiddenModules,
      externalTimeoutMs: config.validation.externalTimeoutMs,
      runner: deps.processRunner,
      context: { runId: deps.runId, logger: deps.logger },
    });
    const validationStart = Date.now();
    const cacheBefore = this.cache?.stats();
    const validations = await mapWithConcurrency(
      pool.candidates.filter((c) => c.error === undefined),
      profile.parallel ? config.validation.parallelCandidates : 1,
      (candidate) =>
        this.validate(candidate, rules, weights, {
          failFast: config.validation.failFast ?? profile.failFast,
          maxWorkers: profile.parallel ? config.validation.maxWorkers : 1,
        }),
    );
    const validationMs = Date.now() - validationStart;
    const cacheAfter = this.cache?.stats();
    const validationStats = summarizeValidation(validations, validationMs, {
      hits: (cacheAfter?.hits ?? 0) - (cacheBefore?.hits ?? 0),
      misses: (cacheAfter?.misses ?? 0) - (cacheBefore?.misses ?? 0),
    });

    const selectionStart = Date.now();
    const selector = new Selector({
      weights,
      criticalErrorPenalty: config.scoring.criticalErrorPenalty,
      allPassedBonus: config.scoring.allPassedBonus,
    });
    let best = selector.select(pool);
    const selectionMs = Date.now() - selectionStart;

    await this.emit({
      type: 'CandidateSelected',
      payload: {
        taskId: request.taskId,
        candidateId: best.id,
        score: best.selectionScore ?? 0,
        allPassed: best.allPassed,
        poolSize: pool.size(),
      },
    });

    let review: ReviewResult | undefined;
    const reviewStart = Date.now();
    if (this.reviewer.shouldReview(request.riskTag, best.lineCount, request.forceReview)) {
      review = await this.reviewer.review(best.artifact, {
        taskId: request.taskId,
        prompt: request.prompt,
        riskTag: request.riskTag,
      });
      if (!review.skipped) {
        best.addScore(review.toValidationScore(resolveWeight(weights, 'cross_review')));
        best = selector.select(pool);
      }
    }
    const reviewMs = Date.now() - reviewStart;

    const result = new PoolResult({
      pool,
      best,
      profile: profileName,
      generationMs,
      validationMs,
      selectionMs,
      reviewMs,
      totalMs: Date.now() - start,
      validationStats,
      review,
    });

    this.recordOutcome(request, result);

    await this.emit({
      type: 'PipelineFinished',
      payload: {
        taskId: request.taskId,
        bestCandidateId: best.id,
        bestScore: result.score,
        allPassed: result.allPassed,
        totalMs: result.totalMs,
      },
    });

    return result;
  }

  /**
   * Runs rounds with validation feedback until the winner passes, is beyond
   * repair or the iteration cap is hit. Starts from fresh task state: the
   * blackboard, circuit breaker and cost trackers of an earlier task are reset.
   */
  async runWithCorrection(
    request: PipelineRequest,
    options: CorrectionRunOptions = {},
  ): Promise<CorrectionResult<PoolResult>> {
    this.resetTaskState();
    const { correction, blackboard } = this.config;
    const loop = new SelfCorrectionLoop<PipelineRequest, PoolResult>(
      this,
      {
        ...correction,
        maxIterations: correction.enabled ? correction.maxIterations : 1,
        maxGoodHints: blackboard.maxGood,
        maxBadHints: blackboard.maxBad,
      },
      {
        blackboard: this.blackboard,
        runId: this.deps.runId,
        logger: this.deps.logger,
        onIteration: options.onIteration,
      },
    );
    return loop.run(request);
  }

  private async validate(
    candidate: Candidate,
    rules: Validator[],
    weights: ScoringWeights,
    options: { failFast: boolean; maxWorkers: number },
  ): Promise<CandidateValidation> {
    const start = Date.now();
    const results = await this.ruleRunner.run(candidate.artifact, rules, options);
    for (const result of results) {
      candidate.addScore(toValidationScore(result, resolveWeight(weights, result.ruleName)));
    }
    candidate.markValidated();
    const durationMs = Date.now() - start;

    await this.emit({
      type: 'CandidateValidated',
      payload: {
        taskId: candidate.taskId,
        candidateId: candidate.id,
        totalScore: candidate.totalScore,
        allPassed: candidate.allPassed,
        rulesRun: results.length,
        rulesFailed: results.filter((r) => !r.passed).length,
        cacheHits: results.filter((r) => r.cached).length,
        durationMs,
      },
    });

    return { time: { candidateId: candidate.id, durationMs }, results };
  }

  private recordOutcome(request: PipelineRequest, result: PoolResult): void {
    const { outcomes, logger } = this.deps;
    if (!outcomes) return;
    const stats = result.validationStats;
    const scores = result.best.validationScores;
    try {
      outcomes.record({
        taskId: request.taskId,
        taskType: request.taskType ?? 'general',
        riskTag: request.riskTag ?? 'unknown',
        validationProfile: result.profile,
        nCandidates: result.nCandidates,
        bestScore: result.score,
        allPassed: result.allPassed,
        rulesRun: stats.rulesRun,
        rulesPassed: stats.rulesPassed,
        rulesFailed: stats.rulesFailed,
        rulesRunNames: scores.map((s) => s.validatorName),
        rulesPassedNames: scores.filter((s) => s.passed).map((s) => s.validatorName),
        rulesFailedNames: scores.filter((s) => !s.passed).map((s) => s.validatorName),
        generationMs: result.generationMs,
        validationMs: result.validationMs,
        selectionMs: result.selectionMs,
        totalMs: result.totalMs,
        timestamp: new Date().toISOString(),
        promptHash: promptHash(request.prompt),
      });
    } catch (err) {
      void logger?.warn(`Outcome recorder failed for ${request.taskId}: ${errorMessage(err)}`);
    }
  }

  private async emit(
    event:
      | Pick<PipelineStarted, 'type' | 'payload'>
      | Pick<CandidateValidated, 'type' | 'payload'>
      | Pick<CandidateSelected, 'type' | 'payload'>
      | Pick<PipelineFinished, 'type' | 'payload'>,
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

export function summarizeValidation(
  validations: CandidateValidation[],
  wallMs: number,
  cache: { hits: number; misses: number },
): ValidationStats {
  const all = validations.flatMap((v) => v.results);
  const perCandidate = validations.map((v) => v.time);
  const sequentialMs = perCandidate.reduce((sum, t) => sum + t.durationMs, 0);
  return {
    candidatesValidated: validations.length,
    rulesRun: all.length,
    rulesPassed: all.filter((r) => r.passed).length,
    rulesFailed: all.filter((r) => !r.passed).length,
    perCandidate,
    sequentialMs,
    wallMs,
    speedup: wallMs > 0 ? Math.round((sequentialMs / wallMs) * 100) / 100 : 1,
    cacheHits: cache.hits,
    cacheMisses: cache.misses,
  };
}
