import type { ValidationProfileName } from '@crucible/shared';
import type { Candidate, CandidateStatus } from '../generation/candidate';
import type { CandidatePool } from '../generation/pool';
import type { RoundOutcome } from '../generation/correction';
import type { ReviewResult } from '../review/reviewer';

export interface CandidateValidationTime {
  candidateId: number;
  durationMs: number;
}

export interface ValidationStats {
  candidatesValidated: number;
  rulesRun: number;
  rulesPassed: number;
  rulesFailed: number;
  perCandidate: CandidateValidationTime[];
  /** Sum of per-candidate validation times */
  sequentialMs: number;
  /** Wall-clock time of the whole validation phase */
  wallMs: number;
  /** sequentialMs / wallMs; 1 when validation took no measurable time */
  speedup: number;
  cacheHits: number;
  cacheMisses: number;
}

export interface CandidateComparison {
  id: number;
  status: CandidateStatus;
  score: number;
  totalScore: number;
  allPassed: boolean;
  temperature: number;
  seed: number;
  lineCount: number;
  generationMs: number;
  passed: string[];
  failed: string[];
  error?: string;
}

export interface PoolResultInit {
  pool: CandidatePool;
  best: Candidate;
  profile: ValidationProfileName;
  generationMs: number;
  validationMs: number;
  selectionMs: number;
  reviewMs: number;
  totalMs: number;
  validationStats: ValidationStats;
  review?: ReviewResult;
}

/**
 * Everything one pipeline round produced: the pool, its winner and how long
 * each phase took.
 */
export class PoolResult implements RoundOutcome {
  readonly pool: CandidatePool;
  readonly best: Candidate;
  readonly profile: ValidationProfileName;
  readonly generationMs: number;
  readonly validationMs: number;
  readonly selectionMs: number;
  readonly reviewMs: number;
  readonly totalMs: number;
  readonly validationStats: ValidationStats;
  readonly review?: ReviewResult;

  constructor(init: PoolResultInit) {
    this.pool = init.pool;
    this.best = init.best;
    this.profile = init.profile;
    this.generationMs = init.generationMs;
    this.validationMs = init.validationMs;
    this.selectionMs = init.selectionMs;
    this.reviewMs = init.reviewMs;
    this.totalMs = init.totalMs;
    this.validationStats = init.validationStats;
    this.review = init.review;
  }

  get score(): number {
    return this.best.selectionScore ?? 0;
  }

  get allPassed(): boolean {
    return this.best.allPassed;
  }

  get artifact(): string {
    return this.best.artifact;
  }

  get nCandidates(): number {
    return this.pool.size();
  }

  /** Per-candidate breakdown, best first */
  comparison(): CandidateComparison[] {
    return this.pool.candidates
      .map(
        (c): CandidateComparison => ({
          id: c.id,
          status: c.status,
          score: c.selectionScore ?? 0,
          totalScore: round4(c.totalScore),
          allPassed: c.allPassed,
          temperature: c.temperature,
          seed: c.seed,
          lineCount: c.lineCount,
          generationMs: c.generationTimeMs,
          passed: c.validationScores.filter((s) => s.passed).map((s) => s.validatorName),
          failed: c.failedScores.map((s) => s.validatorName),
          error: c.error,
        }),
      )
      .sort((a, b) => b.score - a.score || a.id - b.id);
  }

  summary(): string {
    const lines = [
      `Task ${this.pool.taskId}: candidate #${this.best.id} selected ` +
        `(score=${this.score.toFixed(4)}, ${this.allPassed ? 'all passed' : 'has failures'})`,
      `Profile ${this.profile}, ${this.nCandidates} candidates, ` +
        `generation ${this.generationMs}ms, validation ${this.validationMs}ms, total ${this.totalMs}ms`,
    ];
    for (const row of this.comparison()) {
      const failed = row.failed.length > 0 ? ` failed: ${row.failed.join(', ')}` : '';
      const error = row.error ? ` error: ${row.error}` : '';
      lines.push(`  #${row.id} ${row.status} ${row.score.toFixed(4)} t=${row.temperature}${failed}${error}`);
    }
    if (this.review) {
      lines.push(this.review.summary());
    }
    return lines.join('\n');
  }
}

function round4(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}
