import type { RuleResult, Severity } from '../validation/types';

export type CandidateStatus = 'generated' | 'validated' | 'selected' | 'rejected';

/**
 * One validator's verdict on one candidate, with the weight it carries in
 * the candidate's total score.
 */
export interface ValidationScore {
  validatorName: string;
  passed: boolean;
  score: number;
  severity: Severity;
  errors: readonly string[];
  warnings: readonly string[];
  weight: number;
  durationMs: number;
  cached: boolean;
}

export function toValidationScore(result: RuleResult, weight = 1): ValidationScore {
  return {
    validatorName: result.ruleName,
    passed: result.passed,
    score: result.score,
    severity: result.severity,
    errors: [...result.errors],
    warnings: [...result.warnings],
    weight,
    durationMs: result.durationMs,
    cached: result.cached,
  };
}

export interface CandidateInit {
  id: number;
  taskId: string;
  artifact: string;
  temperature: number;
  seed: number;
  model: string;
  generationTimeMs: number;
  /** Set when every attempt for this slot failed; the artifact is then empty */
  error?: string;
}

/**
 * A single generated artifact and its validation history. Content is fixed at
 * construction; scores are append-only and the status only moves forward
 * through `markValidated`, `markSelected` and `markRejected`.
 */
export class Candidate {
  readonly id: number;
  readonly taskId: string;
  readonly artifact: string;
  readonly temperature: number;
  readonly seed: number;
  readonly model: string;
  readonly generationTimeMs: number;
  readonly error?: string;

  private readonly scores: ValidationScore[] = [];
  private currentStatus: CandidateStatus = 'generated';
  private rankedScore?: number;

  constructor(init: CandidateInit) {
    this.id = init.id;
    this.taskId = init.taskId;
    this.artifact = init.artifact;
    this.temperature = init.temperature;
    this.seed = init.seed;
    this.model = init.model;
    this.generationTimeMs = init.generationTimeMs;
    this.error = init.error;
  }

  get status(): CandidateStatus {
    return this.currentStatus;
  }

  get validationScores(): readonly ValidationScore[] {
    return this.scores;
  }

  /** Aggregate the selector ranked this candidate by; set on selection or rejection */
  get selectionScore(): number | undefined {
    return this.rankedScore;
  }

  addScore(score: ValidationScore): void {
    this.scores.push(Object.freeze({ ...score, errors: [...score.errors], warnings: [...score.warnings] }));
  }

  markValidated(): void {
    if (this.currentStatus === 'generated') {
      this.currentStatus = 'validated';
    }
  }

  markSelected(score: number): void {
    this.currentStatus = 'selected';
    this.rankedScore = score;
  }

  markRejected(score: number): void {
    this.currentStatus = 'rejected';
    this.rankedScore = score;
  }

  /** Weighted mean of the validation scores; 0 before any validator ran */
  get totalScore(): number {
    let weighted = 0;
    let weights = 0;
    for (const s of this.scores) {
      weighted += s.score * s.weight;
      weights += s.weight;
    }
    return weights > 0 ? weighted / weights : 0;
  }

  get allPassed(): boolean {
    return this.scores.length > 0 && this.scores.every((s) => s.passed);
  }

  get hasCriticalFailure(): boolean {
    return this.scores.some((s) => !s.passed && s.severity === 'critical');
  }

  get failedScores(): ValidationScore[] {
    return this.scores.filter((s) => !s.passed);
  }

  get lineCount(): number {
    const trimmed = this.artifact.trim();
    return trimmed ? trimmed.split('\n').length : 0;
  }
}
