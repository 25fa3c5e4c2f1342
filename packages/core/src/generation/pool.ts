import type { Candidate } from './candidate';

export interface PoolStats {
  total: number;
  avgScore: number;
  maxScore: number;
  minScore: number;
  passedCount: number;
  criticalCount: number;
  avgGenerationTimeMs: number;
  bestId?: number;
}

/**
 * Candidates generated for one task, kept in generation order.
 */
export class CandidatePool {
  private readonly members: Candidate[] = [];
  best?: Candidate;

  constructor(readonly taskId: string) {}

  get candidates(): readonly Candidate[] {
    return this.members;
  }

  add(candidate: Candidate): void {
    this.members.push(candidate);
  }

  size(): number {
    return this.members.length;
  }

  get(id: number): Candidate | undefined {
    return this.members.find((c) => c.id === id);
  }

  stats(): PoolStats {
    if (this.members.length === 0) {
      return {
        total: 0,
        avgScore: 0,
        maxScore: 0,
        minScore: 0,
        passedCount: 0,
        criticalCount: 0,
        avgGenerationTimeMs: 0,
        bestId: this.best?.id,
      };
    }

    const scores = this.members.map((c) => c.totalScore);
    const genTimes = this.members.map((c) => c.generationTimeMs);
    return {
      total: this.members.length,
      avgScore: mean(scores),
      maxScore: Math.max(...scores),
      minScore: Math.min(...scores),
      passedCount: this.members.filter((c) => c.allPassed).length,
      criticalCount: this.members.filter((c) => c.hasCriticalFailure).length,
      avgGenerationTimeMs: mean(genTimes),
      bestId: this.best?.id,
    };
  }
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
