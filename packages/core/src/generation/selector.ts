import { EmptyPoolError } from '@crucible/shared';
import type { ScoringWeights } from '../validation/profiles';
import type { Candidate } from './candidate';
import type { CandidatePool } from './pool';

export interface SelectorOptions {
  weights?: ScoringWeights;
  /** Multiplier applied once when any critical validator failed */
  criticalErrorPenalty?: number;
  /** Added once when every validator passed */
  allPassedBonus?: number;
}

/**
 * Weight for a validator: exact entry, else the longest entry that prefixes
 * the name, else 1.
 */
export function resolveWeight(weights: ScoringWeights, validatorName: string): number {
  const exact = weights[validatorName];
  if (exact !== undefined) {
    return exact;
  }
  let bestPrefix = '';
  let weight = 1;
  for (const [prefix, value] of Object.entries(weights)) {
    if (validatorName.startsWith(prefix) && prefix.length > bestPrefix.length) {
      bestPrefix = prefix;
      weight = value;
    }
  }
  return weight;
}

/**
 * Ranks a pool by weighted validation score and stamps the winner.
 */
export class Selector {
  private readonly weights: ScoringWeights;
  private readonly criticalErrorPenalty: number;
  private readonly allPassedBonus: number;

  constructor(options: SelectorOptions = {}) {
    this.weights = options.weights ?? {};
    this.criticalErrorPenalty = options.criticalErrorPenalty ?? 0.5;
    this.allPassedBonus = options.allPassedBonus ?? 0.15;
  }

  score(candidate: Candidate): number {
    const scores = candidate.validationScores;
    if (scores.length === 0) {
      return 0;
    }

    let weighted = 0;
    let total = 0;
    for (const s of scores) {
      const w = resolveWeight(this.weights, s.validatorName);
      weighted += s.score * w;
      total += w;
    }
    let aggregate = total > 0 ? weighted / total : 0;

    if (candidate.allPassed) {
      aggregate += this.allPassedBonus;
    }
    if (candidate.hasCriticalFailure) {
      aggregate *= this.criticalErrorPenalty;
    }

    return round6(Math.min(1, Math.max(0, aggregate)));
  }

  /** Best first; equal scores keep the lower id first. Does not touch statuses. */
  rank(pool: CandidatePool): Candidate[] {
    return pool.candidates
      .map((candidate) => ({ candidate, score: this.score(candidate) }))
      .sort((a, b) => b.score - a.score || a.candidate.id - b.candidate.id)
      .map((entry) => entry.candidate);
  }

  /**
   * @throws {EmptyPoolError} When the pool has no candidates
   */
  select(pool: CandidatePool): Candidate {
    const ranked = this.rank(pool);
    const [winner] = ranked;
    if (!winner) {
      throw new EmptyPoolError(pool.taskId);
    }

    for (const candidate of ranked) {
      const score = this.score(candidate);
      if (candidate === winner) {
        candidate.markSelected(score);
      } else {
        candidate.markRejected(score);
      }
    }
    pool.best = winner;
    return winner;
  }
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}
