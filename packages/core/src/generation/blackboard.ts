import type { BlackboardConfig } from '@crucible/shared';
import type { Candidate } from './candidate';

export type BlackboardEntryType = 'good_pattern' | 'bad_pattern';

export interface BlackboardEntry {
  sourceCandidateId: number;
  sourceIteration: number;
  type: BlackboardEntryType;
  validatorName: string;
  content: string;
  confidence: number;
}

export interface BlackboardSnapshot {
  totalEntries: number;
  goodPatterns: number;
  badPatterns: number;
  recurringErrors: string[];
  entries: readonly BlackboardEntry[];
}

/**
 * Knowledge shared between correction iterations: what passed (keep it) and
 * what failed (avoid it), plus a tally of validators that keep failing.
 */
export class Blackboard {
  private entries: BlackboardEntry[] = [];
  private readonly failureCounts = new Map<string, number>();
  private readonly maxEntries: number;
  private readonly maxErrorsPerValidator: number;

  constructor(options: Partial<Pick<BlackboardConfig, 'maxEntries' | 'maxErrorsPerValidator'>> = {}) {
    this.maxEntries = options.maxEntries ?? 50;
    this.maxErrorsPerValidator = options.maxErrorsPerValidator ?? 3;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Records the candidate's passed and failed validators. Returns the number
   * of entries added.
   */
  extract(candidate: Candidate, iteration = 0): number {
    let added = 0;
    for (const vs of candidate.validationScores) {
      if (vs.passed) {
        this.add({
          sourceCandidateId: candidate.id,
          sourceIteration: iteration,
          type: 'good_pattern',
          validatorName: vs.validatorName,
          content: `Validator '${vs.validatorName}' passed (score=${vs.score.toFixed(2)})`,
          confidence: 0.8,
        });
        added++;
        continue;
      }

      for (const err of vs.errors.slice(0, this.maxErrorsPerValidator)) {
        this.add({
          sourceCandidateId: candidate.id,
          sourceIteration: iteration,
          type: 'bad_pattern',
          validatorName: vs.validatorName,
          content: `[${vs.validatorName}] ${err}`,
          confidence: 0.9,
        });
        added++;
      }
      this.failureCounts.set(vs.validatorName, (this.failureCounts.get(vs.validatorName) ?? 0) + 1);
    }
    return added;
  }

  /** Validators that failed at least `minOccurrences` times, most frequent first */
  getRecurringErrors(minOccurrences = 2): string[] {
    return [...this.failureCounts.entries()]
      .filter(([, count]) => count >= minOccurrences)
      .sort((a, b) => b[1] - a[1])
      .map(([name, count]) => `${name} (failed ${count}x)`);
  }

  buildHints(maxGood = 5, maxBad = 8, minOccurrences = 2): string {
    if (this.entries.length === 0) {
      return '';
    }

    const recurring = this.getRecurringErrors(minOccurrences);
    const bad = this.uniqueContent('bad_pattern');
    const good = this.uniqueContent('good_pattern');
    const parts: string[] = [];

    if (recurring.length > 0) {
      parts.push('RECURRING ISSUES (these keep appearing, pay special attention):');
      for (const r of recurring.slice(0, 5)) parts.push(`  ! ${r}`);
      parts.push('');
    }
    if (bad.length > 0) {
      parts.push('AVOID these issues found in previous attempts:');
      for (const b of bad.slice(0, maxBad)) parts.push(`  - ${b}`);
      parts.push('');
    }
    if (good.length > 0) {
      parts.push('KEEP these good patterns from previous attempts:');
      for (const g of good.slice(0, maxGood)) parts.push(`  + ${g}`);
      parts.push('');
    }

    return parts.join('\n');
  }

  snapshot(): BlackboardSnapshot {
    return {
      totalEntries: this.entries.length,
      goodPatterns: this.uniqueContent('good_pattern').length,
      badPatterns: this.uniqueContent('bad_pattern').length,
      recurringErrors: this.getRecurringErrors(),
      entries: this.entries.map((e) => ({ ...e })),
    };
  }

  clear(): void {
    this.entries = [];
    this.failureCounts.clear();
  }

  private add(entry: BlackboardEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
  }

  private uniqueContent(type: BlackboardEntryType): string[] {
    const seen = new Set<string>();
    for (const e of this.entries) {
      if (e.type === type) seen.add(e.content);
    }
    return [...seen];
  }
}
