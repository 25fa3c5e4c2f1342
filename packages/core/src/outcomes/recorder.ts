import * as fs from 'fs/promises';
import * as path from 'path';
import { hash } from 'ohash';
import { errorMessage, type Logger } from '@crucible/shared';

export interface OutcomeRecord {
  taskId: string;
  taskType: string;
  riskTag: string;
  validationProfile: string;
  nCandidates: number;
  bestScore: number;
  allPassed: boolean;
  /** Rule counts across every validated candidate */
  rulesRun: number;
  rulesPassed: number;
  rulesFailed: number;
  /** Validators that scored the selected candidate, cross_review included */
  rulesRunNames: string[];
  rulesPassedNames: string[];
  rulesFailedNames: string[];
  generationMs: number;
  validationMs: number;
  selectionMs: number;
  totalMs: number;
  /** ISO 8601 */
  timestamp: string;
  /** Groups runs of the same prompt without storing it */
  promptHash: string;
}

/**
 * Fire-and-forget sink for pipeline outcomes. `record` must not throw and
 * must not make the caller wait on storage.
 */
export interface OutcomeRecorder {
  record(outcome: OutcomeRecord): void;
  /** Resolves once every record accepted so far has been stored */
  flush?(): Promise<void>;
}

export function promptHash(prompt: string): string {
  return hash(prompt.trim());
}

export class InMemoryOutcomeRecorder implements OutcomeRecorder {
  readonly records: OutcomeRecord[] = [];

  record(outcome: OutcomeRecord): void {
    this.records.push({
      ...outcome,
      rulesRunNames: [...outcome.rulesRunNames],
      rulesPassedNames: [...outcome.rulesPassedNames],
      rulesFailedNames: [...outcome.rulesFailedNames],
    });
  }
}

/**
 * Appends one JSON line per outcome. Writes are chained so lines never
 * interleave; failures are logged and dropped.
 */
export class JsonlOutcomeRecorder implements OutcomeRecorder {
  private pending: Promise<void> = Promise.resolve();
  private dirReady?: Promise<string | undefined>;

  constructor(
    private readonly filePath: string,
    private readonly logger?: Logger,
  ) {}

  record(outcome: OutcomeRecord): void {
    const line = JSON.stringify(outcome) + '\n';
    this.pending = this.pending.then(() => this.append(line, outcome.taskId));
  }

  flush(): Promise<void> {
    return this.pending;
  }

  private async append(line: string, taskId: string): Promise<void> {
    try {
      this.dirReady ??= fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await this.dirReady;
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (err) {
      this.dirReady = undefined;
      void this.logger?.warn(
        `Failed to record outcome for ${taskId} at ${this.filePath}: ${errorMessage(err)}`,
      );
    }
  }
}
