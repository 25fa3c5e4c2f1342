import { z } from 'zod';
import type { ProviderAdapter } from '@crucible/adapters';
import {
  NoopLogger,
  errorMessage,
  extractJsonArray,
  extractJsonObject,
  stripCodeFence,
  withTimeout,
  type Logger,
  type ModelRequest,
  type ReviewConfig,
} from '@crucible/shared';
import type { ValidationScore } from '../generation/candidate';
import type { CostTracker } from '../cost/tracker';
import type { CircuitBreaker, CircuitState } from './circuit-breaker';

const reviewIssueSchema = z.object({
  severity: z.enum(['critical', 'warning', 'info']),
  category: z.string(),
  description: z.string(),
  line: z.number().int().optional(),
  suggestion: z.string().optional(),
});

const issuesObjectSchema = z.object({ issues: z.array(z.unknown()) });

export type ReviewIssue = z.infer<typeof reviewIssueSchema>;
export type ReviewSeverity = ReviewIssue['severity'];

const SYSTEM_PROMPT = `You are a senior code reviewer giving a second opinion on TypeScript produced by another model.
Look for defects the author is likely blind to:
- Security: injection, unsafe evaluation, secrets, unchecked input.
- Correctness: off-by-one errors, unhandled promise rejections, wrong edge cases.
- Performance: accidental quadratic work, unbounded memory or concurrency.

Report only real problems. Do not comment on formatting.

Respond with a JSON array (empty when there are no problems):
[
  {
    "severity": "critical" | "warning" | "info",
    "category": "<security|correctness|performance|style>",
    "description": "<what is wrong>",
    "line": <line number, optional>,
    "suggestion": "<how to fix it, optional>"
  }
]`;

export interface ReviewResultInit {
  issues?: ReviewIssue[];
  skipped?: boolean;
  skipReason?: string;
  model?: string;
  inputTokens?: number;
  outputTokens?: number;
  costUsd?: number;
  durationMs?: number;
}

export class ReviewResult {
  readonly issues: ReviewIssue[];
  readonly skipped: boolean;
  readonly skipReason?: string;
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly costUsd: number;
  readonly durationMs: number;

  constructor(init: ReviewResultInit = {}) {
    this.issues = init.issues ?? [];
    this.skipped = init.skipped ?? false;
    this.skipReason = init.skipReason;
    this.model = init.model ?? '';
    this.inputTokens = init.inputTokens ?? 0;
    this.outputTokens = init.outputTokens ?? 0;
    this.costUsd = init.costUsd ?? 0;
    this.durationMs = init.durationMs ?? 0;
  }

  static skip(reason: string): ReviewResult {
    return new ReviewResult({ skipped: true, skipReason: reason });
  }

  get hasCritical(): boolean {
    return this.issues.some((i) => i.severity === 'critical');
  }

  count(severity: ReviewSeverity): number {
    return this.issues.filter((i) => i.severity === severity).length;
  }

  summary(): string {
    if (this.skipped) {
      return `Cross-review skipped: ${this.skipReason ?? 'unknown reason'}`;
    }
    const counts = (['critical', 'warning', 'info'] as const)
      .map((s) => `${this.count(s)} ${s}`)
      .join(', ');
    return `Cross-review (${this.model}): ${this.issues.length} issues (${counts}), $${this.costUsd.toFixed(4)}`;
  }

  /**
   * Folds the review into the candidate's validation as the `cross_review`
   * pseudo-validator. Critical issues fail it; the rest are warnings.
   */
  toValidationScore(weight = 1): ValidationScore {
    const critical = this.count('critical');
    const warning = this.count('warning');
    return {
      validatorName: 'cross_review',
      passed: !this.hasCritical,
      score: Math.max(0, Math.round((1 - 0.3 * critical - 0.1 * warning) * 100) / 100),
      severity: this.hasCritical ? 'critical' : 'warning',
      errors: this.issues.filter((i) => i.severity === 'critical').map(formatIssue),
      warnings: this.issues.filter((i) => i.severity !== 'critical').map(formatIssue),
      weight,
      durationMs: this.durationMs,
      cached: false,
    };
  }
}

export function formatIssue(issue: ReviewIssue): string {
  const line = issue.line !== undefined ? ` (line ${issue.line})` : '';
  const fix = issue.suggestion ? `; fix: ${issue.suggestion}` : '';
  return `[${issue.category}] ${issue.description}${line}${fix}`;
}

/**
 * Reads issues from a bare JSON array, an `{ "issues": [...] }` object, or
 * either wrapped in a markdown fence. Entries that do not match the issue
 * shape are dropped. Returns undefined when the text holds no JSON or the
 * JSON has neither shape.
 */
export function parseReviewResponse(text: string, logger?: Logger): ReviewIssue[] | undefined {
  const body = stripCodeFence(text);
  let payload: unknown;
  try {
    const objectAt = body.indexOf('{');
    const arrayAt = body.indexOf('[');
    payload =
      objectAt !== -1 && (arrayAt === -1 || objectAt < arrayAt)
        ? extractJsonObject(body, 'reviewer')
        : extractJsonArray(body, 'reviewer');
  } catch (err) {
    void logger?.warn(`Unparseable review response: ${errorMessage(err)}`);
    return undefined;
  }

  let entries: unknown[];
  if (Array.isArray(payload)) {
    entries = payload;
  } else {
    const wrapped = issuesObjectSchema.safeParse(payload);
    if (!wrapped.success) {
      void logger?.warn('Unparseable review response: object without an issues array');
      return undefined;
    }
    entries = wrapped.data.issues;
  }

  const issues: ReviewIssue[] = [];
  for (const entry of entries) {
    const parsed = reviewIssueSchema.safeParse(entry);
    if (parsed.success) {
      issues.push(parsed.data);
    } else {
      void logger?.debug(`Dropped malformed review issue: ${parsed.error.issues[0]?.message}`);
    }
  }
  return issues;
}

export interface ReviewContext {
  taskId: string;
  prompt?: string;
  riskTag?: string;
}

export type ReviewerOptions = Pick<
  ReviewConfig,
  'enabled' | 'riskTags' | 'lineThreshold' | 'timeoutMs' | 'maxTokens'
>;

export interface ReviewerDeps {
  /** Without an adapter the reviewer behaves as disabled */
  adapter?: ProviderAdapter;
  providerId: string;
  breaker: CircuitBreaker;
  costTracker: CostTracker;
  runId: string;
  logger?: Logger;
}

export interface ReviewerStats {
  enabled: boolean;
  reviewCount: number;
  issuesFound: number;
  skippedCount: number;
  circuitState: CircuitState;
  totalCostUsd: number;
  remainingBudgetUsd?: number;
}

/**
 * Second opinion from a model of a different family, used on risky or long
 * artifacts. Never throws: every failure becomes a skipped result with a reason.
 */
export class CrossReviewer {
  private reviewCount = 0;
  private issuesFound = 0;
  private skippedCount = 0;

  constructor(
    private readonly options: ReviewerOptions,
    private readonly deps: ReviewerDeps,
  ) {}

  get enabled(): boolean {
    return this.options.enabled && this.deps.adapter !== undefined;
  }

  shouldReview(riskTag: string | undefined, lineCount: number, force = false): boolean {
    if (!this.enabled) return false;
    if (force) return true;
    if (this.deps.breaker.state === 'open') return false;
    if (riskTag && this.options.riskTags.includes(riskTag.toLowerCase())) return true;
    return lineCount > this.options.lineThreshold;
  }

  async review(artifact: string, context: ReviewContext): Promise<ReviewResult> {
    const { adapter, breaker, costTracker, logger } = this.deps;
    if (!this.enabled || !adapter) {
      return this.skipped(context, 'reviewer disabled');
    }
    if (!costTracker.hasBudget()) {
      return this.skipped(context, 'budget exhausted');
    }
    if (!breaker.allowRequest()) {
      return this.skipped(context, 'circuit open');
    }

    const start = Date.now();
    try {
      const response = await withTimeout(
        adapter.generate(this.buildRequest(artifact, context), {
          runId: this.deps.runId,
          logger: logger ?? new NoopLogger(),
          timeoutMs: this.options.timeoutMs,
          retryOptions: { maxRetries: 0 },
        }),
        this.options.timeoutMs,
        `Review timed out after ${this.options.timeoutMs}ms`,
      );

      const usage = response.usage ?? {};
      const costUsd = costTracker.recordUsage(
        this.deps.providerId,
        usage,
        adapter.capabilities().pricing,
      );
      const issues = parseReviewResponse(response.text ?? '', logger);
      if (!issues) {
        breaker.recordFailure();
        return this.skipped(context, 'unparseable response');
      }
      breaker.recordSuccess();

      const result = new ReviewResult({
        issues,
        model: adapter.model(),
        inputTokens: usage.inputTokens ?? 0,
        outputTokens: usage.outputTokens ?? 0,
        costUsd,
        durationMs: Date.now() - start,
      });

      this.reviewCount++;
      this.issuesFound += result.issues.length;
      if (logger) {
        await logger.log({
          type: 'ReviewCompleted',
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          runId: this.deps.runId,
          payload: {
            taskId: context.taskId,
            model: result.model,
            issueCount: result.issues.length,
            hasCritical: result.hasCritical,
            costUsd,
            durationMs: result.durationMs,
          },
        });
      }
      return result;
    } catch (err) {
      breaker.recordFailure();
      return this.skipped(context, `API error: ${errorMessage(err)}`);
    }
  }

  stats(): ReviewerStats {
    return {
      enabled: this.enabled,
      reviewCount: this.reviewCount,
      issuesFound: this.issuesFound,
      skippedCount: this.skippedCount,
      circuitState: this.deps.breaker.state,
      totalCostUsd: this.deps.costTracker.totalCostUsd,
      remainingBudgetUsd: this.deps.costTracker.remainingBudgetUsd,
    };
  }

  private buildRequest(artifact: string, context: ReviewContext): ModelRequest {
    const parts: string[] = [];
    if (context.prompt) parts.push(`**Task:** ${context.prompt}`);
    if (context.riskTag) parts.push(`**Risk:** ${context.riskTag}`);
    parts.push(`**Code:**\n\`\`\`typescript\n${artifact}\n\`\`\``);
    parts.push('List the problems you find as a JSON array.');

    return {
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: parts.join('\n\n') },
      ],
      temperature: 0.1,
      maxTokens: this.options.maxTokens,
    };
  }

  private async skipped(context: ReviewContext, reason: string): Promise<ReviewResult> {
    this.skippedCount++;
    if (this.deps.logger) {
      await this.deps.logger.log({
        type: 'ReviewSkipped',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: this.deps.runId,
        payload: { taskId: context.taskId, reason },
      });
    }
    return ReviewResult.skip(reason);
  }
}
