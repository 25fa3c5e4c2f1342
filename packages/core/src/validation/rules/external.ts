import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ProcessRunner, type ProcessResult, type RunnerContext } from '@crucible/exec';
import { BaseRule, round2 } from './base';
import type { RuleResult, Severity } from '../types';

export interface ExternalRuleOptions {
  /** Executable; defaults to the tool's usual binary name */
  command?: string;
  /** Arguments placed before the artifact path */
  args?: string[];
  timeoutMs?: number;
  runner?: ProcessRunner;
  context?: RunnerContext;
}

export interface ExternalFindings {
  errors: string[];
  warnings: string[];
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Validator backed by a command-line tool. The artifact is written to a temp
 * file whose path is appended to the arguments. A missing tool passes with a
 * warning; a timeout or output that cannot be parsed fails with score 0.5.
 */
export abstract class ExternalRule extends BaseRule {
  readonly severity: Severity = 'warning';
  protected readonly command: string;
  protected readonly args: string[];
  readonly timeoutMs: number;
  private readonly runner: ProcessRunner;
  private readonly context?: RunnerContext;

  constructor(defaults: { command: string; args: string[] }, options: ExternalRuleOptions = {}) {
    super();
    this.command = options.command ?? defaults.command;
    this.args = options.args ?? defaults.args;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? new ProcessRunner();
    this.context = options.context;
  }

  config(): Record<string, unknown> {
    return { command: this.command, args: this.args, timeoutMs: this.timeoutMs };
  }

  /** Findings from a completed run, or undefined when the output is not understood */
  protected abstract parseOutput(result: ProcessResult): ExternalFindings | undefined;

  protected abstract scoreFindings(findings: ExternalFindings): number;

  async check(artifact: string): Promise<RuleResult> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'crucible-'));
    try {
      const file = path.join(dir, 'artifact.ts');
      await fs.writeFile(file, artifact, 'utf8');

      const result = await this.runner.run(
        { command: this.command, args: [...this.args, file], cwd: dir, timeoutMs: this.timeoutMs },
        this.context,
      );

      if (result.outcome === 'not_found') {
        return { ...this.ok(1, [`${this.name}: tool not installed (skipped)`]), transient: true };
      }
      if (result.outcome === 'timeout') {
        return {
          ...this.fail(0.5, [`${this.name}: timed out after ${this.timeoutMs}ms`]),
          transient: true,
        };
      }
      if (result.exitCode === 0 && result.stdout.trim() === '') {
        return this.ok(1);
      }

      const findings = this.parseOutput(result);
      if (!findings) {
        return this.fail(0.5, [`${this.name}: unparseable output`]);
      }
      if (findings.errors.length === 0 && findings.warnings.length === 0) {
        return this.ok(result.exitCode === 0 ? 1 : 0.9);
      }

      const score = round2(this.scoreFindings(findings));
      return findings.errors.length === 0
        ? this.ok(score, findings.warnings)
        : this.fail(score, findings.errors, findings.warnings);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

const EslintReportSchema = z.array(
  z.object({
    messages: z.array(
      z.object({
        ruleId: z.string().nullable().optional(),
        severity: z.number(),
        message: z.string(),
        line: z.number().optional(),
      }),
    ),
  }),
);

/** Runs `eslint --format json` against the artifact. */
export class EslintRule extends ExternalRule {
  readonly name = 'eslint';

  constructor(options: ExternalRuleOptions = {}) {
    super({ command: 'eslint', args: ['--format', 'json', '--no-ignore'] }, options);
  }

  protected parseOutput(result: ProcessResult): ExternalFindings | undefined {
    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch {
      return undefined;
    }
    const parsed = EslintReportSchema.safeParse(json);
    if (!parsed.success) {
      return undefined;
    }

    const findings: ExternalFindings = { errors: [], warnings: [] };
    for (const message of parsed.data.flatMap((file) => file.messages)) {
      const text = `${message.ruleId ?? 'eslint'}: ${message.message} (line ${message.line ?? 0})`;
      (message.severity >= 2 ? findings.errors : findings.warnings).push(text);
    }
    return findings;
  }

  protected scoreFindings({ errors, warnings }: ExternalFindings): number {
    return Math.max(0.1, 1 - errors.length * 0.15 - warnings.length * 0.05);
  }
}

const TSC_LINE = /^.*\((\d+),(\d+)\): (error|warning) (TS\d+): (.*)$/;

/** Type-checks the artifact in isolation with `tsc --noEmit`. */
export class TscRule extends ExternalRule {
  readonly name = 'tsc';

  constructor(options: ExternalRuleOptions = {}) {
    super(
      {
        command: 'tsc',
        args: ['--noEmit', '--strict', '--skipLibCheck', '--target', 'ES2022', '--pretty', 'false'],
      },
      options,
    );
  }

  protected parseOutput(result: ProcessResult): ExternalFindings | undefined {
    const findings: ExternalFindings = { errors: [], warnings: [] };
    for (const line of result.stdout.split(/\r?\n/)) {
      const match = TSC_LINE.exec(line.trim());
      if (!match) continue;
      const [, row, , kind, code, message] = match;
      (kind === 'error' ? findings.errors : findings.warnings).push(
        `${code}: ${message} (line ${row})`,
      );
    }
    if (result.exitCode !== 0 && findings.errors.length === 0) {
      return undefined;
    }
    return findings;
  }

  protected scoreFindings({ errors }: ExternalFindings): number {
    return Math.max(0.1, 1 - errors.length * 0.2);
  }
}
