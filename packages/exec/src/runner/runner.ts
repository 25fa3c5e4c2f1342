import { spawn, spawnSync } from 'child_process';
import { ToolError, type Logger } from '@crucible/shared';

function killProcessTree(pid: number, logger?: Logger): void {
  if (process.platform === 'win32') {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  // Negative PID signals the whole group; the child is spawned detached.
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    void logger?.debug(`Process group ${pid} already gone: ${String(err)}`);
  }
}

// Minimal env vars that external linters and compilers commonly need.
// Anything else must be passed through ProcessRequest.envAllowlist.
const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  'XDG_CONFIG_HOME',
  'XDG_CACHE_HOME',
  'NODE_ENV',
  'NODE_PATH',
  // Windows
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
];

export function buildSafeEnv(
  baseEnv: NodeJS.ProcessEnv,
  allowlist: readonly string[] = [],
  extra: Record<string, string> = {},
): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  const pathValue = baseEnv.PATH ?? baseEnv.Path;
  if (pathValue) {
    safeEnv.PATH = pathValue;
  }

  for (const key of [...BASELINE_ENV_KEYS, ...allowlist]) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  return { ...safeEnv, ...extra };
}

export interface ProcessRequest {
  /** Executable name or path; never interpreted by a shell */
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs: number;
  /** Extra variables set on top of the baseline environment */
  env?: Record<string, string>;
  /** Names copied from process.env in addition to the baseline */
  envAllowlist?: string[];
  /** Combined stdout+stderr cap; output beyond it is dropped and the process killed */
  maxOutputBytes?: number;
}

/**
 * `exited`: the process ran to completion (any exit code).
 * `timeout`: killed after `timeoutMs`.
 * `not_found`: the executable does not exist.
 */
export type ProcessOutcome = 'exited' | 'timeout' | 'not_found';

export interface ProcessResult {
  outcome: ProcessOutcome;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  truncated: boolean;
}

export interface RunnerContext {
  runId: string;
  logger?: Logger;
}

const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

function isMissingExecutable(err: Error): boolean {
  return 'code' in err && (err.code === 'ENOENT' || err.code === 'EACCES');
}

/**
 * Spawns external static-check tools with a hard timeout and captures their
 * output in memory. Failure to find the tool and running out of time are
 * reported as outcomes; only unexpected spawn failures reject.
 */
export class ProcessRunner {
  async run(req: ProcessRequest, ctx?: RunnerContext): Promise<ProcessResult> {
    const result = await this.exec(req, ctx?.logger);

    if (ctx?.logger) {
      await ctx.logger.log({
        type: 'ExternalToolFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: ctx.runId,
        payload: {
          tool: req.command,
          command: [req.command, ...req.args].join(' '),
          outcome: result.outcome,
          exitCode: result.exitCode,
          durationMs: result.durationMs,
        },
      });
    }

    return result;
  }

  protected exec(req: ProcessRequest, logger?: Logger): Promise<ProcessResult> {
    const maxOutputBytes = req.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const env = buildSafeEnv(process.env, req.envAllowlist, req.env);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let outputBytes = 0;
    let truncated = false;
    let timedOut = false;

    const start = Date.now();

    return new Promise<ProcessResult>((resolve, reject) => {
      let settled = false;
      const child = spawn(req.command, req.args, {
        cwd: req.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
        detached: process.platform !== 'win32',
      });

      const finish = (outcome: ProcessOutcome, exitCode: number | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        resolve({
          outcome,
          exitCode,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr: Buffer.concat(stderrChunks).toString('utf8'),
          durationMs: Date.now() - start,
          truncated,
        });
      };

      const timeoutTimer = setTimeout(() => {
        if (settled) return;
        timedOut = true;
        if (child.pid) {
          killProcessTree(child.pid, logger);
        }
        finish('timeout', null);
      }, req.timeoutMs);

      const collect = (target: Buffer[]) => (chunk: Buffer) => {
        if (truncated) return;
        const room = maxOutputBytes - outputBytes;
        if (chunk.length > room) {
          truncated = true;
          target.push(chunk.subarray(0, Math.max(0, room)));
          outputBytes = maxOutputBytes;
          if (child.pid) {
            killProcessTree(child.pid, logger);
          }
          return;
        }
        outputBytes += chunk.length;
        target.push(chunk);
      };

      child.stdout.on('data', collect(stdoutChunks));
      child.stderr.on('data', collect(stderrChunks));

      child.on('error', (err) => {
        if (isMissingExecutable(err)) {
          finish('not_found', null);
          return;
        }
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        reject(new ToolError(`Failed to start process: ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        finish(timedOut ? 'timeout' : 'exited', code);
      });
    });
  }
}
