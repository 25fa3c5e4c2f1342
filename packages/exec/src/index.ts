export { ProcessRunner, buildSafeEnv } from './runner/runner';
export type {
  ProcessRequest,
  ProcessResult,
  ProcessOutcome,
  RunnerContext,
} from './runner/runner';
