/**
 * Error codes used throughout the pipeline.
 * User-correctable errors (bad configuration) are separated from runtime failures.
 */
export type ErrorCode =
  // User-correctable errors
  | 'ConfigError'
  // Runtime errors
  | 'ProviderError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'ToolError'
  | 'ProcessError'
  | 'BudgetError'
  | 'CircuitOpenError'
  | 'ValidationError'
  | 'GenerationError'
  | 'EmptyPoolError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all pipeline errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'API request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'openai' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when an LLM provider fails.
 * May be retryable depending on the underlying cause.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * Error thrown when rate limited by an API.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when an external tool cannot be started.
 */
export class ToolError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolError', message, options);
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when a cost budget would be exceeded.
 */
export class BudgetExceededError extends AppError {
  /** The specific budget that was exceeded */
  public readonly reason: string;

  constructor(reason: string, options: AppErrorOptions = {}) {
    super('BudgetError', `Budget exceeded: ${reason}`, options);
    this.reason = reason;
  }
}

/**
 * Error thrown when a call is refused by an open circuit breaker.
 */
export class CircuitOpenError extends AppError {
  constructor(message = 'Circuit breaker is open', options: AppErrorOptions = {}) {
    super('CircuitOpenError', message, options);
  }
}

/**
 * Error thrown when a validator is misconfigured or a validation run cannot start.
 */
export class ValidationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ValidationError', message, options);
  }
}

/**
 * Error thrown when a candidate cannot be generated.
 */
export class GenerationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('GenerationError', message, options);
  }
}

/**
 * Error thrown when selection is attempted on a pool with no candidates.
 */
export class EmptyPoolError extends AppError {
  /** Task whose pool was empty */
  public readonly taskId: string;

  constructor(taskId: string, options: AppErrorOptions = {}) {
    super('EmptyPoolError', `Candidate pool for task "${taskId}" is empty`, options);
    this.taskId = taskId;
  }
}

/**
 * Renders an unknown thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
