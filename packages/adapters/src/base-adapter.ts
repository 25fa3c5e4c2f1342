import { ConfigError, RateLimitError, TimeoutError, type ProviderConfig } from '@crucible/shared';

/**
 * Interface for API error types that have a status code.
 * Used by the base adapter to handle common error mapping.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Configuration for error type checking in provider adapters.
 * Each provider can supply its own error class checks.
 */
export interface ErrorTypeConfig {
  /** Check if the error is an API error with status code */
  isAPIError: (error: unknown) => error is APIErrorLike;
  /** Check if the error is a connection timeout error */
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for LLM provider adapters that provides common error mapping logic.
 * Subclasses should configure error type checks for their specific SDK.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  /**
   * Maps provider-specific errors to standardized errors:
   * - 429 status -> RateLimitError
   * - 401 status -> ConfigError
   * - Timeout errors -> TimeoutError
   * - Other errors -> passed through or wrapped
   */
  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}

/**
 * Reads the API key from `api_key`, falling back to the environment variable named by
 * `api_key_env`. Returns undefined when neither yields a value.
 */
export function resolveApiKey(
  config: ProviderConfig,
  env: Record<string, string | undefined> = process.env,
): string | undefined {
  if (config.api_key) return config.api_key;
  if (config.api_key_env) return env[config.api_key_env] || undefined;
  return undefined;
}
