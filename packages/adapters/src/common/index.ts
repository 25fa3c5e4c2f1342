import { ConfigError, RateLimitError, TimeoutError } from '@crucible/shared';
import type { AdapterContext, RetryOptions } from '../types';

/**
 * Default retry options for provider API requests.
 *
 * ## Retriable Errors
 *
 * - `RateLimitError` (HTTP 429)
 * - `TimeoutError`
 * - Server errors (HTTP 5xx)
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED)
 *
 * ## Non-Retriable Errors
 *
 * - `ConfigError` (HTTP 401 - authentication)
 * - Client errors (HTTP 4xx except 429)
 * - Abort signals (caller cancellation)
 *
 * ## Delay Calculation
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * finalDelay = max(0, delay + jitter)
 * ```
 *
 * Retry attempts are reported through the `ProviderRequestFinished` event.
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function networkCodeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return networkCodeOf(error.cause);
  return undefined;
}

/**
 * Determines if an error is transient and safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = networkCodeOf(error);
  return code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNREFUSED';
}

/**
 * Executes a provider request with automatic retry, timeout, and abort handling.
 *
 * Each attempt gets its own AbortSignal. When `ctx.timeoutMs` elapses the signal is
 * aborted and the attempt rejects with a TimeoutError even if `requestFn` ignores
 * the signal.
 *
 * ```typescript
 * const result = await executeProviderRequest(
 *   ctx,
 *   'anthropic',
 *   'claude-3-5-sonnet-latest',
 *   (signal) => client.messages.create({ ... }, { signal }),
 *   { maxRetries: 0 },
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      model,
    },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= maxRetries) {
    const abortController = new AbortController();

    const abortHandler = () => {
      abortController.abort(ctx.abortSignal?.reason);
    };

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort(ctx.abortSignal.reason);
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    const attempt = ctx.timeoutMs
      ? Promise.race([
          requestFn(abortController.signal),
          new Promise<never>((_, reject) => {
            timeoutId = setTimeout(() => {
              const timeoutError = new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`);
              abortController.abort(timeoutError);
              reject(timeoutError);
            }, ctx.timeoutMs);
          }),
        ])
      : requestFn(abortController.signal);

    try {
      const result = await attempt;

      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      const durationMs = Date.now() - startTime;
      await ctx.logger.log({
        type: 'ProviderRequestFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: ctx.runId,
        payload: {
          provider,
          durationMs,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      lastError = error;

      // Caller cancellation is never retried
      if (ctx.abortSignal?.aborted) {
        throw error;
      }

      if (error instanceof ConfigError) {
        break;
      }

      if (!isRetriableError(error) || attempts >= maxRetries) {
        break;
      }

      attempts++;

      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      const finalDelay = Math.max(0, delay + jitter);

      await new Promise((resolve) => setTimeout(resolve, finalDelay));
    }
  }

  const durationMs = Date.now() - startTime;
  await ctx.logger.log({
    type: 'ProviderRequestFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      durationMs,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}
