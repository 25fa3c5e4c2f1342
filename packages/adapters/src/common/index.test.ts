import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigError, MemoryLogger, RateLimitError, TimeoutError } from '@crucible/shared';
import { executeProviderRequest, isRetriableError } from './index';
import type { AdapterContext } from '../types';

describe('executeProviderRequest', () => {
  let ctx: AdapterContext;
  let logger: MemoryLogger;

  beforeEach(() => {
    logger = new MemoryLogger();
    ctx = { runId: 'test-run', logger };
  });

  const finished = () => logger.eventsOfType('ProviderRequestFinished');

  it('executes successfully without retries', async () => {
    const fn = vi.fn().mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn);

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(logger.events[0]).toMatchObject({
      type: 'ProviderRequestStarted',
      runId: 'test-run',
      payload: { provider: 'test', model: 'model' },
    });
    expect(finished()[0]).toMatchObject({ payload: { success: true, retries: 0 } });
  });

  it('retries on a retriable error', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitError('Limit reached'))
      .mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn, { initialDelayMs: 1 });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(finished()[0]).toMatchObject({ payload: { success: true, retries: 1 } });
  });

  it('fails after max retries', async () => {
    const fn = vi.fn().mockRejectedValue(new RateLimitError('Limit reached'));

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 2, initialDelayMs: 1 }),
    ).rejects.toThrow(RateLimitError);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(finished()[0]).toMatchObject({
      payload: { success: false, retries: 2, error: 'Limit reached' },
    });
  });

  it('does not retry config errors', async () => {
    const fn = vi.fn().mockRejectedValue(new ConfigError('Bad config'));

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toThrow(ConfigError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('times out attempts that ignore the abort signal', async () => {
    ctx.timeoutMs = 10;
    const fn = vi.fn(() => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200)));

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 1, initialDelayMs: 1 }),
    ).rejects.toThrow(TimeoutError);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('aborts the per-attempt signal on timeout', async () => {
    ctx.timeoutMs = 10;
    let seen: AbortSignal | undefined;
    const fn = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((_, reject) => {
          seen = signal;
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    );

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 0 }),
    ).rejects.toThrow('Request timed out after 10ms');
    expect(seen?.aborted).toBe(true);
  });

  it('does not retry after caller cancellation', async () => {
    const controller = new AbortController();
    ctx.abortSignal = controller.signal;

    const fn = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    const promise = executeProviderRequest(ctx, 'test', 'model', fn);
    setTimeout(() => controller.abort(), 10);

    await expect(promise).rejects.toThrow('aborted');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries on 5xx status codes and network codes', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce({ status: 503 })
      .mockRejectedValueOnce({ cause: { code: 'ETIMEDOUT' } })
      .mockResolvedValue('ok');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn, {
      maxRetries: 5,
      initialDelayMs: 1,
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('logs non-Error failures with their string form', async () => {
    const fn = vi.fn().mockRejectedValue('fail');

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toBe('fail');
    expect(finished()).toHaveLength(1);
    expect(finished()[0]).toMatchObject({ payload: { success: false, error: 'fail' } });
  });
});

describe('isRetriableError', () => {
  it.each([
    [new TimeoutError('t'), true],
    [{ status: 429 }, true],
    [{ statusCode: 502 }, true],
    [{ status: 400 }, false],
    [{ code: 'ECONNREFUSED' }, true],
    [{ code: 'ENOENT' }, false],
    [new Error('plain'), false],
    ['string', false],
  ])('classifies %o as %s', (error, expected) => {
    expect(isRetriableError(error)).toBe(expected);
  });
});
