import { describe, it, expect } from 'vitest';
import { ConfigError, RateLimitError, TimeoutError } from '@crucible/shared';
import {
  BaseProviderAdapter,
  resolveApiKey,
  type APIErrorLike,
  type ErrorTypeConfig,
} from './base-adapter';

class TestAdapter extends BaseProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike =>
      typeof error === 'object' &&
      error !== null &&
      'status' in error &&
      typeof error.status === 'number' &&
      'message' in error &&
      typeof error.message === 'string',
    isTimeoutError: (error: unknown): boolean => error === 'timeout',
  };

  public map(error: unknown): Error {
    return this.mapError(error);
  }
}

describe('BaseProviderAdapter.mapError', () => {
  const adapter = new TestAdapter();

  it('maps 429 to RateLimitError', () => {
    expect(adapter.map({ status: 429, message: 'rate limited' })).toBeInstanceOf(RateLimitError);
  });

  it('maps 401 to ConfigError', () => {
    expect(adapter.map({ status: 401, message: 'unauthorized' })).toBeInstanceOf(ConfigError);
  });

  it('passes through other API errors', () => {
    const original = Object.assign(new Error('server'), { status: 500 });
    expect(adapter.map(original)).toBe(original);
  });

  it('maps timeout errors to TimeoutError', () => {
    expect(adapter.map('timeout')).toBeInstanceOf(TimeoutError);
  });

  it('wraps non-Error values', () => {
    const err = adapter.map(123);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('123');
  });
});

describe('resolveApiKey', () => {
  it('prefers the inline key', () => {
    expect(
      resolveApiKey({ type: 'openai', model: 'm', api_key: 'test-key', api_key_env: 'X' }, { X: 'env' }),
    ).toBe('test-key');
  });

  it('falls back to the named environment variable', () => {
    expect(resolveApiKey({ type: 'openai', model: 'm', api_key_env: 'TEST_KEY' }, { TEST_KEY: 'env-key' })).toBe(
      'env-key',
    );
  });

  it('returns undefined for a missing or empty variable', () => {
    expect(resolveApiKey({ type: 'openai', model: 'm', api_key_env: 'TEST_KEY' }, { TEST_KEY: '' })).toBeUndefined();
    expect(resolveApiKey({ type: 'openai', model: 'm' }, {})).toBeUndefined();
  });
});
