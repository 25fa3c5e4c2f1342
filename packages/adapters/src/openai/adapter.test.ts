import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigError, MemoryLogger, RateLimitError, TimeoutError, type StreamEvent } from '@crucible/shared';
import { OpenAIAdapter } from './adapter';
import type { AdapterContext } from '../types';

const { mockCreate, constructorOptions, MockAPIError, MockTimeoutError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(
      public status: number,
      message: string,
    ) {
      super(message);
    }
  }
  class MockTimeoutError extends Error {}
  const constructorOptions: unknown[] = [];
  return { mockCreate: vi.fn(), constructorOptions, MockAPIError, MockTimeoutError };
});

vi.mock('openai', () => ({
  default: class MockOpenAI {
    chat = { completions: { create: mockCreate } };
    constructor(options: unknown) {
      constructorOptions.push(options);
    }
  },
  APIError: MockAPIError,
  APIConnectionTimeoutError: MockTimeoutError,
}));

describe('OpenAIAdapter', () => {
  let adapter: OpenAIAdapter;
  const mockContext: AdapterContext = {
    runId: 'test-run',
    logger: new MemoryLogger(),
    retryOptions: { maxRetries: 0 },
  };

  beforeEach(() => {
    vi.clearAllMocks();
    constructorOptions.length = 0;

    adapter = new OpenAIAdapter({
      type: 'openai',
      model: 'gpt-4o-mini',
      api_key: 'test-key',
    });
  });

  it('generate returns text and usage and forwards temperature and seed', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: 'const a = 1;' } }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });

    const result = await adapter.generate(
      {
        messages: [
          { role: 'system', content: 'You write TypeScript.' },
          { role: 'user', content: 'Hi' },
        ],
        temperature: 0.8,
        seed: 44,
      },
      mockContext,
    );

    expect(result.text).toBe('const a = 1;');
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'You write TypeScript.' },
          { role: 'user', content: 'Hi' },
        ],
        temperature: 0.8,
        seed: 44,
      }),
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('defaults temperature to 0.2 and leaves text undefined for empty content', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });

    const result = await adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, mockContext);

    expect(result.text).toBeUndefined();
    expect(result.usage).toBeUndefined();
    expect(mockCreate.mock.calls[0][0]).toMatchObject({ temperature: 0.2 });
  });

  it('stream yields usage and text deltas and skips chunks without content', async () => {
    mockCreate.mockResolvedValue(
      (async function* () {
        yield {
          usage: { prompt_tokens: 1, completion_tokens: 2, total_tokens: 3 },
          choices: [{ delta: { content: 'Hello' } }],
        };
        yield { choices: [{}] };
        yield { choices: [{ delta: { content: ' World' } }] };
      })(),
    );

    const events: StreamEvent[] = [];
    for await (const event of adapter.stream({ messages: [{ role: 'user', content: 'Hi' }] }, mockContext)) {
      events.push(event);
    }

    expect(events).toEqual([
      { type: 'usage', usage: { inputTokens: 1, outputTokens: 2, totalTokens: 3 } },
      { type: 'text-delta', content: 'Hello' },
      { type: 'text-delta', content: ' World' },
    ]);
  });

  it('maps RateLimitError', async () => {
    mockCreate.mockRejectedValue(new MockAPIError(429, 'Rate limit'));
    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'hi' }] }, mockContext),
    ).rejects.toThrow(RateLimitError);
  });

  it('maps TimeoutError', async () => {
    mockCreate.mockRejectedValue(new MockTimeoutError('Timeout'));
    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'hi' }] }, mockContext),
    ).rejects.toThrow(TimeoutError);
  });

  it('maps ConfigError for auth failures', async () => {
    mockCreate.mockRejectedValue(new MockAPIError(401, 'Unauthorized'));
    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'hi' }] }, mockContext),
    ).rejects.toThrow(ConfigError);
  });

  it('reports the configured model and seed support', () => {
    expect(adapter.model()).toBe('gpt-4o-mini');
    expect(adapter.capabilities().supportsSeed).toBe(true);
  });

  it('accepts a local base URL without an API key', () => {
    const local = new OpenAIAdapter({
      type: 'openai',
      model: 'local-coder',
      baseURL: 'http://localhost:8000/v1',
    });

    expect(local.model()).toBe('local-coder');
    expect(constructorOptions.at(-1)).toMatchObject({
      apiKey: 'not-needed',
      baseURL: 'http://localhost:8000/v1',
      maxRetries: 0,
    });
  });

  it('throws ConfigError if no API key is available for the hosted API', () => {
    expect(() => new OpenAIAdapter({ type: 'openai', model: 'gpt-4o-mini', api_key_env: 'CRUCIBLE_UNSET_KEY' })).toThrow(
      ConfigError,
    );
  });
});
