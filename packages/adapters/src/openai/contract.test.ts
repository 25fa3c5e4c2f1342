import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { MemoryLogger, RateLimitError } from '@crucible/shared';
import { OpenAIAdapter } from './adapter';
import type { AdapterContext } from '../types';

describe('OpenAIAdapter Contract', () => {
  const mockContext: AdapterContext = {
    runId: 'test-run',
    logger: new MemoryLogger(),
    retryOptions: { maxRetries: 0 },
  };

  beforeEach(() => {
    nock.cleanAll();
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
    nock.enableNetConnect();
  });

  it('sends model, temperature and seed to the hosted API', async () => {
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o-mini', api_key: 'test-key' });
    const scope = nock('https://api.openai.com')
      .post('/v1/chat/completions', (body) => {
        return (
          body.model === 'gpt-4o-mini' &&
          body.messages[0].content === 'Hi' &&
          body.temperature === 0.5 &&
          body.seed === 43
        );
      })
      .reply(200, {
        id: 'chatcmpl-123',
        object: 'chat.completion',
        created: 1677652288,
        model: 'gpt-4o-mini',
        choices: [
          {
            index: 0,
            message: { role: 'assistant', content: 'Hello there' },
            finish_reason: 'stop',
          },
        ],
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      });

    const result = await adapter.generate(
      { messages: [{ role: 'user', content: 'Hi' }], temperature: 0.5, seed: 43 },
      mockContext,
    );

    expect(result.text).toBe('Hello there');
    expect(result.usage?.totalTokens).toBe(15);
    expect(scope.isDone()).toBe(true);
  });

  it('talks to an OpenAI-compatible local server through baseURL', async () => {
    const adapter = new OpenAIAdapter({
      type: 'openai',
      model: 'local-coder',
      baseURL: 'http://localhost:8000/v1',
    });
    const scope = nock('http://localhost:8000')
      .post('/v1/chat/completions')
      .reply(200, {
        id: 'local-1',
        object: 'chat.completion',
        created: 1677652288,
        model: 'local-coder',
        choices: [{ index: 0, message: { role: 'assistant', content: 'ok' }, finish_reason: 'stop' }],
      });

    const result = await adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, mockContext);

    expect(result.text).toBe('ok');
    expect(scope.isDone()).toBe(true);
  });

  it('handles 429 Rate Limit', async () => {
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o-mini', api_key: 'test-key' });
    nock('https://api.openai.com')
      .persist()
      .post('/v1/chat/completions')
      .reply(429, {
        error: { message: 'Rate limit exceeded', type: 'requests', param: null, code: null },
      });

    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, mockContext),
    ).rejects.toThrow(RateLimitError);
  });
});
