import { describe, it, expect } from 'vitest';
import { FakeAdapter, type AdapterContext } from '@crucible/adapters';
import { MemoryLogger, type StreamEvent } from '@crucible/shared';
import { CostTrackingAdapter } from './proxy';
import { CostTracker } from './tracker';

const ctx: AdapterContext = { runId: 'r1', logger: new MemoryLogger() };
const request = { messages: [{ role: 'user' as const, content: 'hi' }] };
const usage = { inputTokens: 1_000_000, outputTokens: 0, totalTokens: 1_000_000 };

describe('CostTrackingAdapter', () => {
  it('forwards identity and records usage on generate', async () => {
    const tracker = new CostTracker();
    const base = new FakeAdapter({
      id: 'base',
      model: 'fake-coder',
      replies: ['hi'],
      usage,
      pricing: { inputPerMTokUsd: 3 },
    });
    const adapter = new CostTrackingAdapter('provider-1', base, tracker);

    const resp = await adapter.generate(request, ctx);

    expect(resp.text).toBe('hi');
    expect(adapter.id()).toBe('base');
    expect(adapter.model()).toBe('fake-coder');
    expect(tracker.getSummary().providers['provider-1'].estimatedCostUsd).toBe(3);
  });

  it('does not record usage when the response has none', async () => {
    const tracker = new CostTracker();
    const adapter = new CostTrackingAdapter('provider-1', new FakeAdapter({ replies: ['hi'] }), tracker);

    await adapter.generate(request, ctx);

    expect(tracker.getSummary().providers).toEqual({});
  });

  it('streams events and records usage events', async () => {
    const tracker = new CostTracker();
    const base = new FakeAdapter({ replies: ['abcd'], usage, streamChunkSize: 2 });
    const adapter = new CostTrackingAdapter('provider-1', base, tracker);

    const events: StreamEvent[] = [];
    for await (const event of adapter.stream(request, ctx)) {
      events.push(event);
    }

    expect(events).toEqual([
      { type: 'text-delta', content: 'ab' },
      { type: 'text-delta', content: 'cd' },
      { type: 'usage', usage },
    ]);
    expect(tracker.getSummary().providers['provider-1'].inputTokens).toBe(1_000_000);
  });
});
