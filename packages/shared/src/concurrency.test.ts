import { BoundedChannel, mapWithConcurrency, withTimeout } from './concurrency';
import { TimeoutError } from './errors';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order when later items finish first', async () => {
    const result = await mapWithConcurrency([30, 5, 15], 3, async (ms, i) => {
      await delay(ms);
      return `${i}:${ms}`;
    });
    expect(result).toEqual(['0:30', '1:5', '2:15']);
  });

  it('never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
    });
    expect(peak).toBe(2);
  });

  it('returns an empty array for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it('treats a limit below one as sequential', async () => {
    const order: number[] = [];
    await mapWithConcurrency([1, 2, 3], 0, async (n) => {
      order.push(n);
    });
    expect(order).toEqual([1, 2, 3]);
  });
});

describe('withTimeout', () => {
  it('resolves when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50)).resolves.toBe('ok');
  });

  it('rejects with TimeoutError and the given message', async () => {
    const slow = delay(200).then(() => 'late');
    await expect(withTimeout(slow, 10, 'too slow')).rejects.toThrow(TimeoutError);
    await expect(withTimeout(delay(200), 10, 'too slow')).rejects.toThrow('too slow');
  });
});

describe('BoundedChannel', () => {
  it('rejects a capacity below one', () => {
    expect(() => new BoundedChannel<number>(0)).toThrow(/capacity/);
  });

  it('delivers buffered values in order and ends after close', async () => {
    const channel = new BoundedChannel<string>(4);
    await channel.send('a');
    await channel.send('b');
    channel.close();

    const received: string[] = [];
    for await (const value of channel) {
      received.push(value);
    }
    expect(received).toEqual(['a', 'b']);
  });

  it('hands a value straight to a waiting receiver', async () => {
    const channel = new BoundedChannel<number>(1);
    const pending = channel.receive();
    await channel.send(7);
    await expect(pending).resolves.toEqual({ done: false, value: 7 });
    expect(channel.size).toBe(0);
  });

  it('blocks senders while the buffer is full', async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);

    let secondSent = false;
    const second = channel.send(2).then(() => {
      secondSent = true;
    });
    await delay(5);
    expect(secondSent).toBe(false);

    await expect(channel.receive()).resolves.toEqual({ done: false, value: 1 });
    await second;
    expect(secondSent).toBe(true);
    await expect(channel.receive()).resolves.toEqual({ done: false, value: 2 });
  });

  it('times out a receive without closing the channel', async () => {
    const channel = new BoundedChannel<number>(2);
    await expect(channel.receive(10)).rejects.toThrow(TimeoutError);
    expect(channel.isClosed).toBe(false);

    await channel.send(3);
    await expect(channel.receive(10)).resolves.toEqual({ done: false, value: 3 });
  });

  it('propagates a close error to the consumer after draining', async () => {
    const channel = new BoundedChannel<number>(2);
    await channel.send(1);
    channel.close(new Error('stream broke'));

    await expect(channel.receive()).resolves.toEqual({ done: false, value: 1 });
    await expect(channel.receive()).rejects.toThrow('stream broke');
  });

  it('rejects a waiting receiver when closed with an error', async () => {
    const channel = new BoundedChannel<number>(1);
    const pending = channel.receive();
    channel.close(new Error('gone'));
    await expect(pending).rejects.toThrow('gone');
  });

  it('rejects sends after close, including blocked ones', async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);
    channel.close();
    await expect(blocked).rejects.toThrow('Cannot send on a closed channel');
    await expect(channel.send(3)).rejects.toThrow('Cannot send on a closed channel');
  });

  it('allows only one pending receiver', async () => {
    const channel = new BoundedChannel<number>(1);
    const first = channel.receive();
    await expect(channel.receive()).rejects.toThrow(/single pending receiver/);
    channel.close();
    await expect(first).resolves.toEqual({ done: true });
  });
});
