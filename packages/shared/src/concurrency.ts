import { TimeoutError } from './errors';

/**
 * Maps `items` through `fn` with at most `limit` calls in flight.
 * Results keep the order of `items` regardless of completion order.
 * A rejection from `fn` rejects the whole call; callers that need isolation
 * catch inside `fn`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.max(1, Math.min(Math.floor(limit), items.length));
  let cursor = 0;

  const work = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workers }, () => work()));
  return results;
}

/**
 * Rejects with a TimeoutError if `promise` has not settled within `timeoutMs`.
 * The timer is cleared as soon as the promise settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message = `Operation timed out after ${timeoutMs}ms`,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type ChannelReceive<T> = { done: false; value: T } | { done: true };

interface PendingReceiver<T> {
  resolve: (result: ChannelReceive<T>) => void;
  reject: (err: unknown) => void;
}

/**
 * Single-consumer channel with a fixed buffer. `send` waits while the buffer is
 * full, `receive` waits while it is empty. Closing with an error makes the next
 * `receive` after the buffer drains reject with it.
 */
export class BoundedChannel<T> {
  private readonly buffer: T[] = [];
  private readonly senders: Array<() => void> = [];
  private receiver: PendingReceiver<T> | undefined;
  private closed = false;
  private failure: unknown;

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new Error('BoundedChannel capacity must be at least 1');
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T): Promise<void> {
    while (this.buffer.length >= this.capacity && !this.closed) {
      await new Promise<void>((resolve) => this.senders.push(resolve));
    }
    if (this.closed) {
      throw new Error('Cannot send on a closed channel');
    }
    if (this.receiver) {
      const { resolve } = this.receiver;
      this.receiver = undefined;
      resolve({ done: false, value });
      return;
    }
    this.buffer.push(value);
  }

  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = error;
    for (const wake of this.senders.splice(0)) wake();
    if (this.receiver && this.buffer.length === 0) {
      const pending = this.receiver;
      this.receiver = undefined;
      if (error !== undefined) {
        pending.reject(error);
      } else {
        pending.resolve({ done: true });
      }
    }
  }

  /**
   * Takes the next value. With `timeoutMs`, rejects with a TimeoutError when no
   * value arrives in time; the channel stays usable afterwards.
   */
  receive(timeoutMs?: number): Promise<ChannelReceive<T>> {
    if (this.receiver) {
      return Promise.reject(new Error('BoundedChannel supports a single pending receiver'));
    }
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.senders.shift()?.();
      return Promise.resolve<ChannelReceive<T>>({ done: false, value });
    }
    if (this.closed) {
      return this.failure !== undefined
        ? Promise.reject(this.failure)
        : Promise.resolve<ChannelReceive<T>>({ done: true });
    }

    return new Promise<ChannelReceive<T>>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const settle = <A>(fn: (arg: A) => void) => (arg: A) => {
        clearTimeout(timer);
        fn(arg);
      };
      const pending: PendingReceiver<T> = { resolve: settle(resolve), reject: settle(reject) };
      this.receiver = pending;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (this.receiver === pending) {
            this.receiver = undefined;
            reject(new TimeoutError(`No value received within ${timeoutMs}ms`));
          }
        }, timeoutMs);
      }
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }
}
