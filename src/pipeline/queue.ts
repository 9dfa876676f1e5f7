/**
 * BoundedQueue: the only channel between pipeline stages.
 *
 * push() never waits: when full, the oldest item is dropped and reported via onOverflow.
 * pull() waits for the next item and resolves undefined once the queue is closed and empty.
 */

export interface BoundedQueueOptions<T> {
  /** Used in logs. */
  name: string;
  capacity: number;
  /** Called with the dropped (oldest) item when push() hits capacity. */
  onOverflow?: (dropped: T) => void;
}

type Waiter<T> = (item: T | undefined) => void;

export class BoundedQueue<T extends object> implements AsyncIterable<T> {
  readonly name: string;
  readonly capacity: number;
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private readonly onOverflow?: (dropped: T) => void;

  constructor(options: BoundedQueueOptions<T>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`BoundedQueue(${options.name}): capacity must be a positive integer`);
    }
    this.name = options.name;
    this.capacity = options.capacity;
    this.onOverflow = options.onOverflow;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue an item. Returns the dropped item on overflow.
   * Items pushed after close() are ignored.
   */
  push(item: T): T | undefined {
    if (this.closed) return undefined;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return undefined;
    }
    let dropped: T | undefined;
    if (this.items.length >= this.capacity) {
      dropped = this.items.shift();
      if (dropped !== undefined) this.onOverflow?.(dropped);
    }
    this.items.push(item);
    return dropped;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  /**
   * Wait for the next item. Resolves undefined when the queue is closed and empty,
   * or when the signal aborts.
   */
  pull(signal?: AbortSignal): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed || signal?.aborted) return Promise.resolve(undefined);
    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = (item) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything queued. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  /** Stop accepting items; pending pull() calls resolve undefined once the backlog is consumed. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w(undefined);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = await this.pull();
      if (item === undefined) return;
      yield item;
    }
  }
}
