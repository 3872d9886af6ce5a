export const DEFAULT_CHANNEL_CAPACITY = 16;

/**
 * Bounded, ordered, single-consumer channel between a task's executor and
 * whoever reports on it.
 *
 * `publish` resolves once the event is buffered and waits while the buffer
 * is full. Iteration ends once the channel is closed and drained. If the
 * consumer stops iterating early, later events are discarded so the
 * producer never blocks on a reader that is gone.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly capacity: number;
  private readonly buffer: T[] = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private dataWaiter: (() => void) | null = null;
  private closed = false;
  private consumed = false;
  private detached = false;

  constructor(capacity = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`EventChannel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of events buffered and not yet taken by the consumer. */
  get pending(): number {
    return this.buffer.length;
  }

  async publish(event: T): Promise<void> {
    if (this.closed) {
      throw new Error('Cannot publish to a closed EventChannel');
    }
    while (this.buffer.length >= this.capacity && !this.detached) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    if (this.detached) return;

    this.buffer.push(event);
    this.wakeConsumer();
  }

  /** No further events. Safe to call more than once. */
  close(): void {
    this.closed = true;
    this.wakeConsumer();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new Error('EventChannel supports a single consumer');
    }
    this.consumed = true;

    try {
      while (true) {
        if (this.buffer.length > 0) {
          const [event] = this.buffer.splice(0, 1);
          this.wakePublisher();
          yield event;
          continue;
        }
        if (this.closed) return;
        await new Promise<void>((resolve) => {
          this.dataWaiter = resolve;
        });
      }
    } finally {
      if (!this.closed || this.buffer.length > 0) {
        this.detached = true;
        this.buffer.length = 0;
        for (const wake of this.spaceWaiters.splice(0)) wake();
      }
    }
  }

  private wakeConsumer(): void {
    const wake = this.dataWaiter;
    this.dataWaiter = null;
    wake?.();
  }

  private wakePublisher(): void {
    this.spaceWaiters.shift()?.();
  }
}
