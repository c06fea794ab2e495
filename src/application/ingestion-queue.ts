export type OfferResult = 'accepted' | 'rejected';

interface ParkedConsumer<T> {
  resolve: (item: T | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * Bounded multi-producer / single-consumer FIFO.
 *
 * `offer` is synchronous and never waits: it either stores the item,
 * hands it straight to a parked consumer, or rejects it when the ring is
 * full. Producers share the one event loop, so each `offer` runs to
 * completion before the next and an item is handed out at most once.
 *
 * The consumer's wait timer is unref'd and never holds the process open.
 */
export class IngestionQueue<T extends NonNullable<unknown>> {
  readonly capacity: number;
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;
  private parked: ParkedConsumer<T> | null = null;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  /** Items currently buffered (excludes one already handed to the consumer). */
  get size(): number {
    return this.count;
  }

  offer(item: T): OfferResult {
    const consumer = this.parked;
    if (consumer !== null) {
      // A parked consumer implies an empty ring.
      this.parked = null;
      clearTimeout(consumer.timer);
      consumer.resolve(item);
      return 'accepted';
    }

    if (this.count === this.capacity) return 'rejected';

    this.slots[(this.head + this.count) % this.capacity] = item;
    this.count++;
    return 'accepted';
  }

  /**
   * Waits for the next item, at most `timeoutMs`.
   * Resolves with `null` when the wait times out. Only one `take` may be
   * pending at a time.
   */
  take(timeoutMs: number): Promise<T | null> {
    if (this.parked !== null) {
      return Promise.reject(new Error('IngestionQueue already has a waiting consumer'));
    }

    const item = this.poll();
    if (item !== undefined) return Promise.resolve(item);
    if (timeoutMs <= 0) return Promise.resolve(null);

    return new Promise<T | null>((resolve) => {
      const timer = setTimeout(() => {
        this.parked = null;
        resolve(null);
      }, timeoutMs);
      timer.unref();
      this.parked = { resolve, timer };
    });
  }

  /** Removes and returns the oldest buffered item without waiting. */
  poll(): T | undefined {
    if (this.count === 0) return undefined;

    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }
}
