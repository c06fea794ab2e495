import type { LogRecord } from '../domain/index.js';
import type { IngestionQueue } from './ingestion-queue.js';

/**
 * Result of one `collect` step.
 *
 * - `appended`  record added, no flush due yet
 * - `size`      batch reached the size threshold
 * - `interval`  flush interval elapsed with a non-empty batch
 * - `idle`      flush interval elapsed with an empty batch; clock restarted
 * - `pending`   woke up early, nothing to do
 */
export type CollectOutcome = 'appended' | 'size' | 'interval' | 'idle' | 'pending';

export type Clock = () => number;

/**
 * Accumulates records into the in-flight batch and decides when it is due.
 *
 * Owned by the pipeline's single background loop; nothing else reads or
 * writes the batch. `clear` swaps in a fresh array instead of truncating,
 * so a batch handed to the delivery engine stays intact until it returns.
 */
export class BatchAggregator {
  private batch: LogRecord[] = [];
  private intervalStart: number;

  constructor(
    private readonly batchSize: number,
    private readonly flushIntervalMs: number,
    private readonly clock: Clock = () => Date.now(),
  ) {
    this.intervalStart = clock();
  }

  get length(): number {
    return this.batch.length;
  }

  get isEmpty(): boolean {
    return this.batch.length === 0;
  }

  /** The batch being accumulated. */
  get current(): readonly LogRecord[] {
    return this.batch;
  }

  /** Appends a record; returns true once the size threshold is reached. */
  add(record: LogRecord): boolean {
    this.batch.push(record);
    return this.batch.length >= this.batchSize;
  }

  /** Starts a new batch and a new flush interval. Call after every flush attempt. */
  clear(): void {
    this.batch = [];
    this.intervalStart = this.clock();
  }

  msUntilFlush(now: number = this.clock()): number {
    return Math.max(0, this.intervalStart + this.flushIntervalMs - now);
  }

  intervalElapsed(now: number = this.clock()): boolean {
    return now - this.intervalStart >= this.flushIntervalMs;
  }

  /**
   * One select step: wait for the next record or the end of the current
   * interval, whichever comes first.
   */
  async collect(queue: IngestionQueue<LogRecord>): Promise<CollectOutcome> {
    const due = this.checkInterval();
    if (due !== 'pending') return due;

    const record = await queue.take(this.msUntilFlush());
    if (record === null) return this.checkInterval();

    return this.add(record) ? 'size' : 'appended';
  }

  private checkInterval(): CollectOutcome {
    const now = this.clock();
    if (!this.intervalElapsed(now)) return 'pending';

    if (this.batch.length > 0) return 'interval';

    // Nothing to send: skip the empty delivery and start a new window.
    this.intervalStart = now;
    return 'idle';
  }
}
