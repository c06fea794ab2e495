import type { OfferResult } from './ingestion-queue.js';

export interface CountersSnapshot {
  readonly observed: number;
  readonly enqueued: number;
  readonly dropped: number;
  /** Records confirmed delivered by the sink. */
  readonly delivered: number;
  /** Delivery passes that failed and were retried. */
  readonly failedAttempts: number;
}

/**
 * Monotonic pipeline counters.
 *
 * Producers update `observed`/`enqueued`/`dropped` through `recordOffer`;
 * the background loop updates the delivery counters. Every update is a
 * synchronous increment on the event loop, so no reader ever sees a torn
 * value. Nothing resets them.
 */
export class PipelineCounters {
  private observed = 0;
  private enqueued = 0;
  private dropped = 0;
  private delivered = 0;
  private failedAttempts = 0;

  recordOffer(result: OfferResult): void {
    this.observed++;
    if (result === 'accepted') {
      this.enqueued++;
    } else {
      this.dropped++;
    }
  }

  recordDelivered(count: number): void {
    this.delivered += count;
  }

  recordFailedAttempt(): void {
    this.failedAttempts++;
  }

  snapshot(): CountersSnapshot {
    return Object.freeze({
      observed: this.observed,
      enqueued: this.enqueued,
      dropped: this.dropped,
      delivered: this.delivered,
      failedAttempts: this.failedAttempts,
    });
  }
}
