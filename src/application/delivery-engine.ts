import type { Logger } from 'pino';
import type { LogRecord, LogSink } from '../domain/index.js';
import { flushSink } from '../domain/index.js';
import type { RetryPolicy } from './pipeline-config.js';
import { resolveRetryPolicy } from './pipeline-config.js';
import type { PipelineCounters } from './pipeline-counters.js';

export type Sleep = (ms: number) => Promise<void>;

/** Timer-based sleep that does not keep the process alive. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms).unref();
  });
}

export interface DeliveryEngineOptions {
  log: Logger;
  retry?: Partial<RetryPolicy> | undefined;
  counters?: PipelineCounters | undefined;
  sleep?: Sleep | undefined;
  /** Stops retrying after the current backoff; the batch is abandoned. */
  signal?: AbortSignal | undefined;
}

/**
 * Drains a batch into the sink, retrying until it lands.
 *
 * One pass sends every record in order and then flushes the sink; the
 * first error ends the pass. A failed pass waits out the backoff and
 * resends the whole batch from the first record, so records that made it
 * before the failure are sent again (at-least-once). Backoff doubles per
 * failure up to `maxBackoffMs`. There is no attempt limit.
 */
export class DeliveryEngine {
  readonly retry: RetryPolicy;
  private readonly log: Logger;
  private readonly counters: PipelineCounters | undefined;
  private readonly sleep: Sleep;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly sink: LogSink,
    options: DeliveryEngineOptions,
  ) {
    this.retry = resolveRetryPolicy(options.retry);
    this.log = options.log;
    this.counters = options.counters;
    this.sleep = options.sleep ?? sleep;
    this.signal = options.signal;
  }

  async deliver(batch: readonly LogRecord[]): Promise<void> {
    if (batch.length === 0) return;

    let backoffMs = this.retry.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
      try {
        await this.sendPass(batch);
        this.counters?.recordDelivered(batch.length);

        if (attempt > 1) {
          this.log.info(
            { sink: this.sink.name, attempt, batchSize: batch.length },
            'Log batch delivered after retry',
          );
        }
        return;
      } catch (err: unknown) {
        this.counters?.recordFailedAttempt();
        this.log.warn(
          { err, sink: this.sink.name, attempt, backoffMs, batchSize: batch.length },
          'Log sink send failed, retrying',
        );
      }

      await this.sleep(backoffMs);
      backoffMs = Math.min(backoffMs * 2, this.retry.maxBackoffMs);

      if (this.signal?.aborted) {
        this.log.warn(
          { sink: this.sink.name, batchSize: batch.length },
          'Pipeline stopped, abandoning undelivered log batch',
        );
        return;
      }
    }
  }

  private async sendPass(batch: readonly LogRecord[]): Promise<void> {
    for (const record of batch) {
      await this.sink.send(record);
    }
    await flushSink(this.sink);
  }
}
