import type { Logger } from 'pino';
import type { LogRecord, LogSink } from '../domain/index.js';
import { createDiagnosticLogger, createRateLimitedWarn } from '../infrastructure/logger.js';
import { BatchAggregator } from './batch-aggregator.js';
import type { Clock } from './batch-aggregator.js';
import { DeliveryEngine } from './delivery-engine.js';
import type { Sleep } from './delivery-engine.js';
import { IngestionQueue } from './ingestion-queue.js';
import type { OfferResult } from './ingestion-queue.js';
import type { PipelineConfig, RetryPolicy } from './pipeline-config.js';
import { resolvePipelineConfig } from './pipeline-config.js';
import { PipelineCounters } from './pipeline-counters.js';
import type { CountersSnapshot } from './pipeline-counters.js';

const DROP_LOG_INTERVAL_MS = 5000;

/**
 * Producer-facing side of a pipeline.
 *
 * `offer` is safe from any call site except the pipeline's own sink:
 * it never waits, never throws, and reports a full queue only through
 * its return value and the `dropped` counter. Once `signal` aborts the
 * loop is gone, so every later offer is rejected without touching the
 * queue.
 */
export class PipelineHandle {
  constructor(
    private readonly queue: IngestionQueue<LogRecord>,
    private readonly stats: PipelineCounters,
    readonly config: PipelineConfig,
    private readonly onDrop: () => void = () => undefined,
    private readonly signal?: AbortSignal | undefined,
  ) {}

  offer(record: LogRecord): OfferResult {
    if (this.signal?.aborted) {
      this.stats.recordOffer('rejected');
      return 'rejected';
    }

    const result = this.queue.offer(record);
    this.stats.recordOffer(result);
    if (result === 'rejected') this.onDrop();
    return result;
  }

  counters(): CountersSnapshot {
    return this.stats.snapshot();
  }

  /** Records buffered and not yet taken by the background loop. */
  get queued(): number {
    return this.queue.size;
  }

  get capacity(): number {
    return this.queue.capacity;
  }
}

export interface PipelineOptions {
  /** Diagnostic logger. Must not itself feed this pipeline. */
  log?: Logger | undefined;
  retry?: Partial<RetryPolicy> | undefined;
  sleep?: Sleep | undefined;
  clock?: Clock | undefined;
  /**
   * Stops the background loop after its current step. Buffered records
   * are not drained; they are lost exactly as on process exit.
   */
  signal?: AbortSignal | undefined;
}

export interface Pipeline {
  handle: PipelineHandle;
  /** The background loop. Settles only after `options.signal` aborts. */
  task: Promise<void>;
}

interface LoopDeps {
  queue: IngestionQueue<LogRecord>;
  aggregator: BatchAggregator;
  engine: DeliveryEngine;
  log: Logger;
  signal: AbortSignal | undefined;
}

/**
 * Builds a pipeline and starts its single background loop.
 *
 * Producers call `handle.offer()`; the loop collects records into
 * batches by size or interval and hands each batch to the delivery
 * engine. Retries run on the loop itself, so a long backend outage stops
 * queue draining and new records start dropping once the queue is full.
 */
export function createPipeline(
  sink: LogSink,
  config: Partial<PipelineConfig> = {},
  options: PipelineOptions = {},
): Pipeline {
  const resolved = resolvePipelineConfig(config);
  const log = options.log ?? createDiagnosticLogger();
  const counters = new PipelineCounters();
  const queue = new IngestionQueue<LogRecord>(resolved.queueCapacity);

  const warnDrop = createRateLimitedWarn(
    log,
    'Log queue full, dropping records',
    DROP_LOG_INTERVAL_MS,
    options.clock,
  );
  const handle = new PipelineHandle(queue, counters, resolved, () => {
    warnDrop({ capacity: resolved.queueCapacity });
  }, options.signal);

  const aggregator = new BatchAggregator(resolved.batchSize, resolved.flushIntervalMs, options.clock);
  const engine = new DeliveryEngine(sink, {
    log,
    retry: options.retry,
    counters,
    sleep: options.sleep,
    signal: options.signal,
  });

  log.info(
    { sink: sink.name, ...resolved, retry: engine.retry },
    'Log pipeline started',
  );

  const task = runLoop({ queue, aggregator, engine, log, signal: options.signal });
  return { handle, task };
}

async function runLoop(deps: LoopDeps): Promise<void> {
  const { queue, aggregator, engine, log, signal } = deps;

  while (!signal?.aborted) {
    try {
      const outcome = await aggregator.collect(queue);
      if (outcome !== 'size' && outcome !== 'interval') continue;

      log.debug({ trigger: outcome, batchSize: aggregator.length }, 'Flushing log batch');
      await engine.deliver(aggregator.current);
      aggregator.clear();
    } catch (err: unknown) {
      log.error({ err }, 'Log pipeline loop error');
    }
  }

  log.info({ queued: queue.size, pending: aggregator.length }, 'Log pipeline stopped');
}
