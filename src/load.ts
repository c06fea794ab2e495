import { setTimeout as delay } from 'node:timers/promises';
import { createPipeline } from './application/index.js';
import { createLogRecord } from './domain/index.js';
import { createDiagnosticLogger, NoopSink } from './infrastructure/index.js';

/**
 * Load generator: pushes N records through a pipeline backed by a
 * NoopSink and reports producer throughput and the final counters.
 *
 * All offers run in one synchronous burst, so the background loop only
 * starts draining once the burst is over; anything past the queue
 * capacity is dropped. That is the overflow path under test.
 *
 *   LOAD_EVENTS=100000 LOAD_QUEUE_CAPACITY=50000 node dist/load.js
 */
const log = createDiagnosticLogger(process.env['LOG_LEVEL'] ?? 'warn');

const events = Number(process.env['LOAD_EVENTS'] ?? 100_000);
const queueCapacity = Number(process.env['LOAD_QUEUE_CAPACITY'] ?? 50_000);
const batchSize = Number(process.env['LOAD_BATCH_SIZE'] ?? 1_000);
const flushIntervalMs = Number(process.env['LOAD_FLUSH_INTERVAL_MS'] ?? 200);

async function main(): Promise<void> {
  const ac = new AbortController();
  const { handle, task } = createPipeline(
    new NoopSink(),
    { queueCapacity, batchSize, flushIntervalMs },
    { log, signal: ac.signal },
  );

  const start = performance.now();
  for (let i = 0; i < events; i++) {
    handle.offer(createLogRecord({
      level: 'ERROR',
      target: 'load',
      message: 'load test error',
      fields: { iteration: i },
    }));
  }
  const elapsedMs = performance.now() - start;

  console.log(
    `offered ${events} events in ${elapsedMs.toFixed(1)}ms (~${Math.round(events / (elapsedMs / 1000))} ev/s)`,
  );

  // Give the background loop time to drain the queue.
  await delay(2000);
  ac.abort();
  await task;

  console.log('counters', handle.counters());
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Load run failed');
  process.exit(1);
});
