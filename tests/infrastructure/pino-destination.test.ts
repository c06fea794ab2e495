import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import {
  IngestionQueue,
  PipelineCounters,
  PipelineHandle,
  resolvePipelineConfig,
} from '../../src/application/index.js';
import type { LogRecord } from '../../src/domain/index.js';
import { createPipelineDestination } from '../../src/infrastructure/index.js';
import { fakeLogger } from '../helpers.js';

describe('createPipelineDestination', () => {
  let queue: IngestionQueue<LogRecord>;
  let handle: PipelineHandle;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    queue = new IngestionQueue<LogRecord>(16);
    handle = new PipelineHandle(queue, new PipelineCounters(), resolvePipelineConfig());
    log = fakeLogger();
  });

  it('forwards lines at or above the minimum level', () => {
    const destination = createPipelineDestination(handle, { log, serviceName: 'checkout' });

    destination.write(`${JSON.stringify({ level: 30, msg: 'started' })}\n`);
    destination.write(`${JSON.stringify({ level: 50, name: 'billing', msg: 'charge failed', user_id: 7 })}\n`);

    expect(handle.counters()).toMatchObject({ observed: 1, enqueued: 1 });
    const record = queue.poll();
    expect(record).toMatchObject({
      level: 'ERROR',
      target: 'billing',
      message: 'charge failed',
      serviceName: 'checkout',
      fields: { user_id: { kind: 'integer', value: 7 } },
    });
  });

  it('honours a lower minimum level', () => {
    const destination = createPipelineDestination(handle, { log, minLevel: 'warn' });

    destination.write(`${JSON.stringify({ level: 40, msg: 'slow query' })}\n`);

    expect(queue.poll()?.level).toBe('WARN');
  });

  it('splits chunks that carry several lines', () => {
    const destination = createPipelineDestination(handle, { log });

    destination.write(`${JSON.stringify({ level: 50, msg: 'a' })}\n${JSON.stringify({ level: 60, msg: 'b' })}\n`);

    expect([queue.poll()?.message, queue.poll()?.message]).toEqual(['a', 'b']);
  });

  it('reports lines that are not JSON objects', () => {
    const destination = createPipelineDestination(handle, { log });

    destination.write('not json\n');
    destination.write('[1,2]\n');

    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      { err: expect.any(SyntaxError), count: 1 },
      'Discarding log line that is not a JSON object',
    );
    expect(handle.counters().observed).toBe(0);
  });

  it('receives lines from a pino logger', () => {
    const logger = pino({ name: 'billing' }, createPipelineDestination(handle, { log }));

    logger.info('ignored');
    logger.error({ user_id: 7 }, 'charge failed');

    const record = queue.poll();
    expect(record).toMatchObject({
      level: 'ERROR',
      target: 'billing',
      message: 'charge failed',
      fields: { user_id: { kind: 'integer', value: 7 } },
    });
    expect(record?.fields).not.toHaveProperty('pid');
    expect(queue.size).toBe(0);
  });
});
