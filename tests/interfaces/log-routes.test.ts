import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import {
  IngestionQueue,
  PipelineCounters,
  PipelineHandle,
  resolvePipelineConfig,
} from '../../src/application/index.js';
import type { LogRecord } from '../../src/domain/index.js';
import { logRoutes, pipelinePlugin } from '../../src/interfaces/http/index.js';

const body = {
  timestamp: '2026-02-18T12:00:00Z',
  level: 'ERROR',
  target: 'billing',
  message: 'charge failed',
  fields: { user_id: 7 },
};

const apps: FastifyInstance[] = [];

async function buildApp(queue: IngestionQueue<LogRecord>) {
  const handle = new PipelineHandle(queue, new PipelineCounters(), resolvePipelineConfig());
  const app = Fastify();
  apps.push(app);
  await app.register(pipelinePlugin, { handle });
  await app.register(logRoutes);
  await app.ready();
  return { app, handle };
}

describe('log routes', () => {
  afterEach(async () => {
    await Promise.all(apps.splice(0).map((app) => app.close()));
  });

  it('accepts a single record with 202', async () => {
    const queue = new IngestionQueue<LogRecord>(4);
    const { app } = await buildApp(queue);

    const res = await app.inject({ method: 'POST', url: '/api/v1/logs', payload: body });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ status: 'accepted' });
    expect(queue.poll()).toMatchObject({
      timestamp: '2026-02-18T12:00:00.000Z',
      level: 'ERROR',
      target: 'billing',
      message: 'charge failed',
      fields: { user_id: { kind: 'integer', value: 7 } },
    });
  });

  it('reports a dropped record when the queue is full', async () => {
    const queue = new IngestionQueue<LogRecord>(1);
    const { app } = await buildApp(queue);

    await app.inject({ method: 'POST', url: '/api/v1/logs', payload: body });
    const res = await app.inject({ method: 'POST', url: '/api/v1/logs', payload: body });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ status: 'dropped' });
  });

  it('rejects an invalid record with 400', async () => {
    const queue = new IngestionQueue<LogRecord>(4);
    const { app } = await buildApp(queue);

    const res = await app.inject({ method: 'POST', url: '/api/v1/logs', payload: { level: 'ERROR' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'Validation failed' });
    expect(queue.size).toBe(0);
  });

  it('offers each record of a batch and counts drops', async () => {
    const queue = new IngestionQueue<LogRecord>(2);
    const { app } = await buildApp(queue);

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/logs/batch',
      payload: [body, { ...body, message: 'second' }, { ...body, message: 'third' }],
    });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ status: 'accepted', accepted: 2, dropped: 1 });
    expect([queue.poll()?.message, queue.poll()?.message]).toEqual(['charge failed', 'second']);
  });

  it('rejects a batch with one invalid record before offering any', async () => {
    const queue = new IngestionQueue<LogRecord>(4);
    const { app, handle } = await buildApp(queue);

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/logs/batch',
      payload: [body, { ...body, level: '' }],
    });

    expect(res.statusCode).toBe(400);
    expect(handle.counters().observed).toBe(0);
  });

  it('reports counters, queue state and config', async () => {
    const queue = new IngestionQueue<LogRecord>(1);
    const { app } = await buildApp(queue);
    await app.inject({ method: 'POST', url: '/api/v1/logs', payload: body });
    await app.inject({ method: 'POST', url: '/api/v1/logs', payload: body });

    const res = await app.inject({ method: 'GET', url: '/api/v1/logs/stats' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      counters: { observed: 2, enqueued: 1, dropped: 1, delivered: 0, failedAttempts: 0 },
      queue: { queued: 1, capacity: 1 },
      config: { queueCapacity: 1024, batchSize: 128, flushIntervalMs: 1000 },
    });
  });
});
