import { describe, it, expect } from 'vitest';
import { ConfigError, loadEnvConfig } from '../../src/infrastructure/index.js';

describe('loadEnvConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({
      dsn: 'noop://',
      serviceName: undefined,
      pipeline: {
        queueCapacity: undefined,
        batchSize: undefined,
        flushIntervalMs: undefined,
      },
      minLevel: 'error',
      httpTimeoutMs: 5000,
      logLevel: 'info',
      host: '0.0.0.0',
      port: 3000,
    });
  });

  it('reads and coerces overrides', () => {
    const config = loadEnvConfig({
      LOG_SINK_DSN: ' clickhouse://ch.internal:8123/default/logs ',
      LOG_SINK_SERVICE_NAME: 'checkout',
      LOG_SINK_QUEUE_CAPACITY: '4096',
      LOG_SINK_BATCH_SIZE: '64',
      LOG_SINK_FLUSH_INTERVAL_MS: '250',
      LOG_SINK_MIN_LEVEL: 'warn',
      LOG_SINK_HTTP_TIMEOUT_MS: '2000',
      LOG_LEVEL: 'debug',
      PORT: '8080',
    });

    expect(config.dsn).toBe('clickhouse://ch.internal:8123/default/logs');
    expect(config.serviceName).toBe('checkout');
    expect(config.pipeline).toEqual({ queueCapacity: 4096, batchSize: 64, flushIntervalMs: 250 });
    expect(config.minLevel).toBe('warn');
    expect(config.httpTimeoutMs).toBe(2000);
    expect(config.logLevel).toBe('debug');
    expect(config.port).toBe(8080);
  });

  it('treats empty numeric values as unset', () => {
    expect(loadEnvConfig({ LOG_SINK_BATCH_SIZE: '' }).pipeline.batchSize).toBeUndefined();
  });

  it('passes small values through for the pipeline to clamp', () => {
    expect(loadEnvConfig({ LOG_SINK_QUEUE_CAPACITY: '2' }).pipeline.queueCapacity).toBe(2);
  });

  it('rejects a malformed number with the variable name', () => {
    let caught: unknown;
    try {
      loadEnvConfig({ LOG_SINK_BATCH_SIZE: 'lots' });
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0]).toMatch(/^LOG_SINK_BATCH_SIZE: /);
    expect(caught.message).toMatch(/^Invalid environment configuration: LOG_SINK_BATCH_SIZE: /);
  });

  it('rejects an unknown level label', () => {
    expect(() => loadEnvConfig({ LOG_SINK_MIN_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});
