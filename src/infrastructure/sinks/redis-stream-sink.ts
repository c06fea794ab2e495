import type { Redis } from 'ioredis';
import type { LogRecord, LogSink } from '../../domain/index.js';
import { serializeRecord } from '../../domain/index.js';

export const DEFAULT_LOG_STREAM = 'logs';

export interface RedisStreamSinkOptions {
  stream?: string | undefined;
  /** Approximate stream length cap (`MAXLEN ~`). Unbounded when omitted. */
  maxLen?: number | undefined;
}

/**
 * Publishes each record to a Redis Stream as a single `record` field
 * holding the JSON row.
 *
 * Uses `XADD` with auto-generated IDs (`*`). Consumers reading the
 * stream must tolerate duplicates: a failed batch is republished from
 * its first record.
 */
export class RedisStreamSink implements LogSink {
  readonly name = 'redis';
  readonly stream: string;
  private readonly maxLen: number | undefined;

  constructor(
    readonly redis: Redis,
    options: RedisStreamSinkOptions = {},
  ) {
    this.stream = options.stream ?? DEFAULT_LOG_STREAM;
    this.maxLen = options.maxLen;
  }

  async send(record: LogRecord): Promise<void> {
    const payload = JSON.stringify(serializeRecord(record));

    if (this.maxLen !== undefined) {
      await this.redis.xadd(this.stream, 'MAXLEN', '~', this.maxLen, '*', 'record', payload);
    } else {
      await this.redis.xadd(this.stream, '*', 'record', payload);
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
