import { z } from 'zod';
import type { LogRecord, LogSink } from '../../domain/index.js';
import { serializeRecord } from '../../domain/index.js';
import { SinkDeliveryError } from './errors.js';
import type { HttpSinkOptions } from './http.js';
import { parseJson, requestText } from './http.js';

export interface OpenSearchSinkConfig extends HttpSinkOptions {
  /** Cluster base URL, e.g. `http://localhost:9200`. */
  baseUrl: string;
  index: string;
  username?: string | undefined;
  password?: string | undefined;
}

const bulkResponseSchema = z.object({ errors: z.boolean() }).passthrough();

/**
 * Indexes records through the `_bulk` API, one index action per record.
 *
 * A 200 response can still carry per-item failures; `errors: true` in
 * the body is treated as a failed send.
 */
export class OpenSearchSink implements LogSink {
  readonly name = 'opensearch';

  constructor(private readonly config: OpenSearchSinkConfig) {}

  endpoint(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/_bulk`;
  }

  bulkBody(record: LogRecord): string {
    const action = JSON.stringify({ index: { _index: this.config.index } });
    const doc = JSON.stringify(serializeRecord(record));
    return `${action}\n${doc}\n`;
  }

  async send(record: LogRecord): Promise<void> {
    const headers: Record<string, string> = { 'Content-Type': 'application/x-ndjson' };
    if (this.config.username !== undefined) {
      const credentials = `${this.config.username}:${this.config.password ?? ''}`;
      headers['Authorization'] = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }

    const body = await requestText(
      this.endpoint(),
      { method: 'POST', headers, body: this.bulkBody(record) },
      this.config,
      'OpenSearch bulk insert',
    );

    const parsed = bulkResponseSchema.safeParse(parseJson(body));
    if (parsed.success && parsed.data.errors) {
      throw new SinkDeliveryError('OpenSearch bulk insert reported item errors', 200, body);
    }
  }
}
