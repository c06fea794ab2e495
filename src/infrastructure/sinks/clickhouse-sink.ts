import { z } from 'zod';
import type { LogRecord, LogSink } from '../../domain/index.js';
import { serializeRecord } from '../../domain/index.js';
import { SinkDeliveryError } from './errors.js';
import type { HttpSinkOptions } from './http.js';
import { parseJson, requestText } from './http.js';

export interface ClickHouseSinkConfig extends HttpSinkOptions {
  /** HTTP interface base URL, e.g. `http://127.0.0.1:8123`. */
  url: string;
  database: string;
  table: string;
  /** Overrides each record's own service name (shared-table setups). */
  serviceName?: string | undefined;
  user?: string | undefined;
  password?: string | undefined;
}

/** One JSONEachRow line. `fields` is a JSON string column. */
export interface ClickHouseRow {
  timestamp: string;
  level: string;
  target: string;
  module_path: string | null;
  file: string | null;
  line: number | null;
  message: string | null;
  service_name: string | null;
  fields: string;
}

const describeResponseSchema = z.object({
  data: z.array(z.object({ name: z.string(), type: z.string() })),
});

export type ClickHouseColumn = z.infer<typeof describeResponseSchema>['data'][number];

/**
 * Writes records into a ClickHouse table over the HTTP interface, one
 * `INSERT ... FORMAT JSONEachRow` per record.
 *
 * Unknown columns are skipped server-side, so the same row shape serves
 * both per-service tables (no `service_name`) and shared tables.
 */
export class ClickHouseSink implements LogSink {
  readonly name = 'clickhouse';

  constructor(private readonly config: ClickHouseSinkConfig) {}

  private baseUrl(): string {
    return this.config.url.replace(/\/+$/, '');
  }

  endpoint(): string {
    const params = new URLSearchParams({
      database: this.config.database,
      query: `INSERT INTO ${this.config.table} FORMAT JSONEachRow`,
      date_time_input_format: 'best_effort',
      input_format_skip_unknown_fields: '1',
    });
    return `${this.baseUrl()}/?${params.toString()}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/x-ndjson' };
    if (this.config.user !== undefined) headers['X-ClickHouse-User'] = this.config.user;
    if (this.config.password !== undefined) headers['X-ClickHouse-Key'] = this.config.password;
    return headers;
  }

  toRow(record: LogRecord): ClickHouseRow {
    const row = serializeRecord(record);
    return {
      ...row,
      service_name: this.config.serviceName ?? row.service_name,
      fields: JSON.stringify(row.fields),
    };
  }

  async send(record: LogRecord): Promise<void> {
    await requestText(
      this.endpoint(),
      {
        method: 'POST',
        headers: this.headers(),
        body: `${JSON.stringify(this.toRow(record))}\n`,
      },
      this.config,
      'ClickHouse insert',
    );
  }

  /**
   * Checks that the target table exists and returns its columns.
   * Meant to be called once at startup, before the pipeline is built.
   */
  async validateSchema(): Promise<ClickHouseColumn[]> {
    const params = new URLSearchParams({
      query: `DESCRIBE TABLE ${this.config.database}.${this.config.table} FORMAT JSON`,
    });
    const body = await requestText(
      `${this.baseUrl()}/?${params.toString()}`,
      { method: 'GET', headers: this.headers() },
      this.config,
      'ClickHouse schema validation',
    );

    const parsed = describeResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      throw new SinkDeliveryError('ClickHouse schema validation returned an unexpected body', undefined, body);
    }
    return parsed.data.data;
  }
}
