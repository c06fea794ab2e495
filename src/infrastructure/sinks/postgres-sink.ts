import type { LogRecord, LogSink } from '../../domain/index.js';
import { serializeRecord } from '../../domain/index.js';
import type { Database, LogRow, LogTable } from '../db/index.js';
import { errorLogs } from '../db/index.js';

/** Maps a record onto a row of the log table. */
export function toLogRow(record: LogRecord): LogRow {
  const row = serializeRecord(record);
  return {
    ts: new Date(row.timestamp),
    level: row.level,
    target: row.target,
    module_path: row.module_path,
    file: row.file,
    line: row.line,
    message: row.message,
    fields: row.fields,
    service_name: row.service_name,
  };
}

/**
 * Inserts each record as one row via Drizzle.
 *
 * The table has no unique key, so a record resent after a partial batch
 * failure shows up as a duplicate row.
 */
export class PostgresSink implements LogSink {
  readonly name = 'postgres';

  constructor(
    private readonly db: Database,
    private readonly table: LogTable = errorLogs,
  ) {}

  async send(record: LogRecord): Promise<void> {
    await this.db.insert(this.table).values(toLogRow(record));
  }
}
