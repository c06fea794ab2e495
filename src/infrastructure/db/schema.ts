import { pgTable, text, timestamp, integer, jsonb, index } from 'drizzle-orm/pg-core';
import type { JsonValue } from '../../domain/index.js';

/**
 * Drizzle schema for a log table.
 *
 * There is no primary key: the pipeline may resend a record after a
 * partial batch failure, and duplicate rows are tolerated rather than
 * rejected. `service_name` is only populated when several services share
 * one table.
 */
export function logTable(name: string) {
  return pgTable(name, {
    ts: timestamp('ts', { withTimezone: true }).notNull(),
    level: text('level').notNull(),
    target: text('target').notNull(),
    module_path: text('module_path'),
    file: text('file'),
    line: integer('line'),
    message: text('message'),
    fields: jsonb('fields').$type<{ [key: string]: JsonValue }>().notNull(),
    service_name: text('service_name'),
  }, (table) => [
    index(`idx_${name}_ts`).on(table.ts),
    index(`idx_${name}_level`).on(table.level),
    index(`idx_${name}_service_name`).on(table.service_name),
  ]);
}

export const DEFAULT_LOG_TABLE = 'error_logs';

export const errorLogs = logTable(DEFAULT_LOG_TABLE);

export type LogTable = ReturnType<typeof logTable>;
export type LogRow = LogTable['$inferInsert'];
