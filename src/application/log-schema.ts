import { z } from 'zod';
import type { LogRecord } from '../domain/index.js';
import { createLogRecord } from '../domain/index.js';

/**
 * Zod schema for one log record submitted over HTTP.
 *
 * - `timestamp` is optional; the collector stamps arrival time if absent.
 * - `fields` is open-ended; values are typed on conversion.
 * - A `message` key inside `fields` is moved to the message slot.
 */
export const logRecordInputSchema = z.object({
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }).optional(),
  level: z.string().min(1).max(32),
  target: z.string().min(1).max(255),
  module_path: z.string().min(1).max(1024).optional(),
  file: z.string().min(1).max(1024).optional(),
  line: z.number().int().nonnegative().optional(),
  message: z.string().optional(),
  fields: z.record(z.string(), z.unknown()).default({}),
  service_name: z.string().min(1).max(255).optional(),
});

export type LogRecordInputBody = z.infer<typeof logRecordInputSchema>;

export const MAX_BATCH_RECORDS = 1000;

/** Batch body: validated as a whole, no partial acceptance of invalid input. */
export const logRecordBatchSchema = z
  .array(logRecordInputSchema)
  .min(1, 'Batch must contain at least one record')
  .max(MAX_BATCH_RECORDS, `Batch must contain at most ${MAX_BATCH_RECORDS} records`);

export function toLogRecord(input: LogRecordInputBody): LogRecord {
  return createLogRecord({
    timestamp: input.timestamp,
    level: input.level,
    target: input.target,
    modulePath: input.module_path,
    file: input.file,
    line: input.line,
    message: input.message,
    fields: input.fields,
    serviceName: input.service_name,
  });
}
