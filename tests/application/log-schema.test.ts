import { describe, it, expect } from 'vitest';
import {
  MAX_BATCH_RECORDS,
  logRecordBatchSchema,
  logRecordInputSchema,
  toLogRecord,
} from '../../src/application/index.js';

const validBody = {
  timestamp: '2026-02-18T12:00:00Z',
  level: 'ERROR',
  target: 'billing',
  module_path: 'billing::invoices',
  file: 'src/invoices.ts',
  line: 88,
  message: 'charge failed',
  fields: { user_id: 7, ratio: 0.5 },
  service_name: 'checkout',
};

describe('logRecordInputSchema', () => {
  it('accepts a complete body and converts it to a record', () => {
    const parsed = logRecordInputSchema.safeParse(validBody);
    expect(parsed.success).toBe(true);
    if (!parsed.success) return;

    expect(toLogRecord(parsed.data)).toEqual({
      timestamp: '2026-02-18T12:00:00.000Z',
      level: 'ERROR',
      target: 'billing',
      modulePath: 'billing::invoices',
      file: 'src/invoices.ts',
      line: 88,
      message: 'charge failed',
      fields: {
        user_id: { kind: 'integer', value: 7 },
        ratio: { kind: 'float', value: 0.5 },
      },
      serviceName: 'checkout',
    });
  });

  it('defaults fields to an empty object', () => {
    const parsed = logRecordInputSchema.parse({ level: 'WARN', target: 'api' });

    expect(parsed.fields).toEqual({});
  });

  it('accepts timestamps with an offset', () => {
    expect(logRecordInputSchema.safeParse({ ...validBody, timestamp: '2026-02-18T14:00:00+02:00' }).success)
      .toBe(true);
  });

  it('rejects missing or malformed slots', () => {
    expect(logRecordInputSchema.safeParse({ ...validBody, level: '' }).success).toBe(false);
    expect(logRecordInputSchema.safeParse({ ...validBody, target: undefined }).success).toBe(false);
    expect(logRecordInputSchema.safeParse({ ...validBody, timestamp: 'yesterday' }).success).toBe(false);
    expect(logRecordInputSchema.safeParse({ ...validBody, line: -1 }).success).toBe(false);
    expect(logRecordInputSchema.safeParse({ ...validBody, fields: 'x' }).success).toBe(false);
  });
});

describe('logRecordBatchSchema', () => {
  it('rejects an empty batch', () => {
    expect(logRecordBatchSchema.safeParse([]).success).toBe(false);
  });

  it('rejects a batch over the limit', () => {
    const batch = Array.from({ length: MAX_BATCH_RECORDS + 1 }, () => validBody);
    expect(logRecordBatchSchema.safeParse(batch).success).toBe(false);
  });

  it('rejects the whole batch when one record is invalid', () => {
    expect(logRecordBatchSchema.safeParse([validBody, { level: 'ERROR' }]).success).toBe(false);
  });
});
