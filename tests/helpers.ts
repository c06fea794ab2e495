import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createLogRecord } from '../src/domain/index.js';
import type { LogRecord, LogRecordInput, LogSink } from '../src/domain/index.js';

let counter = 0;

/** Fixed instant used as the timestamp of test records. */
export const FIXED_TIMESTAMP = '2026-02-18T12:00:00.000Z';

/**
 * Factory for frozen test records. Each call gets a distinct message
 * (`record-<n>`) unless one is given.
 */
export function makeRecord(overrides: Partial<LogRecordInput> = {}): LogRecord {
  counter++;
  return createLogRecord({
    timestamp: FIXED_TIMESTAMP,
    level: 'ERROR',
    target: 'test',
    message: `record-${counter}`,
    ...overrides,
  });
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/**
 * In-memory sink that records every call.
 *
 * The first `failures` send calls throw; after that every send succeeds.
 * `flushMarks` holds `delivered.length` at each flush, i.e. the running
 * total at the end of every successful pass.
 */
export class RecordingSink implements LogSink {
  readonly name = 'recording';
  /** Records whose send call succeeded, in call order (retries included). */
  readonly delivered: LogRecord[] = [];
  /** Every send call, failed ones included. */
  readonly attempts: LogRecord[] = [];
  readonly flushMarks: number[] = [];
  private failuresLeft: number;

  constructor(failures = 0) {
    this.failuresLeft = failures;
  }

  async send(record: LogRecord): Promise<void> {
    this.attempts.push(record);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('backend unavailable');
    }
    this.delivered.push(record);
  }

  async flush(): Promise<void> {
    this.flushMarks.push(this.delivered.length);
  }

  messages(): Array<string | undefined> {
    return this.delivered.map((record) => record.message);
  }
}

/** Sink whose sends never settle, standing in for a hung backend. */
export class StalledSink implements LogSink {
  readonly name = 'stalled';
  calls = 0;

  send(_record: LogRecord): Promise<void> {
    this.calls++;
    return new Promise<void>(() => undefined);
  }
}
