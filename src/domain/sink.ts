import type { LogRecord } from './record.js';

/**
 * Delivery target for normalized log records.
 *
 * Implement this to add a new backend. The pipeline may call `send` with
 * the same record more than once (a failed batch is resent from the
 * start), so implementations must tolerate duplicates. Each call should
 * apply its own I/O timeout: the pipeline waits on it unconditionally.
 */
export interface LogSink {
  /** Short backend identifier used in diagnostics. */
  readonly name: string;

  send(record: LogRecord): Promise<void>;

  /** Commit anything the sink buffers internally. Optional. */
  flush?(): Promise<void>;
}

/** Calls `sink.flush()` when the sink has one; otherwise succeeds with no effect. */
export async function flushSink(sink: LogSink): Promise<void> {
  if (sink.flush) {
    await sink.flush();
  }
}
