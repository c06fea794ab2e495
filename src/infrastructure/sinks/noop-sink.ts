import type { LogRecord, LogSink } from '../../domain/index.js';

/**
 * Drops every record.
 *
 * Measures the pipeline's own overhead without any I/O; also the default
 * backend when no DSN is configured.
 */
export class NoopSink implements LogSink {
  readonly name = 'noop';

  async send(_record: LogRecord): Promise<void> {
    // Intentionally empty
  }
}
