import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Builds the pipeline's own diagnostic logger.
 *
 * Writes JSON to stderr. It must never be wired into a pipeline
 * destination: delivery failures logged through the pipeline they
 * describe would feed the outage they report.
 */
export function createDiagnosticLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({ name: 'logconveyor', level }, pino.destination(2));
}

/**
 * Wraps a warning so it is emitted at most once per `intervalMs`.
 *
 * Suppressed occurrences are counted and reported as `count` on the next
 * emitted line. The first occurrence is always logged.
 */
export function createRateLimitedWarn(
  log: Logger,
  message: string,
  intervalMs: number,
  clock: () => number = () => Date.now(),
): (context?: Record<string, unknown>) => void {
  let suppressed = 0;
  let lastEmit = Number.NEGATIVE_INFINITY;

  return (context = {}) => {
    suppressed++;
    const now = clock();
    if (now - lastEmit < intervalMs) return;

    log.warn({ ...context, count: suppressed }, message);
    suppressed = 0;
    lastEmit = now;
  };
}
