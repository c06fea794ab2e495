import type { DestinationStream, Logger } from 'pino';
import type { PipelineHandle } from '../application/pipeline.js';
import { buildRecordFromLogLine, levelAtLeast } from '../application/record-builder.js';
import type { LevelLabel } from '../application/record-builder.js';
import { createRateLimitedWarn } from './logger.js';

const PARSE_WARN_INTERVAL_MS = 5000;

export interface PipelineDestinationOptions {
  /** Lowest level forwarded into the pipeline. Defaults to `error`. */
  minLevel?: LevelLabel | undefined;
  serviceName?: string | undefined;
  /** Target for lines from a logger without a `name`. */
  target?: string | undefined;
  /** Diagnostic logger for unparseable lines. Must not write to this destination. */
  log: Logger;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * pino destination that feeds a pipeline.
 *
 * Wire it in explicitly, e.g. as one stream of `pino.multistream`. Each
 * written line is parsed, filtered by level, translated into a record
 * and offered. Writing never throws and never waits: a full queue drops
 * the line, malformed input is reported on the diagnostic logger.
 */
export function createPipelineDestination(
  handle: PipelineHandle,
  options: PipelineDestinationOptions,
): DestinationStream {
  const minLevel = options.minLevel ?? 'error';
  const warnUnparseable = createRateLimitedWarn(
    options.log,
    'Discarding log line that is not a JSON object',
    PARSE_WARN_INTERVAL_MS,
  );

  const forward = (text: string): void => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err: unknown) {
      warnUnparseable({ err });
      return;
    }

    if (!isRecordObject(parsed)) {
      warnUnparseable();
      return;
    }
    if (!levelAtLeast(parsed['level'], minLevel)) return;

    handle.offer(buildRecordFromLogLine(parsed, {
      serviceName: options.serviceName,
      target: options.target,
    }));
  };

  return {
    write(chunk: string): void {
      for (const line of chunk.split('\n')) {
        if (line.trim().length > 0) forward(line);
      }
    },
  };
}
