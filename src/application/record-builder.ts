import type { LogRecord } from '../domain/index.js';
import { createLogRecord } from '../domain/index.js';

/** Numeric pino levels by label. */
export const LOG_LEVEL_VALUES = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
} as const;

export type LevelLabel = keyof typeof LOG_LEVEL_VALUES;

export const LEVEL_LABELS: readonly LevelLabel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/** Keys of a pino line that are consumed or discarded rather than kept as fields. */
const RESERVED_KEYS = new Set(['level', 'time', 'msg', 'name', 'module', 'caller', 'pid', 'hostname', 'v']);

export interface RecordBuilderOptions {
  serviceName?: string | undefined;
  /** Target used when the line carries no logger `name`. */
  target?: string | undefined;
}

export function isLevelLabel(value: string): value is LevelLabel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Numeric level of a pino line. Accepts the default numeric form and the
 * label form produced by a `formatters.level` override.
 */
export function levelValue(raw: unknown): number | undefined {
  if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
  if (typeof raw === 'string') {
    const label = raw.toLowerCase();
    if (isLevelLabel(label)) return LOG_LEVEL_VALUES[label];
  }
  return undefined;
}

/** `50` → `'ERROR'`; unknown custom levels → `'LEVEL<n>'`. */
export function levelName(value: number): string {
  for (const label of LEVEL_LABELS) {
    if (LOG_LEVEL_VALUES[label] === value) return label.toUpperCase();
  }
  return `LEVEL${value}`;
}

export function levelAtLeast(raw: unknown, min: LevelLabel): boolean {
  const value = levelValue(raw);
  return value !== undefined && value >= LOG_LEVEL_VALUES[min];
}

interface SourceLocation {
  file: string;
  line?: number | undefined;
}

/** Parses a `caller` string such as `src/db.js:42:7` (pino-caller format). */
export function parseCaller(raw: unknown): SourceLocation | undefined {
  if (typeof raw !== 'string' || raw.length === 0) return undefined;

  const match = /^(.*?):(\d+)(?::\d+)?$/.exec(raw);
  if (match === null) return { file: raw };

  const file = match[1] ?? raw;
  const line = Number(match[2]);
  return { file, line: Number.isSafeInteger(line) ? line : undefined };
}

function timestampOf(raw: unknown): Date | undefined {
  if (typeof raw === 'number' || typeof raw === 'string') {
    const date = new Date(raw);
    if (!Number.isNaN(date.getTime())) return date;
  }
  return undefined;
}

function optionalString(raw: unknown): string | undefined {
  return typeof raw === 'string' && raw.length > 0 ? raw : undefined;
}

/**
 * Translates one parsed pino log line into a LogRecord.
 *
 * `msg` is the message, `name` the target, a `module` binding the module
 * path and a `caller` string the source location. Process bookkeeping
 * (`pid`, `hostname`, `v`) is dropped; every other key becomes a field.
 */
export function buildRecordFromLogLine(
  line: Readonly<Record<string, unknown>>,
  options: RecordBuilderOptions = {},
): LogRecord {
  const level = levelValue(line['level']);
  const caller = parseCaller(line['caller']);

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(line)) {
    if (!RESERVED_KEYS.has(key)) fields[key] = value;
  }

  return createLogRecord({
    timestamp: timestampOf(line['time']),
    level: level === undefined ? 'UNKNOWN' : levelName(level),
    target: optionalString(line['name']) ?? options.target ?? 'app',
    modulePath: optionalString(line['module']),
    file: caller?.file,
    line: caller?.line,
    message: typeof line['msg'] === 'string' ? line['msg'] : undefined,
    fields,
    serviceName: options.serviceName,
  });
}
