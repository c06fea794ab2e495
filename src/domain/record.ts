/**
 * Core domain types for the log record model.
 *
 * A LogRecord is the normalized snapshot of one observed event. It is
 * built once at the ingestion boundary, frozen, and flows unchanged
 * through queue, batch and sink. These types carry no framework
 * dependencies.
 */

/** Any value that survives a JSON round trip unchanged. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Typed value of a single structured field.
 *
 * Integral and fractional numbers are kept apart so backends with typed
 * columns can pick an integer or a float column per field.
 */
export type FieldValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'structured'; readonly value: JsonValue };

export type LogFields = Readonly<Record<string, FieldValue>>;

/** Field key reserved for the human-readable message. Never stored in `fields`. */
export const MESSAGE_FIELD = 'message';

export interface LogRecord {
  readonly timestamp: string; // ISO-8601, UTC
  readonly level: string;
  readonly target: string;
  readonly modulePath?: string | undefined;
  readonly file?: string | undefined;
  readonly line?: number | undefined;
  readonly message?: string | undefined;
  readonly fields: LogFields;
  /** Disambiguates services that share one backend table or topic. */
  readonly serviceName?: string | undefined;
}

export interface LogRecordInput {
  timestamp?: string | Date | undefined;
  level: string;
  target: string;
  modulePath?: string | undefined;
  file?: string | undefined;
  line?: number | undefined;
  message?: string | undefined;
  /** Raw field values; each is converted with {@link toFieldValue}. */
  fields?: Readonly<Record<string, unknown>> | undefined;
  serviceName?: string | undefined;
}

/**
 * Snake_case row shape shared by every backend.
 * Absent optionals are `null` so column-oriented stores get a stable schema.
 */
export interface SerializedLogRecord {
  timestamp: string;
  level: string;
  target: string;
  module_path: string | null;
  file: string | null;
  line: number | null;
  message: string | null;
  service_name: string | null;
  fields: { [key: string]: JsonValue };
}

/**
 * Normalizes an arbitrary value into JSON.
 *
 * Errors keep their type, message and stack; dates become ISO strings;
 * cycles are cut with a `[Circular]` marker. Every array and object in
 * the result is a frozen copy.
 */
export function toJsonValue(value: unknown, seen: WeakSet<object> = new WeakSet()): JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      return null;
    default:
      break;
  }

  if (typeof value !== 'object' || value === null) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      const items = value.map((item: unknown) => toJsonValue(item, seen));
      Object.freeze(items);
      return items;
    }

    if (value instanceof Error) {
      const out: { [key: string]: JsonValue } = {
        type: value.name,
        message: value.message,
      };
      if (value.stack !== undefined) out['stack'] = value.stack;
      Object.freeze(out);
      return out;
    }

    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined || typeof item === 'function' || typeof item === 'symbol') continue;
      out[key] = toJsonValue(item, seen);
    }
    Object.freeze(out);
    return out;
  } finally {
    seen.delete(value);
  }
}

/** Maps a dynamically-typed value onto the {@link FieldValue} union. Total. */
export function toFieldValue(value: unknown): FieldValue {
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'boolean':
      return { kind: 'bool', value };
    case 'number':
      if (Number.isSafeInteger(value)) return { kind: 'integer', value };
      if (Number.isFinite(value)) return { kind: 'float', value };
      return { kind: 'string', value: String(value) };
    case 'bigint': {
      const asNumber = Number(value);
      return Number.isSafeInteger(asNumber)
        ? { kind: 'integer', value: asNumber }
        : { kind: 'string', value: value.toString() };
    }
    case 'undefined':
    case 'function':
    case 'symbol':
      return { kind: 'string', value: String(value) };
    default:
      break;
  }

  if (value instanceof Date) {
    return { kind: 'string', value: Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString() };
  }
  return { kind: 'structured', value: toJsonValue(value) };
}

export function fieldValueToJson(field: FieldValue): JsonValue {
  return field.value;
}

function normalizeTimestamp(raw: string | Date | undefined): string {
  if (raw === undefined) return new Date().toISOString();
  const date = raw instanceof Date ? raw : new Date(raw);
  return Number.isNaN(date.getTime()) ? new Date().toISOString() : date.toISOString();
}

/**
 * Builds a frozen LogRecord.
 *
 * A value under the reserved `message` key is moved into the message slot
 * when no explicit message is given (strings only) and is dropped from
 * `fields` in every case. Keys whose value is `undefined` are skipped.
 */
export function createLogRecord(input: LogRecordInput): LogRecord {
  let message = input.message;
  const fields: Record<string, FieldValue> = {};

  for (const [key, raw] of Object.entries(input.fields ?? {})) {
    if (raw === undefined) continue;
    if (key === MESSAGE_FIELD) {
      if (message === undefined && typeof raw === 'string') message = raw;
      continue;
    }
    fields[key] = Object.freeze(toFieldValue(raw));
  }

  return Object.freeze({
    timestamp: normalizeTimestamp(input.timestamp),
    level: input.level,
    target: input.target,
    modulePath: input.modulePath,
    file: input.file,
    line: input.line,
    message,
    fields: Object.freeze(fields),
    serviceName: input.serviceName,
  });
}

export function serializeFields(fields: LogFields): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [key, field] of Object.entries(fields)) {
    out[key] = fieldValueToJson(field);
  }
  return out;
}

export function serializeRecord(record: LogRecord): SerializedLogRecord {
  return {
    timestamp: record.timestamp,
    level: record.level,
    target: record.target,
    module_path: record.modulePath ?? null,
    file: record.file ?? null,
    line: record.line ?? null,
    message: record.message ?? null,
    service_name: record.serviceName ?? null,
    fields: serializeFields(record.fields),
  };
}
