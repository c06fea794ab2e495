export type {
  JsonValue,
  FieldValue,
  LogFields,
  LogRecord,
  LogRecordInput,
  SerializedLogRecord,
} from './record.js';
export {
  MESSAGE_FIELD,
  createLogRecord,
  toFieldValue,
  toJsonValue,
  fieldValueToJson,
  serializeFields,
  serializeRecord,
} from './record.js';
export type { LogSink } from './sink.js';
export { flushSink } from './sink.js';
