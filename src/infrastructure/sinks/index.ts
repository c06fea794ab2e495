export { NoopSink } from './noop-sink.js';
export { ClickHouseSink } from './clickhouse-sink.js';
export type { ClickHouseSinkConfig, ClickHouseRow, ClickHouseColumn } from './clickhouse-sink.js';
export { OpenSearchSink } from './opensearch-sink.js';
export type { OpenSearchSinkConfig } from './opensearch-sink.js';
export { PostgresSink, toLogRow } from './postgres-sink.js';
export { RedisStreamSink, DEFAULT_LOG_STREAM } from './redis-stream-sink.js';
export type { RedisStreamSinkOptions } from './redis-stream-sink.js';
export { SinkDeliveryError, SinkConfigError } from './errors.js';
export { DEFAULT_HTTP_TIMEOUT_MS } from './http.js';
export type { HttpSinkOptions } from './http.js';
