export { createDiagnosticLogger, createRateLimitedWarn } from './logger.js';
export { loadEnvConfig, ConfigError, ENV } from './config/env.js';
export type { EnvConfig } from './config/env.js';
export { parseDsn, createSinkFromConfig, redactDsn, DsnError } from './backend.js';
export type { BackendKind, BackendConfig, SinkBinding, SinkBuildOptions } from './backend.js';
export { createPipelineDestination } from './pino-destination.js';
export type { PipelineDestinationOptions } from './pino-destination.js';
export {
  NoopSink,
  ClickHouseSink,
  OpenSearchSink,
  PostgresSink,
  RedisStreamSink,
  SinkDeliveryError,
  SinkConfigError,
  toLogRow,
  DEFAULT_LOG_STREAM,
  DEFAULT_HTTP_TIMEOUT_MS,
} from './sinks/index.js';
export type {
  ClickHouseSinkConfig,
  ClickHouseRow,
  ClickHouseColumn,
  OpenSearchSinkConfig,
  RedisStreamSinkOptions,
  HttpSinkOptions,
} from './sinks/index.js';
export { createDbClient, logTable, errorLogs, DEFAULT_LOG_TABLE } from './db/index.js';
export type { Database, LogTable, LogRow } from './db/index.js';
