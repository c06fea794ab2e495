export { logTable, errorLogs, DEFAULT_LOG_TABLE } from './schema.js';
export type { LogTable, LogRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClientOptions } from './client.js';
