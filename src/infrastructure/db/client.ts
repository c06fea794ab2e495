import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. A sink writes from one loop, so a small pool is enough. */
  max?: number | undefined;
  /** Connection timeout in seconds. */
  connectTimeout?: number | undefined;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 2,
    idle_timeout: 20,
    connect_timeout: options.connectTimeout ?? 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
