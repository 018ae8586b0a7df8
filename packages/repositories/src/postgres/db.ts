import { drizzle, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   connectionString: config.databaseUrl,
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    idle_timeout: 30,
    connect_timeout: 10,
    onnotice: () => {
      // NOTICE messages are not actionable here
    },
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];

/**
 * Anything queries can run against: the pooled database or an open transaction.
 */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

/**
 * Close all pool connections. Call during process shutdown.
 */
export async function closeDatabase(client: ReturnType<typeof createDatabase>['client']): Promise<void> {
  await client.end({ timeout: 5 });
}
