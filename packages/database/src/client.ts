import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';

/**
 * Create a database client instance
 *
 * @param connectionString - PostgreSQL connection URL
 * @returns Drizzle database client with schema
 */
export function createDbClient(connectionString: string) {
  const queryClient = postgres(connectionString, {
    max: 10, // Connection pool size
    idle_timeout: 30, // Close idle connections after 30s
    connect_timeout: 10, // Connection timeout
  });

  return drizzle(queryClient, { schema });
}

export type PostgresDbClient = ReturnType<typeof createDbClient>;

/**
 * Any Drizzle Postgres database carrying the schema; repositories take
 * this so they also run on an in-process driver
 */
export type DbClient = PgDatabase<PgQueryResultHKT, typeof schema>;

/**
 * Round-trip a trivial query, for readiness checks
 */
export async function pingDatabase(db: DbClient): Promise<void> {
  await db.execute(sql`select 1`);
}

/**
 * Close the underlying connection pool
 */
export async function closeDbClient(db: PostgresDbClient): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
