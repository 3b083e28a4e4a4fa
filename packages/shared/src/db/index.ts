import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import pg from 'pg';
import * as schema from './schema.js';

export * from './schema.js';
export { eq, and, asc, lte, sql, count } from 'drizzle-orm';

let pool: pg.Pool | null = null;
let db: NodePgDatabase<typeof schema> | null = null;

export function getDb(databaseUrl: string): Database {
  if (db) return db;

  pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
  });

  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  db = null;
}

export type Database = NodePgDatabase<typeof schema>;

/** Either the pooled database or a transaction opened on it */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;
