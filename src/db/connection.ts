import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from './schema/index';

export type Schema = typeof schema;

/**
 * Any drizzle Postgres handle over this schema: the pooled production
 * database, an open transaction, or the in-process database used by tests.
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

export interface ConnectionOptions {
  url: string;
  poolMax: number;
  statementTimeoutMs: number;
  lockTimeoutMs: number;
}

export interface Connection {
  db: Database;
  pool: pg.Pool;
  close: () => Promise<void>;
}

export function createConnection(options: ConnectionOptions): Connection {
  const pool = new pg.Pool({
    connectionString: options.url,
    max: options.poolMax,
    statement_timeout: options.statementTimeoutMs,
    lock_timeout: options.lockTimeoutMs,
  });

  pool.on('error', (err) => {
    console.error('[DB] Idle client error:', err.message);
  });

  const db = drizzle(pool, { schema });
  return { db, pool, close: () => pool.end() };
}
