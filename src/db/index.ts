import { Pool } from 'pg';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { DatabaseConfig } from '../config.js';
import * as schema from './schema.js';

/**
 * Drizzle handle over the division schema.
 *
 * Typed against PgDatabase so a transaction handle fits the same slot.
 */
export type Database = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export function createPool(config: DatabaseConfig): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    database: config.name,
    user: config.user,
    password: config.password,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });
}

export function createDb(pool: Pool): Database {
  return drizzle(pool, { schema });
}

/**
 * Round-trip to the database, used by the health check
 */
export async function pingDatabase(pool: Pool): Promise<void> {
  await pool.query('SELECT 1');
}
