// src/db/pool.ts
// What: Postgres connection pool factory.
// How: createPool() builds a small pg Pool from DATABASE_URL at boot; the pool is handed to the stores explicitly.

import pg from 'pg';
import type { Pool } from 'pg';
import logger from '../logging.js';

export type { Pool };

/** The part of a pool the stores issue statements through. */
export type Queryable = Pick<Pool, 'query'>;

export function createPool(connectionString: string): Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
  pool.on('error', (err) => {
    logger.error({ err }, 'Idle Postgres client error');
  });
  return pool;
}
