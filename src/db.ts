/**
 * PostgreSQL access.
 *
 * Repositories take the narrow `Queryable` interface, which `pg.Pool`
 * satisfies. Rows come back as `unknown` and each repository validates them.
 */

import pg, { type Pool } from 'pg';
import { ConsoleLogger } from './logger.js';

const logger = new ConsoleLogger('Database');

export interface QueryResultLike {
  rows: unknown[];
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

/**
 * Create the connection pool shared by all repositories.
 */
export function createPool(connectionString: string): Pool {
  const pool = new pg.Pool({ connectionString, max: 10 });

  // Idle clients can fail when the server restarts; log instead of crashing
  pool.on('error', (err) => {
    logger.error('Idle client error', err.message);
  });

  return pool;
}
