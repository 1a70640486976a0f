/**
 * PostgreSQL Connection Configuration
 *
 * Builds the connection pool backing the pgvector store. The pool is created
 * once by the container and passed to whoever needs it.
 */

import pg from 'pg';
import type { Env } from './env.js';
import { logger } from '../utils/logger.js';

const { Pool } = pg;

export function createPostgresPool(env: Env): pg.Pool {
  const config: pg.PoolConfig = {
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    database: env.POSTGRES_DB,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    max: env.POSTGRES_POOL_MAX,
    idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
    connectionTimeoutMillis: 10000,
    keepAlive: true,
  };

  const pool = new Pool(config);

  pool.on('error', (err) => {
    logger.error(
      {
        error: err,
        poolTotal: pool.totalCount,
        poolIdle: pool.idleCount,
        poolWaiting: pool.waitingCount,
      },
      'Unexpected error on idle PostgreSQL client'
    );
  });

  pool.on('connect', () => {
    logger.debug('PostgreSQL client connected to pool');
  });

  logger.info(
    { host: env.POSTGRES_HOST, port: env.POSTGRES_PORT, database: env.POSTGRES_DB },
    'PostgreSQL pool created'
  );

  return pool;
}
