/**
 * Redis Connection Configuration
 */

import { Redis, type RedisOptions } from 'ioredis';
import type { Env } from './env.js';
import { logger } from '../utils/logger.js';

const MAX_CONNECTION_ATTEMPTS = 3;

export function createRedisClient(env: Env): Redis {
  const options: RedisOptions = {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
    db: env.REDIS_DB,
    enableReadyCheck: true,
    lazyConnect: true,
    family: 4, // Use IPv4
    retryStrategy: (times: number) => {
      if (times > MAX_CONNECTION_ATTEMPTS) {
        return null; // Stop retrying after max attempts
      }
      // Exponential backoff with max delay of 5 seconds
      return Math.min(times * 100, 5000);
    },
  };

  const client = new Redis(options);

  client.on('error', (err) => {
    logger.error({ error: err, host: env.REDIS_HOST, port: env.REDIS_PORT }, 'Redis connection error');
  });
  client.on('ready', () => {
    logger.info({ host: env.REDIS_HOST, port: env.REDIS_PORT, db: env.REDIS_DB }, 'Redis connection ready');
  });

  return client;
}
