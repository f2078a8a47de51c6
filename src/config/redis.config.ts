import Redis, { RedisOptions } from 'ioredis';
import type { Env } from './env.config';
import { logger } from './logger.config';

export function getRedisConfig(env: Env): RedisOptions {
  return {
    host: env.REDIS_HOST || 'localhost',
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD || undefined,
    db: env.REDIS_DB,
    maxRetriesPerRequest: 3,
  };
}

/**
 * Check if Redis is configured.
 * This is a synchronous check based on configuration, not connectivity.
 */
export function isRedisConfigured(env: Env): boolean {
  return !!env.REDIS_HOST;
}

/**
 * Create a Redis connection. Blocking commands (BRPOP, XREADGROUP BLOCK) hold
 * their connection, so each consumer gets its own client.
 */
export function createRedisClient(env: Env, name: string): Redis {
  const client = new Redis({ ...getRedisConfig(env), connectionName: name });
  client.on('error', (err: Error) => logger.error('Redis error', { connection: name, error: err.message }));
  client.on('connect', () => logger.info('Redis connected', { connection: name }));
  return client;
}

export async function checkRedisHealth(client: Redis): Promise<boolean> {
  try {
    const pong = await client.ping();
    return pong === 'PONG';
  } catch (error) {
    logger.warn('Redis health check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
