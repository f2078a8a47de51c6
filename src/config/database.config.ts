import { PoolConfig } from 'pg';
import type { Env } from './env.config';
import { logger } from './logger.config';

/**
 * Pool settings for the postgres repositories. `application_name` carries
 * APP_NAME so the service's sessions are identifiable in pg_stat_activity.
 */
export function getDatabaseConfig(env: Env): PoolConfig {
  const config: PoolConfig = {
    connectionString: env.DATABASE_URL,
    application_name: env.APP_NAME,
    max: env.DB_POOL_SIZE || 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: env.DB_STATEMENT_TIMEOUT_MS,
  };

  if (env.NODE_ENV !== 'production') return config;

  config.ssl = { rejectUnauthorized: env.DATABASE_SSL_REJECT_UNAUTHORIZED };
  if (!env.DATABASE_SSL_REJECT_UNAUTHORIZED) {
    logger.warn('Database TLS certificate validation is disabled', {
      hint: 'set DATABASE_SSL_REJECT_UNAUTHORIZED=true',
    });
  }

  return config;
}
