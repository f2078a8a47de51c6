import { Pool } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import type { Env } from '../config/env.config';
import { logger } from '../config/logger.config';

// Pool health states reported by /health/ready
export enum PoolHealth {
  HEALTHY = 'healthy', // < 70% capacity
  DEGRADED = 'degraded', // 70-95% capacity or waitingCount > 0
  CRITICAL = 'critical', // > 95% capacity or waitingCount > 5
}

export function createPool(env: Env): Pool {
  const pool = new Pool(getDatabaseConfig(env));

  // An idle client erroring must not crash the process
  pool.on('error', (err: Error) => {
    logger.error('Unexpected database pool error', { error: err.message });
  });

  return pool;
}

export function getPoolMetrics(pool: Pool) {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}

export function getPoolHealth(pool: Pool): PoolHealth {
  const total = pool.totalCount;
  const idle = pool.idleCount;
  const waiting = pool.waitingCount;
  const usage = total > 0 ? (total - idle) / total : 0;

  if (waiting > 5 || usage > 0.95) return PoolHealth.CRITICAL;
  if (waiting > 0 || usage > 0.7) return PoolHealth.DEGRADED;
  return PoolHealth.HEALTHY;
}

export async function checkDatabaseHealth(pool: Pool): Promise<boolean> {
  try {
    await pool.query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn('Database health check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
