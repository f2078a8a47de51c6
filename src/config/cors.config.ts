import type { CorsOptions } from 'cors';
import type { Env } from './env.config';
import { logger } from './logger.config';

/**
 * Normalize an origin by stripping trailing slashes.
 */
function normalizeOrigin(origin: string): string {
  return origin.replace(/\/+$/, '');
}

/**
 * Parse CORS_ORIGINS (comma-separated). `null` means every origin is allowed.
 */
export function parseAllowlist(raw: string): string[] | null {
  const origins = raw
    .split(',')
    .map((s) => normalizeOrigin(s.trim()))
    .filter(Boolean);
  return origins.includes('*') ? null : origins;
}

export function buildCorsOptions(env: Env): CorsOptions {
  const allowlist = parseAllowlist(env.CORS_ORIGINS);

  return {
    origin: (origin, callback) => {
      // Allow requests with no origin (server-to-server, curl)
      if (!origin || !allowlist) return callback(null, true);

      if (allowlist.includes(normalizeOrigin(origin))) {
        return callback(null, true);
      }

      logger.warn('CORS rejected origin', { origin });
      return callback(null, false);
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', 'X-Correlation-ID', 'X-Idempotency-Key'],
    exposedHeaders: ['X-Request-ID'],
  };
}
