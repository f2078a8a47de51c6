import { Router } from 'express';
import { logger } from '../config/logger.config';
import { NotificationsController } from '../modules/notifications/notifications.controller';
import { createNotificationRoutes } from '../modules/notifications/notifications.routes';
import { PaymentsController } from '../modules/payments/payments.controller';
import { createPaymentRoutes } from '../modules/payments/payments.routes';
import { UsersController } from '../modules/users/users.controller';
import { createUserRoutes } from '../modules/users/users.routes';
import { asyncHandler } from '../shared/async-handler';
import type { CommandBus } from '../shared/command-bus/command-bus';

export interface ReadinessCheck {
  name: string;
  check: () => Promise<boolean>;
}

export interface ReadinessReport {
  ready: boolean;
  checks: Record<string, 'ok' | 'error'>;
}

/**
 * Run every check concurrently. A check that throws counts as failed.
 */
export async function evaluateReadiness(checks: ReadinessCheck[]): Promise<ReadinessReport> {
  const results = await Promise.all(
    checks.map(async ({ name, check }) => {
      try {
        return [name, await check()] as const;
      } catch (error) {
        logger.warn('Readiness check threw', {
          check: name,
          error: error instanceof Error ? error.message : String(error),
        });
        return [name, false] as const;
      }
    })
  );

  return {
    ready: results.every(([, ok]) => ok),
    checks: Object.fromEntries(results.map(([name, ok]) => [name, ok ? 'ok' : 'error'] as const)),
  };
}

/**
 * Liveness at /health; readiness at /health/ready runs every dependency check.
 */
export function createHealthRoutes(checks: ReadinessCheck[]): Router {
  const router = Router();

  router.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get(
    '/health/ready',
    asyncHandler(async (req, res) => {
      const report = await evaluateReadiness(checks);
      res.status(report.ready ? 200 : 503).json({
        status: report.ready ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        checks: report.checks,
      });
    })
  );

  return router;
}

/**
 * Command routes, mounted under /api/v1.
 */
export function createApiRoutes(commandBus: CommandBus): Router {
  const router = Router();

  router.use('/users', createUserRoutes(new UsersController(commandBus)));
  router.use('/payments', createPaymentRoutes(new PaymentsController(commandBus)));
  router.use('/notifications', createNotificationRoutes(new NotificationsController(commandBus)));

  return router;
}
