import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Env } from './config/env.config';
import type { Application } from './container';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { requestIdMiddleware } from './middleware/request-id.middleware';
import { requestTimingMiddleware } from './middleware/request-timing.middleware';
import { ReadinessCheck, createApiRoutes, createHealthRoutes } from './routes';
import { buildCorsOptions } from './config/cors.config';

export const API_PREFIX = '/api/v1';

/**
 * Build the Express app for an Application. Does not listen.
 */
export function createHttpApp(application: Application, env: Env, readiness: ReadinessCheck[] = []): Express {
  const app = express();

  app.set('trust proxy', 1);

  app.use(
    helmet({
      // API server only; no HTML served
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );
  app.use(cors(buildCorsOptions(env)));
  app.use(requestIdMiddleware);
  app.use(requestTimingMiddleware);
  app.use(express.json({ limit: '100kb' }));

  app.use(createHealthRoutes(readiness));
  app.use(API_PREFIX, createApiRoutes(application.commandBus));

  app.use(notFoundHandler);
  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
