import { createServer } from 'http';

import { parseEnv } from './config/env.config';
import { logger } from './config/logger.config';
import { createHttpApp } from './app';
import { bootstrap } from './bootstrap';

const SHUTDOWN_TIMEOUT_MS = 10000;

function main(): void {
  const env = parseEnv();
  const runtime = bootstrap(env);
  const app = createHttpApp(runtime.application, env, runtime.readiness);
  const server = createServer(app);

  server.listen(env.PORT, '0.0.0.0', () => {
    logger.info(`${env.APP_NAME} started`, {
      port: env.PORT,
      healthCheck: `http://localhost:${env.PORT}/health`,
      operations: runtime.application.registry.listOperations(),
    });
    runtime.startWorkers();
  });

  // Graceful shutdown
  let isShuttingDown = false;
  const gracefulShutdown = () => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info('Shutting down gracefully...');

    server.close(() => {
      logger.info('HTTP server closed');
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown();
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason: String(reason) });
    gracefulShutdown();
  });
}

try {
  main();
} catch (error) {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
}
