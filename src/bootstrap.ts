import type Redis from 'ioredis';
import type { Pool } from 'pg';
import type { Env } from './config/env.config';
import { logger } from './config/logger.config';
import { checkRedisHealth, createRedisClient, isRedisConfigured } from './config/redis.config';
import { Application, ApplicationPorts, buildApplication, createInMemoryPorts } from './container';
import { PoolHealth, checkDatabaseHealth, createPool, getPoolHealth, getPoolMetrics } from './db/pool';
import { ProviderFactory } from './integrations/provider-factory';
import { RedisStreamSource } from './integrations/redis/redis-stream-source';
import { RedisTaskQueue } from './integrations/redis/redis-task-queue';
import { QueueWorkerJob } from './jobs/queue-worker.job';
import { StreamConsumerJob } from './jobs/stream-consumer.job';
import { NotificationsRepository } from './modules/notifications/notifications.repository';
import { PaymentsRepository } from './modules/payments/payments.repository';
import { UsersRepository } from './modules/users/users.repository';
import type { ReadinessCheck } from './routes';
import { InMemoryIdempotencyStore, RedisIdempotencyStore } from './shared/command-bus/idempotency.store';
import { RedisEventSubscriber } from './shared/events/redis-event.subscriber';

interface BackgroundJob {
  start(): void;
  stop(): Promise<void>;
}

export interface Runtime {
  application: Application;
  readiness: ReadinessCheck[];
  /** Start the queue worker and stream consumer enabled by configuration */
  startWorkers(): void;
  /** Stop workers and release every connection */
  close(): Promise<void>;
}

function databaseReadiness(pool: Pool): ReadinessCheck {
  return {
    name: 'database',
    check: async () => {
      const health = getPoolHealth(pool);
      if (health !== PoolHealth.HEALTHY) {
        logger.warn('Database pool under pressure', { health, ...getPoolMetrics(pool) });
      }
      return health !== PoolHealth.CRITICAL && (await checkDatabaseHealth(pool));
    },
  };
}

/**
 * Bind concrete adapters from configuration and build the Application.
 */
export function bootstrap(env: Env): Runtime {
  const readiness: ReadinessCheck[] = [];
  const jobs: BackgroundJob[] = [];
  const blockingClients: Redis[] = [];
  let pool: Pool | null = null;
  let redis: Redis | null = null;

  const ports: ApplicationPorts = createInMemoryPorts({
    emailService: ProviderFactory.createEmailService(env),
    paymentGateway: ProviderFactory.createPaymentGateway(env),
    idempotencyStore: new InMemoryIdempotencyStore(),
  });

  if (env.REPOSITORY_DRIVER === 'postgres') {
    const db = createPool(env);
    pool = db;
    ports.userRepo = new UsersRepository(db);
    ports.paymentRepo = new PaymentsRepository(db);
    ports.notificationRepo = new NotificationsRepository(db);
    readiness.push(databaseReadiness(db));
  }

  if (isRedisConfigured(env)) {
    const client = createRedisClient(env, 'commands');
    redis = client;
    ports.idempotencyStore = new RedisIdempotencyStore(client);
    ports.eventSubscribers = [new RedisEventSubscriber(client, env.APP_NAME)];
    readiness.push({ name: 'redis', check: () => checkRedisHealth(client) });
  }

  logger.info('Adapters bound', {
    repositories: env.REPOSITORY_DRIVER,
    redis: redis ? 'enabled' : 'disabled',
  });

  const application = buildApplication(ports, {
    appName: env.APP_NAME,
    idempotencyTtlMs: env.IDEMPOTENCY_TTL_MS,
  });

  const startWorkers = () => {
    if (!isRedisConfigured(env)) {
      logger.info('Background workers disabled', { reason: 'REDIS_HOST not set' });
      return;
    }

    // Blocking reads hold their connection, so each worker gets its own
    if (env.RUN_QUEUE_WORKER) {
      const client = createRedisClient(env, 'queue-worker');
      blockingClients.push(client);
      jobs.push(
        new QueueWorkerJob(new RedisTaskQueue(client), application.commandBus, {
          maxAttempts: env.QUEUE_MAX_ATTEMPTS,
          pollTimeoutSeconds: env.QUEUE_POLL_TIMEOUT_SECONDS,
        })
      );
    }

    if (env.RUN_STREAM_CONSUMER) {
      const client = createRedisClient(env, 'stream-consumer');
      blockingClients.push(client);
      jobs.push(
        new StreamConsumerJob(new RedisStreamSource(client), application.commandBus, {
          group: env.STREAM_GROUP,
          consumer: env.STREAM_CONSUMER,
        })
      );
    }

    for (const job of jobs) job.start();
  };

  const close = async () => {
    const stopping = jobs.map((job) => job.stop());
    for (const client of blockingClients) client.disconnect();
    await Promise.all(stopping);

    if (redis) await redis.quit();
    if (pool) await pool.end();
    logger.info('Connections closed');
  };

  return { application, readiness, startWorkers, close };
}
