import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val) => val === 'true');

const integer = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().nonnegative());

const envSchema = z
  .object({
    // Server
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: integer('5000'),
    APP_NAME: z.string().min(1).default('Command Dispatch Service'),
    // Comma-separated list; "*" allows every origin
    CORS_ORIGINS: z.string().default('*'),

    // Logging
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Persistence
    REPOSITORY_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().optional(),
    DB_POOL_SIZE: integer('10'),
    DB_STATEMENT_TIMEOUT_MS: integer('30000'),
    DATABASE_SSL_REJECT_UNAUTHORIZED: booleanFlag('false'),

    // Redis (queue worker, stream consumer, event fan-out, idempotency)
    REDIS_HOST: z.string().optional(),
    REDIS_PORT: integer('6379'),
    REDIS_PASSWORD: z.string().optional(),
    REDIS_DB: integer('0'),

    // Transports
    RUN_QUEUE_WORKER: booleanFlag('true'),
    RUN_STREAM_CONSUMER: booleanFlag('true'),
    QUEUE_MAX_ATTEMPTS: integer('3'),
    QUEUE_POLL_TIMEOUT_SECONDS: integer('5'),
    STREAM_GROUP: z.string().min(1).default('command-dispatch'),
    STREAM_CONSUMER: z.string().min(1).default('worker-1'),
    IDEMPOTENCY_TTL_MS: integer('86400000'),

    // External services ("mock_key" selects the in-process mocks)
    EMAIL_SERVICE_URL: z.string().url().default('https://api.emailservice.example.com'),
    EMAIL_SERVICE_API_KEY: z.string().min(1).default('mock_key'),
    PAYMENT_GATEWAY_URL: z.string().url().default('https://mock-payment.example.com'),
    PAYMENT_GATEWAY_API_KEY: z.string().min(1).default('mock_key'),
  })
  .superRefine((val, ctx) => {
    if (val.REPOSITORY_DRIVER === 'postgres' && !val.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when REPOSITORY_DRIVER=postgres',
      });
    }
  });

/**
 * Parse and validate a set of environment variables.
 * Empty strings are treated as unset so `.env` placeholders fall back to defaults.
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationException(`Invalid environment configuration: ${details}`);
  }
  return result.data;
};

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
