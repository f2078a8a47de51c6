import { z } from 'zod';
import { logger } from '../config/logger.config';
import { Operation, Operations, Transports, createEnvelope } from '../domain/commands';
import type { TaskQueue } from '../integrations/redis/redis-task-queue';
import type { CommandBus } from '../shared/command-bus/command-bus';
import { HandlerResult, toWire } from '../shared/command-bus/handler-result';
import { ErrorCode } from '../utils/exceptions';

/** Producers LPUSH task JSON onto these lists */
export const QUEUE_LISTS = new Map<string, Operation>([
  ['commands:users', Operations.USERS],
  ['commands:payments', Operations.PAYMENTS],
  ['commands:notifications', Operations.NOTIFICATIONS],
]);

export const DEAD_LETTER_LIST = 'commands:dead-letter';
export const RESULT_KEY_PREFIX = 'command-results:';

const DEFAULT_RESULT_TTL_SECONDS = 60 * 60;
const POLL_ERROR_BACKOFF_MS = 1000;

const queueTaskSchema = z.object({
  id: z.string().min(1),
  operation: z.string().optional(),
  data: z.record(z.unknown()).default({}),
  correlation_id: z.string().optional(),
  attempts: z.number().int().nonnegative().default(0),
});

export type QueueTask = z.infer<typeof queueTaskSchema>;

export type TaskOutcome = 'completed' | 'retried' | 'dead-lettered' | 'rejected' | 'duplicate';

export interface QueueWorkerOptions {
  /** Total deliveries of a task before it is dead-lettered */
  maxAttempts: number;
  pollTimeoutSeconds: number;
  resultTtlSeconds?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Task queue worker.
 *
 * Pops tasks oldest first, dispatches them on the queue transport and stores
 * each final result under `command-results:<id>`. A task whose result is
 * INTERNAL_ERROR is pushed back until `maxAttempts` deliveries have been made,
 * then copied to the dead-letter list. Domain failures are final.
 */
export class QueueWorkerJob {
  private running = false;
  private loop: Promise<void> | null = null;
  private readonly resultTtlSeconds: number;

  constructor(
    private readonly queue: TaskQueue,
    private readonly commandBus: CommandBus,
    private readonly options: QueueWorkerOptions
  ) {
    this.resultTtlSeconds = options.resultTtlSeconds ?? DEFAULT_RESULT_TTL_SECONDS;
  }

  start(): void {
    if (this.running) {
      logger.warn('Queue worker already running');
      return;
    }

    this.running = true;
    logger.info('Starting queue worker', {
      lists: Array.from(QUEUE_LISTS.keys()),
      maxAttempts: this.options.maxAttempts,
    });
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.loop;
    this.loop = null;
    logger.info('Queue worker stopped');
  }

  private async run(): Promise<void> {
    const lists = Array.from(QUEUE_LISTS.keys());

    while (this.running) {
      try {
        const item = await this.queue.pop(lists, this.options.pollTimeoutSeconds);
        if (item) {
          await this.processTask(item.list, item.value);
        }
      } catch (error) {
        // Disconnecting the client is how shutdown interrupts a blocking read
        if (!this.running) break;
        logger.error('queue-worker poll error', {
          jobName: 'queue-worker',
          error: error instanceof Error ? error.message : String(error),
        });
        await sleep(POLL_ERROR_BACKOFF_MS);
      }
    }
  }

  async processTask(list: string, raw: string): Promise<TaskOutcome> {
    const operation = QUEUE_LISTS.get(list);
    if (!operation) {
      await this.deadLetter({ list, raw, reason: `Unknown queue: ${list}` });
      return 'rejected';
    }

    const task = this.parseTask(raw);
    if (typeof task === 'string') {
      await this.deadLetter({ list, raw, reason: task });
      return 'rejected';
    }

    const envelope = createEnvelope(Transports.QUEUE, operation, task.data, {
      operation: task.operation,
      correlationId: task.correlation_id,
      idempotencyKey: task.id,
    });
    const result = await this.commandBus.dispatch(envelope);
    const attempt = task.attempts + 1;

    // Another delivery of this task holds the claim and will store the result
    if (result.errorCode === ErrorCode.REQUEST_IN_PROGRESS) {
      logger.warn('Task already in progress, skipped', { taskId: task.id, list });
      return 'duplicate';
    }

    if (result.errorCode === ErrorCode.INTERNAL_ERROR) {
      if (attempt < this.options.maxAttempts) {
        await this.queue.push(list, JSON.stringify({ ...task, attempts: attempt }));
        logger.warn('Task failed, re-queued', { taskId: task.id, list, attempt });
        return 'retried';
      }

      await this.deadLetter({
        list,
        task: { ...task, attempts: attempt },
        result: toWire(result),
        failed_at: new Date().toISOString(),
      });
      await this.storeResult(task.id, result);
      logger.error('Task moved to dead letter', { taskId: task.id, list, attempts: attempt });
      return 'dead-lettered';
    }

    await this.storeResult(task.id, result);
    return 'completed';
  }

  /** Returns the task, or the reason it was rejected */
  private parseTask(raw: string): QueueTask | string {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return 'Malformed task JSON';
    }

    const parsed = queueTaskSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return `Invalid task: ${issue.path.join('.') || 'task'}: ${issue.message}`;
    }
    return parsed.data;
  }

  private async storeResult(taskId: string, result: HandlerResult): Promise<void> {
    await this.queue.storeResult(
      RESULT_KEY_PREFIX + taskId,
      JSON.stringify(toWire(result)),
      this.resultTtlSeconds
    );
  }

  private async deadLetter(entry: Record<string, unknown>): Promise<void> {
    await this.queue.push(DEAD_LETTER_LIST, JSON.stringify(entry));
  }
}
