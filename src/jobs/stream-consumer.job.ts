import { z } from 'zod';
import { logger } from '../config/logger.config';
import { Operation, Operations, Transports, createEnvelope } from '../domain/commands';
import type { StreamBatch, StreamEntry, StreamSource } from '../integrations/redis/redis-stream-source';
import type { CommandBus } from '../shared/command-bus/command-bus';
import { HandlerResult, toWire } from '../shared/command-bus/handler-result';
import { ErrorCode } from '../utils/exceptions';

export const STREAM_OPERATIONS = new Map<string, Operation>([
  ['user.commands', Operations.USERS],
  ['payment.commands', Operations.PAYMENTS],
]);

export const deadLetterStream = (stream: string) => `${stream}.dead-letter`;

const DEFAULT_BATCH_SIZE = 10;
const DEFAULT_BLOCK_MS = 5000;
const READ_ERROR_BACKOFF_MS = 1000;

const streamMessageSchema = z.object({
  operation: z.string().optional(),
  data: z.record(z.unknown()).default({}),
  correlation_id: z.string().optional(),
});

type StreamMessage = z.infer<typeof streamMessageSchema>;

export interface StreamConsumerOptions {
  group: string;
  consumer: string;
  batchSize?: number;
  blockMs?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Consumer-group reader for the command streams.
 *
 * Entries in a batch are handled one at a time so per-stream order holds.
 * An entry is acknowledged once it is finished: dispatched, or copied to
 * `<stream>.dead-letter` when it ends in INTERNAL_ERROR or cannot be parsed.
 * An entry that could not be finished stays pending and is re-read from
 * this consumer's pending list on startup and after the failure.
 */
export class StreamConsumerJob {
  private running = false;
  private loop: Promise<void> | null = null;
  private recoverPending = true;
  private readonly batchSize: number;
  private readonly blockMs: number;

  constructor(
    private readonly source: StreamSource,
    private readonly commandBus: CommandBus,
    private readonly options: StreamConsumerOptions
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.blockMs = options.blockMs ?? DEFAULT_BLOCK_MS;
  }

  start(): void {
    if (this.running) {
      logger.warn('Stream consumer already running');
      return;
    }

    this.running = true;
    logger.info('Starting stream consumer', {
      streams: Array.from(STREAM_OPERATIONS.keys()),
      group: this.options.group,
      consumer: this.options.consumer,
    });
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.loop;
    this.loop = null;
    logger.info('Stream consumer stopped');
  }

  private async run(): Promise<void> {
    const streams = Array.from(STREAM_OPERATIONS.keys());
    let groupsReady = false;

    while (this.running) {
      try {
        if (!groupsReady) {
          for (const stream of streams) {
            await this.source.ensureGroup(stream, this.options.group);
          }
          groupsReady = true;
        }

        if (this.recoverPending) {
          this.recoverPending = false;
          await this.drainPending(streams);
        }

        const batches = await this.source.read(
          this.options.group,
          this.options.consumer,
          streams,
          this.batchSize,
          this.blockMs
        );
        await this.processBatches(batches);
      } catch (error) {
        // Disconnecting the client is how shutdown interrupts a blocking read
        if (!this.running) break;
        logger.error('stream-consumer read error', {
          jobName: 'stream-consumer',
          error: error instanceof Error ? error.message : String(error),
        });
        await sleep(READ_ERROR_BACKOFF_MS);
      }
    }
  }

  /**
   * Re-read entries delivered to this consumer but never acknowledged. Each
   * stream's cursor moves past the entries tried, so one that fails again
   * does not hold up the drain.
   */
  async drainPending(streams: string[]): Promise<void> {
    const cursors = new Map(streams.map((stream) => [stream, '0']));

    for (;;) {
      const batches = await this.source.read(
        this.options.group,
        this.options.consumer,
        streams,
        this.batchSize,
        this.blockMs,
        streams.map((stream) => cursors.get(stream) ?? '0')
      );
      const found = batches.filter((batch) => batch.entries.length > 0);
      if (found.length === 0) return;

      logger.info('Recovering pending stream entries', {
        entries: found.reduce((total, batch) => total + batch.entries.length, 0),
      });
      await this.processBatches(found);
      for (const batch of found) {
        cursors.set(batch.stream, batch.entries[batch.entries.length - 1].id);
      }
    }
  }

  async processBatches(batches: StreamBatch[]): Promise<void> {
    for (const batch of batches) {
      for (const entry of batch.entries) {
        try {
          await this.processEntry(batch.stream, entry);
        } catch (error) {
          this.recoverPending = true;
          logger.error('Stream entry left pending', {
            stream: batch.stream,
            messageId: entry.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }

  /**
   * Returns the dispatch result, or null when the entry was rejected unread.
   * Throws, leaving the entry unacknowledged, when the dead-letter write or
   * the ack fails.
   */
  async processEntry(stream: string, entry: StreamEntry): Promise<HandlerResult | null> {
    const operation = STREAM_OPERATIONS.get(stream);
    if (!operation) {
      logger.warn('Entry from unknown stream', { stream, messageId: entry.id });
      await this.ack(stream, entry);
      return null;
    }

    const message = this.parseMessage(entry);
    if (typeof message === 'string') {
      await this.deadLetter(stream, entry, message);
      await this.ack(stream, entry);
      return null;
    }

    const envelope = createEnvelope(Transports.STREAM, operation, message.data, {
      operation: message.operation,
      correlationId: message.correlation_id,
      idempotencyKey: `${stream}:${entry.id}`,
    });
    const result = await this.commandBus.dispatch(envelope);

    // The delivery holding the claim acknowledges it; this copy stays pending
    if (result.errorCode === ErrorCode.REQUEST_IN_PROGRESS) {
      logger.warn('Stream entry already in progress', { stream, messageId: entry.id });
      return result;
    }

    if (result.errorCode === ErrorCode.INTERNAL_ERROR) {
      await this.deadLetter(stream, entry, JSON.stringify(toWire(result)));
    }
    await this.ack(stream, entry);
    return result;
  }

  private async ack(stream: string, entry: StreamEntry): Promise<void> {
    await this.source.ack(stream, this.options.group, entry.id);
  }

  private parseMessage(entry: StreamEntry): StreamMessage | string {
    const payload = entry.fields.payload;
    if (payload === undefined) return 'Missing payload field';

    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch {
      return 'Malformed payload JSON';
    }

    const parsed = streamMessageSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return `Invalid message: ${issue.path.join('.') || 'payload'}: ${issue.message}`;
    }
    return parsed.data;
  }

  private async deadLetter(stream: string, entry: StreamEntry, error: string): Promise<void> {
    logger.error('Stream entry dead-lettered', { stream, messageId: entry.id, error });
    await this.source.append(deadLetterStream(stream), {
      message_id: entry.id,
      payload: entry.fields.payload ?? '',
      error,
    });
  }
}
