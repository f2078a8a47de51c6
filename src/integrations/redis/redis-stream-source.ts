import type Redis from 'ioredis';
import { z } from 'zod';
import { MessageBrokerException } from '../../utils/exceptions';

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

export interface StreamBatch {
  stream: string;
  entries: StreamEntry[];
}

/**
 * Consumer-group access to a set of streams.
 */
export interface StreamSource {
  ensureGroup(stream: string, group: string): Promise<void>;
  /**
   * Read for this consumer. `ids` holds one cursor per stream: `>` for new
   * entries, or an entry id to re-read this consumer's unacknowledged entries
   * after it.
   */
  read(
    group: string,
    consumer: string,
    streams: string[],
    count: number,
    blockMs: number,
    ids?: string[]
  ): Promise<StreamBatch[]>;
  ack(stream: string, group: string, id: string): Promise<void>;
  append(stream: string, fields: Record<string, string>): Promise<void>;
}

// XREADGROUP reply: [[stream, [[id, [field, value, ...]], ...]], ...] or null.
// Re-read pending entries that were deleted from the stream come back with null fields.
const xreadReplySchema = z
  .array(
    z.tuple([z.string(), z.array(z.tuple([z.string(), z.array(z.string()).nullable()]))])
  )
  .nullable();

function toFields(flat: string[] | null): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!flat) return fields;
  for (let i = 0; i + 1 < flat.length; i += 2) {
    fields[flat[i]] = flat[i + 1];
  }
  return fields;
}

export function parseReadReply(reply: unknown): StreamBatch[] {
  const parsed = xreadReplySchema.safeParse(reply);
  if (!parsed.success) {
    throw new MessageBrokerException('Unexpected XREADGROUP reply shape');
  }
  return (parsed.data ?? []).map(([stream, entries]) => ({
    stream,
    entries: entries.map(([id, flat]) => ({ id, fields: toFields(flat) })),
  }));
}

export class RedisStreamSource implements StreamSource {
  constructor(private readonly redis: Redis) {}

  async ensureGroup(stream: string, group: string): Promise<void> {
    try {
      await this.redis.call('XGROUP', 'CREATE', stream, group, '$', 'MKSTREAM');
    } catch (error) {
      // The group survives restarts
      if (error instanceof Error && error.message.includes('BUSYGROUP')) return;
      throw new MessageBrokerException(
        `Failed to create consumer group ${group} on ${stream}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  async read(
    group: string,
    consumer: string,
    streams: string[],
    count: number,
    blockMs: number,
    ids: string[] = streams.map(() => '>')
  ): Promise<StreamBatch[]> {
    let reply: unknown;
    try {
      reply = await this.redis.call(
        'XREADGROUP',
        'GROUP',
        group,
        consumer,
        'COUNT',
        count,
        'BLOCK',
        blockMs,
        'STREAMS',
        ...streams,
        ...ids
      );
    } catch (error) {
      throw new MessageBrokerException('Stream read failed', error instanceof Error ? error : undefined);
    }
    return parseReadReply(reply);
  }

  async ack(stream: string, group: string, id: string): Promise<void> {
    try {
      await this.redis.xack(stream, group, id);
    } catch (error) {
      throw new MessageBrokerException(`Failed to ack ${id} on ${stream}`, error instanceof Error ? error : undefined);
    }
  }

  async append(stream: string, fields: Record<string, string>): Promise<void> {
    const flat = Object.entries(fields).flat();
    try {
      await this.redis.xadd(stream, '*', ...flat);
    } catch (error) {
      throw new MessageBrokerException(`Failed to append to ${stream}`, error instanceof Error ? error : undefined);
    }
  }
}
