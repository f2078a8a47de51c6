import type Redis from 'ioredis';
import { MessageBrokerException } from '../../utils/exceptions';

/**
 * List-backed task queue as seen by the queue worker.
 */
export interface TaskQueue {
  /** Blocking pop across lists; null when the timeout elapses */
  pop(lists: string[], timeoutSeconds: number): Promise<{ list: string; value: string } | null>;
  push(list: string, value: string): Promise<void>;
  storeResult(key: string, value: string, ttlSeconds: number): Promise<void>;
}

function brokerError(action: string, error: unknown): MessageBrokerException {
  return new MessageBrokerException(
    `Task queue ${action} failed`,
    error instanceof Error ? error : undefined
  );
}

/**
 * Producers LPUSH onto `commands:<operation>`; the worker BRPOPs, so tasks
 * come out oldest first.
 */
export class RedisTaskQueue implements TaskQueue {
  constructor(private readonly redis: Redis) {}

  async pop(lists: string[], timeoutSeconds: number): Promise<{ list: string; value: string } | null> {
    try {
      const reply = await this.redis.brpop(lists, timeoutSeconds);
      if (!reply) return null;
      const [list, value] = reply;
      return { list, value };
    } catch (error) {
      throw brokerError('pop', error);
    }
  }

  async push(list: string, value: string): Promise<void> {
    try {
      await this.redis.lpush(list, value);
    } catch (error) {
      throw brokerError('push', error);
    }
  }

  async storeResult(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.redis.set(key, value, 'EX', ttlSeconds);
    } catch (error) {
      throw brokerError('result write', error);
    }
  }
}
