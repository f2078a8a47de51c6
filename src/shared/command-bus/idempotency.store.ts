import type Redis from 'ioredis';
import { z } from 'zod';
import { logger } from '../../config/logger.config';
import { ErrorCode } from '../../utils/exceptions';
import type { HandlerResult } from './handler-result';

export type ClaimOutcome =
  | { status: 'claimed' }
  | { status: 'in_progress' }
  | { status: 'completed'; result: HandlerResult };

/**
 * Recorded command results keyed by (operation, sub-operation, entity, idempotency key).
 *
 * A key is claimed before its command runs, so a second delivery that
 * overlaps the first sees `in_progress` instead of running the command again.
 */
export interface IdempotencyStore {
  /** Reserve the key in one step, or report the reservation or result already there */
  claim(key: string, ttlMs: number): Promise<ClaimOutcome>;
  get(key: string): Promise<HandlerResult | null>;
  set(key: string, result: HandlerResult, ttlMs: number): Promise<void>;
  /** Drop a reservation that never got a result, so the command can run again */
  release(key: string): Promise<void>;
}

const recordedResultSchema = z.object({
  success: z.boolean(),
  data: z.unknown(),
  errorCode: z.nativeEnum(ErrorCode).nullable(),
  message: z.string().nullable(),
  executionTimeMs: z.number(),
});

function toHandlerResult(parsed: z.infer<typeof recordedResultSchema>): HandlerResult {
  return {
    success: parsed.success,
    data: parsed.data ?? null,
    errorCode: parsed.errorCode,
    message: parsed.message,
    executionTimeMs: parsed.executionTimeMs,
  };
}

interface MemoryEntry {
  expiresAt: number;
  /** null while the command holding the claim is still running */
  result: HandlerResult | null;
}

/**
 * Process-local store. Entries expire lazily on read and during periodic sweeps.
 */
export class InMemoryIdempotencyStore implements IdempotencyStore {
  private entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async claim(key: string, ttlMs: number): Promise<ClaimOutcome> {
    // No await between the check and the insert
    const entry = this.live(key);
    if (entry?.result) return { status: 'completed', result: entry.result };
    if (entry) return { status: 'in_progress' };

    this.entries.set(key, { expiresAt: this.now() + ttlMs, result: null });
    return { status: 'claimed' };
  }

  async get(key: string): Promise<HandlerResult | null> {
    return this.live(key)?.result ?? null;
  }

  async set(key: string, result: HandlerResult, ttlMs: number): Promise<void> {
    this.entries.set(key, { expiresAt: this.now() + ttlMs, result });

    // Cleanup old entries if map grows too large
    if (this.entries.size > 1000) {
      this.cleanup();
    }
  }

  async release(key: string): Promise<void> {
    if (this.entries.get(key)?.result === null) {
      this.entries.delete(key);
    }
  }

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private cleanup(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}

export const PENDING_MARKER = '__pending__';

// Delete the key only while it still holds the pending marker
const RELEASE_SCRIPT = `if redis.call('GET', KEYS[1]) == ARGV[1] then return redis.call('DEL', KEYS[1]) end return 0`;

/**
 * Shared store so replays are recognised across worker processes.
 * Claims are `SET NX PX` writes of a pending marker that the result later replaces.
 */
export class RedisIdempotencyStore implements IdempotencyStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'idempotency:'
  ) {}

  async claim(key: string, ttlMs: number): Promise<ClaimOutcome> {
    const redisKey = this.prefix + key;
    const reserved = await this.redis.set(redisKey, PENDING_MARKER, 'PX', ttlMs, 'NX');
    if (reserved === 'OK') return { status: 'claimed' };

    const raw = await this.redis.get(redisKey);
    if (raw === PENDING_MARKER) return { status: 'in_progress' };

    const result = raw === null ? null : this.parse(key, raw);
    if (result) return { status: 'completed', result };

    // The key expired after the failed SET, or held an unreadable record
    const retried = await this.redis.set(redisKey, PENDING_MARKER, 'PX', ttlMs, 'NX');
    if (retried === 'OK') return { status: 'claimed' };
    if (raw !== null) {
      await this.redis.set(redisKey, PENDING_MARKER, 'PX', ttlMs);
      return { status: 'claimed' };
    }
    return { status: 'in_progress' };
  }

  async get(key: string): Promise<HandlerResult | null> {
    const raw = await this.redis.get(this.prefix + key);
    if (raw === null || raw === PENDING_MARKER) return null;
    return this.parse(key, raw);
  }

  async set(key: string, result: HandlerResult, ttlMs: number): Promise<void> {
    await this.redis.set(this.prefix + key, JSON.stringify(result), 'PX', ttlMs);
  }

  async release(key: string): Promise<void> {
    await this.redis.eval(RELEASE_SCRIPT, 1, this.prefix + key, PENDING_MARKER);
  }

  private parse(key: string, raw: string): HandlerResult | null {
    try {
      const parsed = recordedResultSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return toHandlerResult(parsed.data);
      }
      logger.warn('Discarding malformed idempotency record', { key });
    } catch (error) {
      logger.warn('Discarding unreadable idempotency record', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return null;
  }
}
