/**
 * Command Bus - Central Dispatch
 *
 * Every transport hands its envelope to CommandBus.dispatch. The bus resolves
 * the handler for (operation, transport), runs it, and always returns a
 * HandlerResult with timing attached. Callers never see a raw exception.
 *
 * Key design principles:
 * - Thin layer: handlers wrap the module services
 * - Observable: all commands are logged with timing
 * - Redelivery-safe: results are recorded per idempotency key and replayed
 */

import { logger } from '../../config/logger.config';
import type { CommandEnvelope } from '../../domain/commands';
import { AppException, ErrorCode } from '../../utils/exceptions';
import type { HandlerRegistry } from './handler-registry';
import { HandlerResult, failureResult } from './handler-result';
import type { ClaimOutcome, IdempotencyStore } from './idempotency.store';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred.';
export const IN_PROGRESS_MESSAGE = 'Request is already being processed';

const DEFAULT_IDEMPOTENCY_TTL_MS = 24 * 60 * 60 * 1000;
// A claim outlives its command only when the process dies mid-command
const DEFAULT_CLAIM_TTL_MS = 5 * 60 * 1000;

// Reads are never recorded: a replay would return stale data
const UNRECORDED_SUB_OPERATIONS = new Set(['get']);

export interface CommandBusOptions {
  idempotencyStore?: IdempotencyStore;
  idempotencyTtlMs?: number;
  claimTtlMs?: number;
}

export class CommandBus {
  private readonly idempotencyStore?: IdempotencyStore;
  private readonly idempotencyTtlMs: number;
  private readonly claimTtlMs: number;

  constructor(
    private readonly registry: HandlerRegistry,
    options: CommandBusOptions = {}
  ) {
    this.idempotencyStore = options.idempotencyStore;
    this.idempotencyTtlMs = options.idempotencyTtlMs ?? DEFAULT_IDEMPOTENCY_TTL_MS;
    this.claimTtlMs = options.claimTtlMs ?? DEFAULT_CLAIM_TTL_MS;
  }

  /**
   * Dispatch an envelope to its handler.
   * @returns HandlerResult with success status, data or error code, and timing
   */
  async dispatch(envelope: CommandEnvelope): Promise<HandlerResult> {
    const startTime = performance.now();
    const dedupeKey = this.dedupeKey(envelope);

    if (dedupeKey) {
      const claim = await this.claim(dedupeKey);
      const logContext = {
        operation: envelope.operation,
        transport: envelope.transport,
        idempotencyKey: envelope.context.idempotencyKey,
        correlationId: envelope.context.correlationId,
      };

      if (claim.status === 'completed') {
        logger.info('Replaying recorded command result', logContext);
        return { ...claim.result, executionTimeMs: performance.now() - startTime };
      }
      if (claim.status === 'in_progress') {
        logger.warn('Duplicate command while the first is still running', logContext);
        return {
          ...failureResult(ErrorCode.REQUEST_IN_PROGRESS, IN_PROGRESS_MESSAGE),
          executionTimeMs: performance.now() - startTime,
        };
      }
    }

    const result = await this.execute(envelope, startTime);

    if (dedupeKey) {
      if (result.errorCode === ErrorCode.INTERNAL_ERROR) {
        await this.release(dedupeKey);
      } else {
        await this.record(dedupeKey, result);
      }
    }
    return result;
  }

  private async execute(envelope: CommandEnvelope, startTime: number): Promise<HandlerResult> {
    const { operation, transport, context } = envelope;

    logger.debug('Dispatching command', {
      envelopeId: envelope.id,
      operation,
      transport,
      subOperation: context.operation,
      correlationId: context.correlationId,
    });

    try {
      const handler = this.registry.resolve(operation, transport);
      const result = await handler.handle(envelope.payload, context);
      const executionTimeMs = performance.now() - startTime;

      logger.info('Command executed', {
        operation,
        transport,
        subOperation: context.operation,
        success: result.success,
        errorCode: result.errorCode,
        correlationId: context.correlationId,
        durationMs: executionTimeMs,
      });

      return { ...result, executionTimeMs };
    } catch (error) {
      const executionTimeMs = performance.now() - startTime;

      if (error instanceof AppException && error.expose) {
        logger.warn('Command rejected', {
          operation,
          transport,
          code: error.errorCode,
          message: error.message,
          correlationId: context.correlationId,
        });
        return { ...failureResult(error.errorCode, error.message), executionTimeMs };
      }

      logger.error('Command execution failed', {
        operation,
        transport,
        subOperation: context.operation,
        correlationId: context.correlationId,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        durationMs: executionTimeMs,
      });

      return {
        ...failureResult(ErrorCode.INTERNAL_ERROR, UNEXPECTED_ERROR_MESSAGE),
        executionTimeMs,
      };
    }
  }

  /**
   * Scoped by operation, sub-operation and the entity id from the HTTP path,
   * so one client key reused across endpoints never crosses between them.
   */
  private dedupeKey(envelope: CommandEnvelope): string | null {
    const { idempotencyKey, operation, userId, paymentId, notificationId } = envelope.context;
    if (!this.idempotencyStore || !idempotencyKey) return null;
    if (operation && UNRECORDED_SUB_OPERATIONS.has(operation)) return null;

    const entityId = userId ?? paymentId ?? notificationId ?? '-';
    return `${envelope.operation}:${operation || 'default'}:${entityId}:${idempotencyKey}`;
  }

  // A store outage must not block commands; it only disables replay.
  private async claim(key: string): Promise<ClaimOutcome> {
    if (!this.idempotencyStore) return { status: 'claimed' };
    try {
      return await this.idempotencyStore.claim(key, this.claimTtlMs);
    } catch (error) {
      logger.error('Idempotency claim failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return { status: 'claimed' };
    }
  }

  private async record(key: string, result: HandlerResult): Promise<void> {
    if (!this.idempotencyStore) return;
    try {
      await this.idempotencyStore.set(key, result, this.idempotencyTtlMs);
    } catch (error) {
      logger.error('Idempotency record failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async release(key: string): Promise<void> {
    if (!this.idempotencyStore) return;
    try {
      await this.idempotencyStore.release(key);
    } catch (error) {
      logger.error('Idempotency release failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
