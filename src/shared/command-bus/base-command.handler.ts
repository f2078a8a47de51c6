import { z } from 'zod';
import { logger } from '../../config/logger.config';
import type { HandlerContext, Transport } from '../../domain/commands';
import { AppException, ErrorCode, ValidationException } from '../../utils/exceptions';
import type { CommandHandler } from './handler-registry';
import { HandlerResult, failureResult, successResult } from './handler-result';

export type OperationRoute = (
  data: Record<string, unknown>,
  context: HandlerContext
) => Promise<unknown>;

/**
 * Validate raw input against a command schema.
 * The first zod issue becomes a ValidationException ("path: message").
 */
export function parseCommand<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : '';
    const message = issue ? issue.message : 'Invalid command';
    throw new ValidationException(field ? `${field}: ${message}` : message, field || undefined);
  }
  return result.data;
}

/**
 * Client-class exceptions (validation, not found, conflicts, rule violations)
 * are reported as results; anything else is left for the dispatcher.
 */
export function isDomainException(error: unknown): error is AppException {
  return error instanceof AppException && error.expose;
}

/**
 * Shared handler flow: pick the sub-operation route, run it, and turn
 * domain exceptions into failed results.
 */
export abstract class BaseCommandHandler implements CommandHandler {
  protected abstract readonly transport: Transport;
  protected abstract readonly defaultOperation: string;

  protected abstract routes(): Record<string, OperationRoute>;

  async handle(data: Record<string, unknown>, context: HandlerContext): Promise<HandlerResult> {
    const operation = context.operation || this.defaultOperation;
    const routes = this.routes();
    const route = Object.prototype.hasOwnProperty.call(routes, operation) ? routes[operation] : undefined;

    if (!route) {
      logger.warn('Unknown handler operation', {
        handler: this.constructor.name,
        operation,
        correlationId: context.correlationId,
      });
      return failureResult(ErrorCode.INVALID_OPERATION, `Unknown operation: ${operation}`);
    }

    logger.debug('Handling command', {
      handler: this.constructor.name,
      transport: this.transport,
      operation,
      correlationId: context.correlationId,
    });

    try {
      return successResult(await route(data, context));
    } catch (error) {
      if (isDomainException(error)) {
        logger.warn('Command rejected', {
          handler: this.constructor.name,
          operation,
          code: error.errorCode,
          message: error.message,
          correlationId: context.correlationId,
        });
        return failureResult(error.errorCode, error.message);
      }
      throw error;
    }
  }

  /**
   * Merge the entity id into the payload. HTTP handlers take it from the
   * path; queue and stream handlers find it in the payload already.
   */
  protected withEntityId(
    data: Record<string, unknown>,
    field: string,
    pathValue: string | undefined
  ): Record<string, unknown> {
    if (this.transport !== 'http' || pathValue === undefined) {
      return data;
    }
    return { ...data, [field]: pathValue };
  }

  protected withCorrelation(
    data: Record<string, unknown>,
    context: HandlerContext
  ): Record<string, unknown> {
    return { ...data, correlation_id: context.correlationId };
  }
}
