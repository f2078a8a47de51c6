import { Request, Response } from 'express';
import { CommandEnvelope, HandlerContext, Operation, Transports, createEnvelope } from '../domain/commands';
import { HandlerResult, toWire } from '../shared/command-bus/handler-result';
import { ErrorCode, ErrorCodeType, ValidationException } from './exceptions';

// Import for side-effect: registers requestId on Express.Request globally
import '../middleware/request-id.middleware';

/**
 * Controller helper functions shared by the HTTP transport.
 */

export const IDEMPOTENCY_KEY_HEADER = 'X-Idempotency-Key';

type PathIds = Pick<HandlerContext, 'userId' | 'paymentId' | 'notificationId'>;

const STATUS_BY_ERROR_CODE: Partial<Record<ErrorCodeType, number>> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_OPERATION]: 400,
  [ErrorCode.TRANSPORT_NOT_SUPPORTED]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.HANDLER_NOT_FOUND]: 404,
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.REQUEST_IN_PROGRESS]: 409,
  [ErrorCode.BUSINESS_RULE_VIOLATION]: 422,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export function statusForResult(result: HandlerResult, successStatus = 200): number {
  if (result.success) return successStatus;
  return (result.errorCode && STATUS_BY_ERROR_CODE[result.errorCode]) || 500;
}

/**
 * Write a dispatcher result as the snake_case wire envelope.
 */
export function renderResult(res: Response, result: HandlerResult, successStatus = 200): void {
  res.status(statusForResult(result, successStatus)).json(toWire(result));
}

/**
 * @throws ValidationException if the parameter is missing or blank
 */
export function requireParam(req: Request, name: string): string {
  const value = req.params[name];
  if (!value || !value.trim()) throw new ValidationException(`Missing path parameter: ${name}`, name);
  return value;
}

/**
 * The parsed JSON body, which must be an object.
 * @throws ValidationException for arrays, scalars or a missing body
 */
export function requireBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationException('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

/**
 * Build the HTTP envelope for a request. The request id is the correlation id.
 */
export function buildHttpEnvelope(
  req: Request,
  operation: Operation,
  subOperation: string,
  payload: Record<string, unknown>,
  ids: PathIds = {}
): CommandEnvelope {
  return createEnvelope(Transports.HTTP, operation, payload, {
    ...ids,
    operation: subOperation,
    correlationId: req.requestId,
    idempotencyKey: req.get(IDEMPOTENCY_KEY_HEADER) || undefined,
  });
}
