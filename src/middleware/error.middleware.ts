import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.config';
import { UNEXPECTED_ERROR_MESSAGE } from '../shared/command-bus/command-bus';
import { failureResult, toWire } from '../shared/command-bus/handler-result';
import { AppException, ErrorCode } from '../utils/exceptions';

interface BodyParserError extends Error {
  type: string;
  status: number;
}

/**
 * body-parser tags its errors with `type` and an HTTP `status`.
 */
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

/**
 * Unmatched routes get the same envelope as dispatcher failures.
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(toWire(failureResult(ErrorCode.NOT_FOUND, `Route not found: ${req.method} ${req.path}`)));
};

/**
 * Final error handler for errors raised outside the dispatcher.
 * The body always has the uniform result shape.
 */
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (isBodyParserError(err) && err.status < 500) {
    const message =
      err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message || 'Invalid request body';
    logger.warn('Rejected request body', { type: err.type, path: req.path, requestId: req.requestId });
    return res.status(err.status).json(toWire(failureResult(ErrorCode.VALIDATION_ERROR, message)));
  }

  if (err instanceof AppException && err.expose) {
    logger.warn('Application error', {
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    });
    return res.status(err.statusCode).json(toWire(failureResult(err.errorCode, err.message)));
  }

  // Never leak internals: the body carries only the generic message
  logger.error('Unexpected error', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    path: req.path,
    method: req.method,
    requestId: req.requestId,
  });

  return res
    .status(500)
    .json(toWire(failureResult(ErrorCode.INTERNAL_ERROR, UNEXPECTED_ERROR_MESSAGE)));
};
