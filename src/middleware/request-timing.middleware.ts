import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.config';

const SLOW_REQUEST_MS = 500;

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = performance.now();

  res.on('finish', () => {
    const durationMs = performance.now() - start;
    const details = {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      requestId: req.requestId,
      durationMs: Math.round(durationMs * 100) / 100,
    };

    if (durationMs > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', details);
    } else {
      logger.debug('Request completed', details);
    }
  });

  next();
}
