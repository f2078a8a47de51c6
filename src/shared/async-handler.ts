import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Wraps an async route handler to automatically catch rejected promises
 * and forward them to Express error-handling middleware via next(error).
 *
 * Usage in route files:
 *   router.get('/:userId', asyncHandler(controller.getUser));
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
