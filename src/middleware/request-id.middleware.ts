import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

export const REQUEST_ID_HEADER = 'X-Request-ID';

// Max 128 chars, alphanumeric + hyphens only (keeps ids safe to log)
const REQUEST_ID_PATTERN = /^[a-zA-Z0-9-]{1,128}$/;

/**
 * Request ID middleware.
 * The id doubles as the command correlation id, so a client-supplied
 * X-Request-ID (or X-Correlation-ID) flows into every published event.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const clientId = req.get(REQUEST_ID_HEADER) ?? req.get('X-Correlation-ID');
  const requestId = clientId && REQUEST_ID_PATTERN.test(clientId) ? clientId : uuidv4();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  next();
}
