import { randomUUID } from 'node:crypto';
import type { RequestHandler } from 'express';
import type { Logger } from '@persistor/shared';

declare global {
  namespace Express {
    interface Request {
      log: Logger;
      requestId: string;
    }
  }
}

/**
 * Attach a request-scoped logger and log the start and end of every request.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = randomUUID();
    const startTime = Date.now();

    req.requestId = requestId;
    req.log = logger.child({ requestId, method: req.method, path: req.path });

    req.log.info('Request received', { query: req.query });

    res.on('finish', () => {
      req.log.info('Request completed', {
        statusCode: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });

    next();
  };
}
