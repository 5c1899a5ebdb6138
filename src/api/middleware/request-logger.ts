import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const REQUEST_ID_HEADER = 'x-request-id';

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestId = req.get(REQUEST_ID_HEADER) || randomUUID();
  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const duration = Date.now() - start;
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

    logger[level](
      { requestId, method: req.method, path: req.path, statusCode: res.statusCode, durationMs: duration },
      'HTTP request',
    );
  });

  next();
}
