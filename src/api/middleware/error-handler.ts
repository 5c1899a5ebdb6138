import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { ErrorBody } from '../../handler/response.js';
import { logger } from '../../infrastructure/logger.js';

// body-parser attaches the HTTP status it wants (413 for an oversized body,
// 400 for a malformed one) to the errors it passes on.
function clientStatus(err: Error): number | undefined {
  if (!('status' in err) || typeof err.status !== 'number') return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

export function createErrorHandler(detailsHint: string): ErrorRequestHandler {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const status = clientStatus(err);
    const body: ErrorBody = status
      ? { error: err.message, details: detailsHint }
      : { error: 'An unexpected error occurred', details: detailsHint };

    if (!status) {
      logger.error({ err: err.message, requestId: res.locals.requestId }, 'Unhandled error');
    }
    res.status(status ?? 500).json(body);
  };
}
