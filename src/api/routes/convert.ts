import { Router, type Request, type Response } from 'express';
import type { ConversionHandler } from '../../handler/conversion-handler.js';

export const MAX_BODY_SIZE = '50mb';

// An empty or unparsed body reaches the handler as a missing one.
function toInvocationBody(body: unknown): string | Buffer | undefined {
  if (Buffer.isBuffer(body)) return body.length > 0 ? body : undefined;
  if (typeof body === 'string') return body.length > 0 ? body : undefined;
  return undefined;
}

export function createConvertRouter(handler: ConversionHandler): Router {
  const router = Router();

  router.post('/convert', async (req: Request, res: Response) => {
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
    const body = toInvocationBody(req.body);
    const event = body === undefined ? {} : { body };

    const result = await handler(event, { awsRequestId: requestId });

    res.status(result.statusCode).set(result.headers);
    res.send(result.isBase64Encoded ? Buffer.from(result.body, 'base64') : result.body);
  });

  return router;
}
