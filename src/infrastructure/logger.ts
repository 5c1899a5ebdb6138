import { randomUUID } from 'node:crypto';
import pino, { type Logger } from 'pino';

export const logger = pino({
  name: 'pdf-to-jpeg-zip',
  level: process.env.LOG_LEVEL ?? 'info',
});

export type { Logger };

export function createRequestLogger(requestId?: string): Logger {
  return logger.child({ requestId: requestId ?? randomUUID() });
}
