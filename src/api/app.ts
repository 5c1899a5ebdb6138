import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createConvertRouter, MAX_BODY_SIZE } from './routes/convert.js';
import { requestLogger } from './middleware/request-logger.js';
import { createErrorHandler } from './middleware/error-handler.js';
import type { ConversionHandler } from '../handler/conversion-handler.js';

export interface AppOptions {
  handler: ConversionHandler;
  errorDetailsHint: string;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.use(express.raw({ type: ['application/pdf', 'application/octet-stream'], limit: MAX_BODY_SIZE }));
  // JSON stays text: the handler itself decides whether it carries a pdf_url.
  app.use(express.text({ type: ['text/plain', 'application/json'], limit: MAX_BODY_SIZE }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createConvertRouter(options.handler));

  app.use(createErrorHandler(options.errorDetailsHint));

  return app;
}
