import type { Handler } from 'aws-lambda';
import type { HandlerResponse } from '../domain/types.js';
import { loadConfig } from '../infrastructure/config.js';
import { createRasterizer } from '../infrastructure/rasterizer/index.js';
import { createConversionHandler } from './conversion-handler.js';

const config = loadConfig();

export const handler: Handler<unknown, HandlerResponse> = createConversionHandler(config, {
  rasterizer: createRasterizer(config),
});
