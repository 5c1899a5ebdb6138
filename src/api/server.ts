import 'dotenv/config';
import { createApp } from './app.js';
import { createConversionHandler } from '../handler/conversion-handler.js';
import { loadConfig } from '../infrastructure/config.js';
import { createRasterizer } from '../infrastructure/rasterizer/index.js';
import { logger } from '../infrastructure/logger.js';

function main(): void {
  const config = loadConfig();
  const handler = createConversionHandler(config, { rasterizer: createRasterizer(config) });
  const app = createApp({ handler, errorDetailsHint: config.errorDetailsHint });

  app.listen(config.port, () => {
    logger.info({ port: config.port }, 'PDF to JPEG converter API started');
  });
}

try {
  main();
} catch (err) {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
}
