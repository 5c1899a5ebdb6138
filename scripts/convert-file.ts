import 'dotenv/config';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createConversionHandler } from '../src/handler/conversion-handler.js';
import { loadConfig } from '../src/infrastructure/config.js';
import { createRasterizer } from '../src/infrastructure/rasterizer/index.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'convert-file' });

function printUsage(): never {
  console.error('Usage: npm run convert -- <pdf-path | pdf-url> [output.zip]');
  console.error('Example: npm run convert -- ./samples/three-pages.pdf ./pages.zip');
  process.exit(1);
}

async function main(): Promise<void> {
  const [source, outputArg] = process.argv.slice(2);
  if (!source) printUsage();

  const config = loadConfig();
  const handler = createConversionHandler(config, { rasterizer: createRasterizer(config) });

  // 1. Build the same event shape the function receives
  const isUrl = /^https?:\/\//.test(source);
  const body = isUrl
    ? JSON.stringify({ pdf_url: source })
    : (await readFile(resolve(source))).toString('base64');
  log.info({ source, mode: isUrl ? 'url' : 'base64' }, 'Invoking handler');

  // 2. Invoke
  const response = await handler({ body });

  if (!response.isBase64Encoded) {
    console.error(`Conversion failed (${response.statusCode}): ${response.body}`);
    process.exit(1);
  }

  // 3. Write the archive
  const outputPath = resolve(outputArg ?? config.archiveFilename);
  await writeFile(outputPath, Buffer.from(response.body, 'base64'));
  console.log(`Created: ${outputPath}`);
}

main().catch((error: unknown) => {
  log.error({ error }, 'Unhandled error');
  console.error(error);
  process.exit(1);
});
