import { join } from 'node:path';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import { ok } from '../../domain/result.js';
import type { ConversionResult, ResolvedPdf } from '../../domain/types.js';
import { buildPageArchive } from '../../infrastructure/archive.js';
import { RENDER_DPI, RENDER_WORKERS } from '../../infrastructure/rasterizer/index.js';
import { logger, type Logger } from '../../infrastructure/logger.js';
import type { ConvertOptions } from './types.js';

export async function convertPdfToArchive(
  pdf: ResolvedPdf,
  options: ConvertOptions,
  log: Logger = logger,
): Promise<Result<ConversionResult, AppError>> {
  log.info({ path: pdf.path, sizeBytes: pdf.sizeBytes, source: pdf.source }, 'Converting PDF');

  const rendered = await options.rasterizer.rasterize(
    pdf.path,
    { outputDir: join(options.scratchDir, 'pages'), dpi: RENDER_DPI, workers: RENDER_WORKERS },
    log,
  );
  if (!rendered.ok) return rendered;

  const pages = [...rendered.value].sort((a, b) => a.pageNumber - b.pageNumber);

  const archived = await buildPageArchive(pages, log);
  if (!archived.ok) return archived;

  log.info({ pageCount: pages.length }, 'PDF converted');
  return ok({
    archive: archived.value.data,
    pageCount: pages.length,
    entryNames: archived.value.entryNames,
  });
}
