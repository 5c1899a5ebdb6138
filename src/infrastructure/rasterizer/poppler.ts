import { mkdir, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { PageImage } from '../../domain/types.js';
import { countPdfPages } from '../pdf-inspector.js';
import { logger, type Logger } from '../logger.js';
import { CommandError, runCommand, type CommandRunner } from './command.js';
import { RENDER_DPI, RENDER_WORKERS, type PageRange, type RasterizeOptions, type Rasterizer } from './types.js';

const OUTPUT_PREFIX = 'page';
const OUTPUT_FILE = /^page-(\d+)\.jpg$/;

/**
 * Splits pages 1..pageCount into at most `workers` contiguous ranges. Earlier
 * ranges take the remainder, so sizes differ by at most one page.
 */
export function splitPageRanges(pageCount: number, workers: number): PageRange[] {
  const count = Math.max(1, Math.min(workers, pageCount));
  const base = Math.floor(pageCount / count);
  const remainder = pageCount % count;

  const ranges: PageRange[] = [];
  let first = 1;
  for (let i = 0; i < count; i++) {
    const size = base + (i < remainder ? 1 : 0);
    ranges.push({ first, last: first + size - 1 });
    first += size;
  }
  return ranges;
}

function renderFailed(message: string, details?: string): AppError {
  return createAppError(ErrorCode.RENDER_FAILED, message, false, details);
}

export class PopplerRasterizer implements Rasterizer {
  private readonly binaryPath: string;
  private readonly run: CommandRunner;

  constructor(binaryPath = 'pdftoppm', run: CommandRunner = runCommand) {
    this.binaryPath = binaryPath;
    this.run = run;
  }

  async rasterize(
    pdfPath: string,
    options: RasterizeOptions,
    log: Logger = logger,
  ): Promise<Result<PageImage[], AppError>> {
    const stepLog = log.child({ step: 'rasterizing' });
    const dpi = options.dpi ?? RENDER_DPI;
    const workers = options.workers ?? RENDER_WORKERS;

    const countResult = await countPdfPages(pdfPath, log);
    if (!countResult.ok) return countResult;
    const pageCount = countResult.value;

    try {
      await mkdir(options.outputDir, { recursive: true });
    } catch (cause) {
      const details = describeCause(cause);
      stepLog.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: true, details }, 'Failed to create output directory');
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to create render output directory', true, details));
    }

    const ranges = splitPageRanges(pageCount, workers);
    const prefix = join(options.outputDir, OUTPUT_PREFIX);
    const start = Date.now();
    stepLog.info({ pageCount, dpi, ranges }, 'Rendering pages');

    // Every range is awaited before reporting, so no render process is still
    // writing into the output directory when the caller cleans it up.
    const settled = await Promise.allSettled(
      ranges.map((range) =>
        this.run(this.binaryPath, [
          '-jpeg',
          '-r', String(dpi),
          '-f', String(range.first),
          '-l', String(range.last),
          pdfPath,
          prefix,
        ]),
      ),
    );

    const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failure) {
      const details = describeCause(failure.reason);
      stepLog.error({ errorCode: ErrorCode.RENDER_FAILED, retryable: false, details }, 'PDF rasterization failed');
      return err(renderFailed(`Failed to rasterize PDF: ${details}`, details));
    }

    const collected = await this.collectPages(options.outputDir, pageCount);
    if (!collected.ok) {
      stepLog.error(
        { errorCode: collected.error.code, retryable: collected.error.retryable, details: collected.error.details },
        collected.error.message,
      );
      return collected;
    }

    stepLog.info({ pageCount, durationMs: Date.now() - start }, 'Pages rendered');
    return collected;
  }

  async probe(): Promise<Result<string, AppError>> {
    try {
      const { stdout, stderr } = await this.run(this.binaryPath, ['-v']);
      // pdftoppm prints its version banner on stderr.
      const banner = (stderr.trim() || stdout.trim()).split('\n')[0] ?? '';
      return ok(banner);
    } catch (cause) {
      // Older poppler releases exit with 99 after printing the banner.
      if (cause instanceof CommandError && cause.stderr.trim() !== '') {
        return ok(cause.stderr.trim().split('\n')[0] ?? '');
      }
      const details = describeCause(cause);
      return err(renderFailed(`Rasterization engine unavailable: ${details}`, details));
    }
  }

  private async collectPages(outputDir: string, pageCount: number): Promise<Result<PageImage[], AppError>> {
    let files: string[];
    try {
      files = await readdir(outputDir);
    } catch (cause) {
      const details = describeCause(cause);
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to read render output directory', true, details));
    }

    const numbered = files
      .map((name) => {
        const match = OUTPUT_FILE.exec(name);
        return match ? { name, pageNumber: Number.parseInt(match[1] ?? '', 10) } : null;
      })
      .filter((entry): entry is { name: string; pageNumber: number } => entry !== null)
      .sort((a, b) => a.pageNumber - b.pageNumber);

    const contiguous = numbered.every((entry, i) => entry.pageNumber === i + 1);
    if (numbered.length !== pageCount || !contiguous) {
      return err(
        renderFailed(
          `Rasterizer produced ${numbered.length} images for a ${pageCount}-page PDF`,
          `pages found: ${numbered.map((entry) => entry.pageNumber).join(', ') || 'none'}`,
        ),
      );
    }

    try {
      const pages = await Promise.all(
        numbered.map(async ({ name, pageNumber }) => ({
          pageNumber,
          data: await readFile(join(outputDir, name)),
        })),
      );
      return ok(pages);
    } catch (cause) {
      const details = describeCause(cause);
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to read rendered page', true, details));
    }
  }
}
