import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { PageImage } from '../../domain/types.js';
import type { Logger } from '../logger.js';

export const RENDER_DPI = 150;
export const RENDER_WORKERS = 2;

export interface RasterizeOptions {
  outputDir: string;
  dpi?: number;
  /** Upper bound on concurrent render processes; pages are always returned in page order. */
  workers?: number;
}

export interface Rasterizer {
  rasterize(
    pdfPath: string,
    options: RasterizeOptions,
    log?: Logger,
  ): Promise<Result<PageImage[], AppError>>;

  /** Reports the engine version, for cold-start diagnostics. */
  probe(): Promise<Result<string, AppError>>;
}

export interface PageRange {
  first: number;
  last: number;
}
