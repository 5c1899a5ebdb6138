export type { Rasterizer, RasterizeOptions, PageRange } from './types.js';
export { RENDER_DPI, RENDER_WORKERS } from './types.js';
export { PopplerRasterizer, splitPageRanges } from './poppler.js';
export { runCommand, CommandError } from './command.js';
export type { CommandRunner, CommandOutput } from './command.js';

import { PopplerRasterizer } from './poppler.js';
import type { Rasterizer } from './types.js';
import type { AppConfig } from '../config.js';

export function createRasterizer(config: Pick<AppConfig, 'pdftoppmPath'>): Rasterizer {
  return new PopplerRasterizer(config.pdftoppmPath);
}
