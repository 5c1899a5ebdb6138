import type { Rasterizer } from '../../infrastructure/rasterizer/index.js';

export interface ConvertOptions {
  rasterizer: Rasterizer;
  /** Rendered pages are written under `<scratchDir>/pages`. */
  scratchDir: string;
}
