import type { FetchFn } from '../../infrastructure/pdf-fetcher.js';

export interface ResolveOptions {
  scratchDir: string;
  fetchFn?: FetchFn;
}

export const INPUT_FILENAME = 'input.pdf';
