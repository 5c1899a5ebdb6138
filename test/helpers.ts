import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { PDFDocument } from 'pdf-lib';
import type { CommandRunner } from '../src/infrastructure/rasterizer/index.js';

export async function createTestPdf(pageCount: number): Promise<Buffer> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) {
    doc.addPage([200, 200]);
  }
  return Buffer.from(await doc.save());
}

/** Not a real JPEG, just recognizable per page: SOI marker followed by the page number. */
export function fakeJpeg(pageNumber: number): Buffer {
  return Buffer.from([0xff, 0xd8, 0xff, 0xe0, pageNumber]);
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'pdf2jpg-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface FakePdftoppm {
  run: CommandRunner;
  calls: string[][];
}

interface FakePdftoppmOptions {
  /** Zero-pad page numbers in file names to this width, as pdftoppm does for long documents. */
  padTo?: number;
  /** Pages the fake "forgets" to write. */
  skipPages?: number[];
  /** Fail the invocation whose range starts at this page. */
  failFrom?: number;
  versionBanner?: string;
}

/**
 * Stands in for `pdftoppm -jpeg -r <dpi> -f <first> -l <last> <pdf> <prefix>`,
 * writing `<prefix>-<n>.jpg` for each page in the range.
 */
export function createFakePdftoppm(options: FakePdftoppmOptions = {}): FakePdftoppm {
  const calls: string[][] = [];

  const run: CommandRunner = async (_command, args) => {
    calls.push([...args]);

    if (args[0] === '-v') {
      return { stdout: '', stderr: options.versionBanner ?? 'pdftoppm version 24.02.0\nCopyright 2005-2024 The Poppler Developers\n' };
    }

    const first = Number(args[args.indexOf('-f') + 1]);
    const last = Number(args[args.indexOf('-l') + 1]);
    const prefix = args[args.length - 1];

    if (options.failFrom === first) {
      throw new Error('pdftoppm exited with code 99: Syntax Error: broken xref');
    }

    for (let n = first; n <= last; n++) {
      if (options.skipPages?.includes(n)) continue;
      const label = String(n).padStart(options.padTo ?? 1, '0');
      await writeFile(`${prefix}-${label}.jpg`, fakeJpeg(n));
    }
    return { stdout: '', stderr: '' };
  };

  return { run, calls };
}

export async function readArchive(data: Buffer): Promise<{ names: string[]; zip: JSZip }> {
  const zip = await JSZip.loadAsync(data);
  return { names: Object.keys(zip.files), zip };
}
