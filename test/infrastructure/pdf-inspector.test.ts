import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { countPdfPages } from '../../src/infrastructure/pdf-inspector.js';
import { createTestPdf, makeTempDir, removeDir } from '../helpers.js';

describe('countPdfPages', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('counts the pages of a valid PDF', async () => {
    const path = join(dir, 'three.pdf');
    await writeFile(path, await createTestPdf(3));

    const result = await countPdfPages(path);

    expect(result).toEqual({ ok: true, value: 3 });
  });

  it('returns RENDER_FAILED for corrupt data', async () => {
    const path = join(dir, 'corrupt.pdf');
    await writeFile(path, 'not a pdf at all');

    const result = await countPdfPages(path);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('RENDER_FAILED');
      expect(result.error.message.startsWith('Failed to parse PDF document: ')).toBe(true);
      expect(result.error.retryable).toBe(false);
    }
  });

  it('returns FILE_STORAGE_ERROR for a missing file', async () => {
    const result = await countPdfPages(join(dir, 'absent.pdf'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('FILE_STORAGE_ERROR');
    }
  });
});
