import { readdir } from 'node:fs/promises';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ok, err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import type { HandlerResponse } from '../../src/domain/types.js';
import { createConversionHandler, type HandlerConfig } from '../../src/handler/conversion-handler.js';
import type { FetchFn } from '../../src/infrastructure/pdf-fetcher.js';
import { PopplerRasterizer, type Rasterizer } from '../../src/infrastructure/rasterizer/index.js';
import { createFakePdftoppm, createTestPdf, fakeJpeg, makeTempDir, readArchive, removeDir } from '../helpers.js';

const HINT = 'Check CloudWatch logs for more information';

function parseErrorBody(response: HandlerResponse): unknown {
  return JSON.parse(response.body);
}

async function archiveNames(response: HandlerResponse): Promise<string[]> {
  const { names } = await readArchive(Buffer.from(response.body, 'base64'));
  return names;
}

describe('conversion handler', () => {
  let scratchRoot: string;
  let config: HandlerConfig;

  beforeEach(async () => {
    scratchRoot = await makeTempDir();
    config = { scratchRoot, archiveFilename: 'pdf_images.zip', errorDetailsHint: HINT };
  });

  afterEach(async () => {
    await removeDir(scratchRoot);
  });

  function setup(options: { fetchFn?: FetchFn; failFrom?: number } = {}) {
    const fake = createFakePdftoppm({ failFrom: options.failFrom });
    const handler = createConversionHandler(config, {
      rasterizer: new PopplerRasterizer('pdftoppm', fake.run),
      fetchFn: options.fetchFn,
    });
    return { handler, fake };
  }

  it('returns 400 with a JSON error when the body is missing', async () => {
    const { handler } = setup();

    const response = await handler({});

    expect(response).toEqual({
      statusCode: 400,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ error: 'No body found in request', details: HINT }),
      isBase64Encoded: false,
    });
  });

  it('returns 400 when the event is not an object', async () => {
    const { handler } = setup();
    expect((await handler(null)).statusCode).toBe(400);
  });

  it('converts a base64 3-page PDF into a base64 ZIP of three pages', async () => {
    const { handler } = setup();
    const body = (await createTestPdf(3)).toString('base64');

    const response = await handler({ body }, { awsRequestId: 'req-1' });

    expect(response.statusCode).toBe(200);
    expect(response.isBase64Encoded).toBe(true);
    expect(response.headers).toEqual({
      'Content-Type': 'application/zip',
      'Content-Disposition': 'attachment; filename=pdf_images.zip',
    });
    expect(await archiveNames(response)).toEqual(['page_1.jpg', 'page_2.jpg', 'page_3.jpg']);

    const { zip } = await readArchive(Buffer.from(response.body, 'base64'));
    expect(await zip.file('page_2.jpg')?.async('nodebuffer')).toEqual(fakeJpeg(2));
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('converts a binary body', async () => {
    const { handler } = setup();

    const response = await handler({ body: await createTestPdf(5) });

    expect(response.statusCode).toBe(200);
    expect(await archiveNames(response)).toEqual(['page_1.jpg', 'page_2.jpg', 'page_3.jpg', 'page_4.jpg', 'page_5.jpg']);
  });

  it('downloads and converts a pdf_url body', async () => {
    const pdfBytes = await createTestPdf(2);
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response(pdfBytes));
    const { handler } = setup({ fetchFn });

    const response = await handler({ body: JSON.stringify({ pdf_url: 'https://host/doc.pdf' }) });

    expect(response.statusCode).toBe(200);
    expect(await archiveNames(response)).toEqual(['page_1.jpg', 'page_2.jpg']);
    expect(fetchFn).toHaveBeenCalledWith('https://host/doc.pdf');
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('returns 500 referencing the failure when the pdf_url fetch fails', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      new Response('gone', { status: 404, statusText: 'Not Found' }),
    );
    const { handler, fake } = setup({ fetchFn });

    const response = await handler({ body: JSON.stringify({ pdf_url: 'https://host/missing.pdf' }) });

    expect(response.statusCode).toBe(500);
    expect(response.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(response.isBase64Encoded).toBe(false);
    expect(parseErrorBody(response)).toEqual({ error: 'Failed to download PDF: HTTP 404 Not Found', details: HINT });
    expect(fake.calls.filter((args) => args[0] !== '-v')).toEqual([]);
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('returns 500 rather than throwing for non-JSON, non-base64 text', async () => {
    const { handler } = setup();

    const response = await handler({ body: 'this is not a pdf!' });

    expect(response.statusCode).toBe(500);
    expect(parseErrorBody(response)).toEqual({
      error: 'Request body is neither a pdf_url JSON object nor valid base64',
      details: HINT,
    });
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('returns 500 for valid base64 that is not a PDF', async () => {
    const { handler } = setup();

    const response = await handler({ body: Buffer.from('plain text, not a pdf').toString('base64') });

    expect(response.statusCode).toBe(500);
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('returns 500 and leaves no scratch files when rendering fails', async () => {
    const { handler } = setup({ failFrom: 3 });

    const response = await handler({ body: await createTestPdf(4) });

    expect(response.statusCode).toBe(500);
    expect(parseErrorBody(response)).toEqual({
      error: 'Failed to rasterize PDF: pdftoppm exited with code 99: Syntax Error: broken xref',
      details: HINT,
    });
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('gives the same page count and names for repeated conversions', async () => {
    const { handler } = setup();
    const body = (await createTestPdf(4)).toString('base64');

    const first = await handler({ body });
    const second = await handler({ body });

    expect(await archiveNames(first)).toEqual(await archiveNames(second));
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('turns a thrown error into a 500 instead of rejecting', async () => {
    const rasterizer: Rasterizer = {
      rasterize: vi.fn(async () => {
        throw new Error('engine crashed');
      }),
      probe: vi.fn(async () => ok('pdftoppm version 24.02.0')),
    };
    const handler = createConversionHandler(config, { rasterizer });

    const response = await handler({ body: await createTestPdf(1) });

    expect(response.statusCode).toBe(500);
    expect(parseErrorBody(response)).toEqual({ error: 'engine crashed', details: HINT });
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('probes the engine once per handler, not per request', async () => {
    const { handler, fake } = setup();
    const body = await createTestPdf(1);

    await handler({ body });
    await handler({ body });

    expect(fake.calls.filter((args) => args[0] === '-v')).toHaveLength(1);
  });

  it('keeps serving after the engine probe throws', async () => {
    const probe = vi
      .fn<Rasterizer['probe']>()
      .mockRejectedValueOnce(new Error('spawn EAGAIN'))
      .mockResolvedValue(ok('pdftoppm version 24.02.0'));
    const rasterizer: Rasterizer = {
      rasterize: vi.fn(async () => ok([{ pageNumber: 1, data: fakeJpeg(1) }])),
      probe,
    };
    const handler = createConversionHandler(config, { rasterizer });

    const first = await handler({ body: Buffer.from('%PDF') });
    const second = await handler({ body: Buffer.from('%PDF') });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(200);
    expect(rasterizer.rasterize).toHaveBeenCalledTimes(2);
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('keeps serving when the engine probe fails', async () => {
    const rasterizer: Rasterizer = {
      rasterize: vi.fn(async () => ok([{ pageNumber: 1, data: fakeJpeg(1) }])),
      probe: vi.fn(async () => err(createAppError(ErrorCode.RENDER_FAILED, 'Rasterization engine unavailable', false))),
    };
    const handler = createConversionHandler(config, { rasterizer });

    const response = await handler({ body: Buffer.from('%PDF') });

    expect(response.statusCode).toBe(200);
    expect(await archiveNames(response)).toEqual(['page_1.jpg']);
  });

  it('uses the configured archive filename', async () => {
    config = { ...config, archiveFilename: 'pages.zip' };
    const { handler } = setup();

    const response = await handler({ body: await createTestPdf(1) });

    expect(response.headers['Content-Disposition']).toBe('attachment; filename=pages.zip');
  });
});
