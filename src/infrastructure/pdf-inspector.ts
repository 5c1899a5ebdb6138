import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { logger, type Logger } from './logger.js';

export async function countPdfPages(
  pdfPath: string,
  log: Logger = logger,
): Promise<Result<number, AppError>> {
  const stepLog = log.child({ step: 'inspecting_pdf' });

  let data: Buffer;
  try {
    data = await readFile(pdfPath);
  } catch (cause) {
    const details = describeCause(cause);
    stepLog.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: false, path: pdfPath, details }, 'PDF file not readable');
    return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'PDF file not readable', false, details));
  }

  const loadingTask = getDocument({ data: new Uint8Array(data), isEvalSupported: false });
  try {
    const pdf = await loadingTask.promise;
    const pageCount = pdf.numPages;
    if (pageCount < 1) {
      stepLog.error({ errorCode: ErrorCode.RENDER_FAILED, retryable: false }, 'PDF has no pages');
      return err(createAppError(ErrorCode.RENDER_FAILED, 'PDF has no pages', false));
    }
    stepLog.debug({ pageCount }, 'PDF inspected');
    return ok(pageCount);
  } catch (cause) {
    const details = describeCause(cause);
    stepLog.error({ errorCode: ErrorCode.RENDER_FAILED, retryable: false, details }, 'Failed to parse PDF');
    return err(createAppError(ErrorCode.RENDER_FAILED, `Failed to parse PDF document: ${details}`, false, details));
  } finally {
    await loadingTask.destroy();
  }
}
