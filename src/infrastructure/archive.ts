import JSZip from 'jszip';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import type { PageImage } from '../domain/types.js';
import { logger, type Logger } from './logger.js';

export interface BuiltArchive {
  data: Buffer;
  entryNames: string[];
}

export function pageEntryName(pageNumber: number): string {
  return `page_${pageNumber}.jpg`;
}

/** Pages must already be in page order; entries are named by position, 1-indexed. */
export async function buildPageArchive(
  pages: readonly PageImage[],
  log: Logger = logger,
): Promise<Result<BuiltArchive, AppError>> {
  const stepLog = log.child({ step: 'archiving' });
  const zip = new JSZip();
  const entryNames = pages.map((page, i) => {
    const name = pageEntryName(i + 1);
    zip.file(name, page.data);
    return name;
  });

  try {
    const data = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
    stepLog.info({ entryCount: entryNames.length, sizeBytes: data.length }, 'Archive built');
    return ok({ data, entryNames });
  } catch (cause) {
    const details = describeCause(cause);
    stepLog.error({ errorCode: ErrorCode.ARCHIVE_FAILED, retryable: false, details }, 'Failed to build archive');
    return err(createAppError(ErrorCode.ARCHIVE_FAILED, `Failed to build ZIP archive: ${details}`, false, details));
  }
}
