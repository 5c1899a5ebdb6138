import { createWriteStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { logger, type Logger } from './logger.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

export interface DownloadedFile {
  path: string;
  sizeBytes: number;
}

/**
 * Streams the document at `url` into `destination` without buffering it in
 * memory. Any network failure or non-2xx status is a FETCH_FAILED error.
 */
export async function downloadPdf(
  url: string,
  destination: string,
  fetchFn: FetchFn = fetch,
  log: Logger = logger,
): Promise<Result<DownloadedFile, AppError>> {
  const stepLog = log.child({ step: 'fetching_pdf' });

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (cause) {
    const details = describeCause(cause);
    stepLog.error({ errorCode: ErrorCode.FETCH_FAILED, retryable: false, details }, 'Invalid PDF URL');
    return err(createAppError(ErrorCode.FETCH_FAILED, `Invalid PDF URL: ${url}`, false, details));
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    stepLog.error({ errorCode: ErrorCode.FETCH_FAILED, retryable: false, protocol: parsed.protocol }, 'Unsupported URL protocol');
    return err(
      createAppError(ErrorCode.FETCH_FAILED, `Unsupported URL protocol '${parsed.protocol}'`, false),
    );
  }

  stepLog.info({ url: parsed.href }, 'Downloading PDF');

  let response: Response;
  try {
    response = await fetchFn(parsed.href);
  } catch (cause) {
    const details = describeCause(cause);
    stepLog.error({ errorCode: ErrorCode.FETCH_FAILED, retryable: true, details }, 'PDF download failed');
    return err(createAppError(ErrorCode.FETCH_FAILED, `Failed to download PDF: ${details}`, true, details));
  }

  if (!response.ok) {
    const retryable = response.status >= 500 || response.status === 429;
    stepLog.error(
      { errorCode: ErrorCode.FETCH_FAILED, retryable, status: response.status },
      'PDF download returned an error status',
    );
    return err(
      createAppError(
        ErrorCode.FETCH_FAILED,
        `Failed to download PDF: HTTP ${response.status} ${response.statusText}`.trim(),
        retryable,
      ),
    );
  }

  if (!response.body) {
    stepLog.error({ errorCode: ErrorCode.FETCH_FAILED, retryable: false }, 'PDF download returned no body');
    return err(createAppError(ErrorCode.FETCH_FAILED, 'Failed to download PDF: empty response body', false));
  }

  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(destination));
    const { size } = await stat(destination);
    stepLog.info({ path: destination, sizeBytes: size }, 'PDF downloaded');
    return ok({ path: destination, sizeBytes: size });
  } catch (cause) {
    const details = describeCause(cause);
    stepLog.error({ errorCode: ErrorCode.FETCH_FAILED, retryable: true, details }, 'PDF download interrupted');
    return err(createAppError(ErrorCode.FETCH_FAILED, `Failed to download PDF: ${details}`, true, details));
  }
}
