import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Result } from '../../domain/result.js';
import { ok, err } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { invocationEvent, remotePdfRequest } from '../../domain/schemas.js';
import type { PdfInput, ResolvedPdf } from '../../domain/types.js';
import { downloadPdf } from '../../infrastructure/pdf-fetcher.js';
import { logger, type Logger } from '../../infrastructure/logger.js';
import { INPUT_FILENAME, type ResolveOptions } from './types.js';

const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Decides how to read the request body. Pure: nothing is decoded, fetched or
 * written here. Rules apply in order and the first match wins:
 *
 * 1. no event object or no body: INVALID_INPUT
 * 2. text that is a JSON object with a string `pdf_url`: remote mode
 * 3. any other text: base64
 * 4. bytes: raw PDF
 */
export function classifyPayload(event: unknown): Result<PdfInput, AppError> {
  const parsed = invocationEvent.safeParse(event);
  if (!parsed.success || parsed.data.body === undefined || parsed.data.body === null) {
    return err(createAppError(ErrorCode.INVALID_INPUT, 'No body found in request', false));
  }

  const { body } = parsed.data;

  if (typeof body === 'string') {
    const remote = remotePdfRequest.safeParse(parseJson(body));
    if (remote.success) {
      return ok({ kind: 'url', url: remote.data.pdf_url });
    }
    return ok({ kind: 'base64', text: body });
  }

  if (body instanceof Uint8Array) {
    return ok({ kind: 'raw', bytes: body });
  }

  return err(
    createAppError(ErrorCode.DECODE_FAILED, `Unsupported body type: ${typeof body}`, false),
  );
}

/** Strict decode: whitespace is ignored, any other non-alphabet character fails. */
export function decodeBase64Body(text: string): Result<Buffer, AppError> {
  const compact = text.replace(/\s+/g, '');
  if (compact.length === 0) {
    return err(createAppError(ErrorCode.DECODE_FAILED, 'Request body is empty', false));
  }
  if (compact.length % 4 !== 0 || !BASE64_BODY.test(compact)) {
    return err(
      createAppError(
        ErrorCode.DECODE_FAILED,
        'Request body is neither a pdf_url JSON object nor valid base64',
        false,
        `${compact.length} characters after removing whitespace`,
      ),
    );
  }
  return ok(Buffer.from(compact, 'base64'));
}

async function writeInputFile(
  path: string,
  bytes: Uint8Array,
  log: Logger,
): Promise<Result<ResolvedPdf, AppError>> {
  try {
    await writeFile(path, bytes);
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: true, details }, 'Failed to write input PDF');
    return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to write input PDF', true, details));
  }
  return ok({ path, sizeBytes: bytes.length, source: 'raw' });
}

/** Materializes the classified input as `input.pdf` inside the scratch directory. */
export async function resolvePdf(
  input: PdfInput,
  options: ResolveOptions,
  log: Logger = logger,
): Promise<Result<ResolvedPdf, AppError>> {
  const stepLog = log.child({ step: 'resolving_input' });
  const path = join(options.scratchDir, INPUT_FILENAME);

  switch (input.kind) {
    case 'url': {
      const downloaded = await downloadPdf(input.url, path, options.fetchFn, log);
      if (!downloaded.ok) return downloaded;
      return ok({ ...downloaded.value, source: 'url' });
    }

    case 'base64': {
      const decoded = decodeBase64Body(input.text);
      if (!decoded.ok) {
        stepLog.error({ errorCode: decoded.error.code, retryable: false, details: decoded.error.details }, decoded.error.message);
        return decoded;
      }
      const written = await writeInputFile(path, decoded.value, stepLog);
      if (!written.ok) return written;
      stepLog.info({ sizeBytes: written.value.sizeBytes }, 'Base64 body decoded');
      return ok({ ...written.value, source: 'base64' });
    }

    case 'raw': {
      if (input.bytes.length === 0) {
        stepLog.error({ errorCode: ErrorCode.DECODE_FAILED, retryable: false }, 'Request body is empty');
        return err(createAppError(ErrorCode.DECODE_FAILED, 'Request body is empty', false));
      }
      const written = await writeInputFile(path, input.bytes, stepLog);
      if (!written.ok) return written;
      stepLog.info({ sizeBytes: written.value.sizeBytes }, 'Binary body received');
      return written;
    }
  }
}
