import type { AppError, ErrorCode } from '../domain/errors.js';
import type { HandlerResponse } from '../domain/types.js';

export interface ErrorBody {
  error: string;
  details: string;
}

// Only a missing body is the caller's fault as far as the response goes;
// every other failure is reported as a processing error.
export function mapErrorCodeToStatus(code: ErrorCode): number {
  switch (code) {
    case 'INVALID_INPUT':
      return 400;

    default:
      return 500;
  }
}

export function archiveResponse(archive: Buffer, filename: string): HandlerResponse {
  return {
    statusCode: 200,
    headers: {
      'Content-Type': 'application/zip',
      'Content-Disposition': `attachment; filename=${filename}`,
    },
    body: archive.toString('base64'),
    isBase64Encoded: true,
  };
}

export function errorResponse(error: AppError, detailsHint: string): HandlerResponse {
  const body: ErrorBody = { error: error.message, details: detailsHint };
  return {
    statusCode: mapErrorCodeToStatus(error.code),
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    isBase64Encoded: false,
  };
}
