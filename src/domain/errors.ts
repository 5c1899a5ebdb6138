export const ErrorCode = {
  // Input
  INVALID_INPUT: 'INVALID_INPUT',
  DECODE_FAILED: 'DECODE_FAILED',
  FETCH_FAILED: 'FETCH_FAILED',

  // Conversion
  RENDER_FAILED: 'RENDER_FAILED',
  ARCHIVE_FAILED: 'ARCHIVE_FAILED',

  // File Storage
  FILE_STORAGE_ERROR: 'FILE_STORAGE_ERROR',

  // Anything thrown past a Result boundary
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
