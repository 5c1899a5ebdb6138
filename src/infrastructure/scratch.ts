import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { logger, type Logger } from './logger.js';

const SCRATCH_PREFIX = 'pdf2jpg-';

/**
 * Runs `work` inside a fresh, uniquely named directory under `root`. The
 * directory is removed once `work` settles, even if it throws.
 */
export async function withScratchDir<T>(
  root: string,
  work: (dir: string) => Promise<Result<T, AppError>>,
  log: Logger = logger,
): Promise<Result<T, AppError>> {
  let dir: string;
  try {
    dir = await mkdtemp(join(root, SCRATCH_PREFIX));
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: true, root, details }, 'Failed to create scratch directory');
    return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to create scratch directory', true, details));
  }

  log.debug({ dir }, 'Scratch directory created');
  try {
    return await work(dir);
  } finally {
    await removeScratchDir(dir, log);
  }
}

async function removeScratchDir(dir: string, log: Logger): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
    log.debug({ dir }, 'Scratch directory removed');
  } catch (cause) {
    // A leftover directory must not replace the request's own outcome.
    log.warn({ dir, details: describeCause(cause) }, 'Failed to remove scratch directory');
  }
}
