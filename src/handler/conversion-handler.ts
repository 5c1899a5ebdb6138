import { createAppError, describeCause, ErrorCode } from '../domain/errors.js';
import type { HandlerResponse, InvocationContext } from '../domain/types.js';
import type { AppConfig } from '../infrastructure/config.js';
import type { FetchFn } from '../infrastructure/pdf-fetcher.js';
import type { Rasterizer } from '../infrastructure/rasterizer/index.js';
import { createRequestLogger, logger, type Logger } from '../infrastructure/logger.js';
import { withScratchDir } from '../infrastructure/scratch.js';
import { classifyPayload, resolvePdf } from '../services/input/index.js';
import { convertPdfToArchive } from '../services/conversion/index.js';
import { archiveResponse, errorResponse } from './response.js';

export interface HandlerDependencies {
  rasterizer: Rasterizer;
  fetchFn?: FetchFn;
}

export type ConversionHandler = (event: unknown, context?: InvocationContext) => Promise<HandlerResponse>;

export type HandlerConfig = Pick<AppConfig, 'scratchRoot' | 'archiveFilename' | 'errorDetailsHint'>;

/**
 * Builds the request handler. `config` and `deps` are fixed for the life of the
 * process; nothing else is shared between invocations apart from the one-shot
 * engine probe.
 *
 * The returned function never rejects: every failure, including anything
 * thrown, comes back as a JSON error response.
 */
export function createConversionHandler(
  config: Readonly<HandlerConfig>,
  deps: HandlerDependencies,
): ConversionHandler {
  let probe: Promise<void> | null = null;

  const probeEngine = async (): Promise<void> => {
    try {
      const result = await deps.rasterizer.probe();
      if (result.ok) {
        logger.info({ engineVersion: result.value }, 'Rasterization engine found');
      } else {
        logger.warn({ details: result.error.details }, result.error.message);
      }
    } catch (cause) {
      // Diagnostics only: a probe that throws must not fail this or any later request.
      logger.warn({ details: describeCause(cause) }, 'Rasterization engine probe failed');
    }
  };

  const failed = (log: Logger, response: HandlerResponse, started: number): HandlerResponse => {
    log.warn({ statusCode: response.statusCode, durationMs: Date.now() - started }, 'Conversion request failed');
    return response;
  };

  return async (event, context) => {
    const started = Date.now();
    const requestLog = createRequestLogger(context?.awsRequestId);

    try {
      probe ??= probeEngine();
      await probe;

      const classified = classifyPayload(event);
      if (!classified.ok) {
        return failed(requestLog, errorResponse(classified.error, config.errorDetailsHint), started);
      }

      const input = classified.value;
      const log = requestLog.child({ source: input.kind });

      const converted = await withScratchDir(
        config.scratchRoot,
        async (scratchDir) => {
          const resolved = await resolvePdf(input, { scratchDir, fetchFn: deps.fetchFn }, log);
          if (!resolved.ok) return resolved;
          return convertPdfToArchive(resolved.value, { rasterizer: deps.rasterizer, scratchDir }, log);
        },
        log,
      );

      if (!converted.ok) {
        return failed(log, errorResponse(converted.error, config.errorDetailsHint), started);
      }

      log.info(
        { pageCount: converted.value.pageCount, sizeBytes: converted.value.archive.length, durationMs: Date.now() - started },
        'Conversion request completed',
      );
      return archiveResponse(converted.value.archive, config.archiveFilename);
    } catch (cause) {
      const details = describeCause(cause);
      requestLog.error({ errorCode: ErrorCode.INTERNAL_ERROR, retryable: false, details }, 'Unhandled error');
      const error = createAppError(ErrorCode.INTERNAL_ERROR, details, false, details);
      return failed(requestLog, errorResponse(error, config.errorDetailsHint), started);
    }
  };
}
