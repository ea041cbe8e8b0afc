import {
  filterLogLevel,
  JsonLineLogger,
  TextLineLogger,
  type StructuredLogger,
} from '@tickwork/core/logging';

import { toWritableTarget, type CliIo } from '../io/cli-io.js';
import type { CliGlobalOptions } from '../kernel/types.js';

/**
 * JSON logs go to stdout as NDJSON; human readable logs go to stderr so that command output
 * stays clean.
 */
export const createCliLogger = (options: CliGlobalOptions, io: CliIo): StructuredLogger => {
  const logger =
    options.logFormat === 'json'
      ? new JsonLineLogger(toWritableTarget(io, 'stdout'))
      : new TextLineLogger(toWritableTarget(io, 'stderr'));
  return filterLogLevel(logger, options.logLevel);
};

/**
 * Attaches fixed context fields to every entry written through the returned logger.
 */
export const withLogContext = (
  logger: StructuredLogger,
  context: Readonly<Record<string, unknown>>,
): StructuredLogger => ({
  log(entry) {
    logger.log({ ...entry, context: { ...entry.context, ...context } });
  },
});
