import type { StructuredLogger } from '@tickwork/core/logging';
import { toLogValue } from '@tickwork/core/reporting';

import type { SchedulerLogger } from '../domain/ports/logger.js';

export const MISSING_LOG_VALUE = '(missing)';

const DEFAULT_LOGGER_NAME = 'tickwork.scheduler';

/**
 * Logger that drops every event. Used when no logger option is supplied.
 */
export const discardLogger: SchedulerLogger = {
  info(): void {
    // noop
  },
  error(): void {
    // noop
  },
};

export interface StructuredSchedulerLoggerOptions {
  readonly name?: string;
  readonly context?: Readonly<Record<string, unknown>>;
}

/**
 * Bridges the scheduler's key/value logger onto a {@link StructuredLogger}.
 *
 * The message becomes the structured `event`, and key/value pairs are folded into `data`.
 */
export function createStructuredSchedulerLogger(
  logger: StructuredLogger,
  options: StructuredSchedulerLoggerOptions = {},
): SchedulerLogger {
  const name = options.name ?? DEFAULT_LOGGER_NAME;

  const emit = (level: 'info' | 'error', message: string, keysAndValues: readonly unknown[]) => {
    const data = toLogData(keysAndValues);
    logger.log({
      level,
      name,
      event: message,
      ...(options.context === undefined ? {} : { context: options.context }),
      ...(Object.keys(data).length === 0 ? {} : { data }),
    });
  };

  return {
    info(message: string, ...keysAndValues: unknown[]): void {
      emit('info', message, keysAndValues);
    },
    error(message: string, ...keysAndValues: unknown[]): void {
      emit('error', message, keysAndValues);
    },
  };
}

/**
 * Folds alternating key/value arguments into a record. A trailing key without a value is
 * recorded as {@link MISSING_LOG_VALUE}.
 */
export function toLogData(keysAndValues: readonly unknown[]): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  for (let index = 0; index < keysAndValues.length; index += 2) {
    const key = formatKey(keysAndValues[index]);
    data[key] =
      index + 1 < keysAndValues.length ? toLogValue(keysAndValues[index + 1]) : MISSING_LOG_VALUE;
  }
  return data;
}

const formatKey = (key: unknown): string => {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'symbol') {
    return key.description ?? 'Symbol()';
  }
  return String(key);
};
