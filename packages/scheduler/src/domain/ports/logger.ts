/**
 * Sink for scheduler events. Context is passed as alternating key/value arguments.
 *
 * Implementations are best effort: they must not throw or block.
 */
export interface SchedulerLogger {
  info(message: string, ...keysAndValues: unknown[]): void;
  error(message: string, ...keysAndValues: unknown[]): void;
}

export const isSchedulerLogger = (value: unknown): value is SchedulerLogger =>
  typeof value === 'object' &&
  value !== null &&
  'info' in value &&
  typeof value.info === 'function' &&
  'error' in value &&
  typeof value.error === 'function';
