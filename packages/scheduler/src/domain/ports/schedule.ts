/**
 * Policy computing when an entry fires next.
 *
 * Implementations must be deterministic functions of `now` and their own fixed parameters;
 * the control loop relies on that when it re-sorts entries between wakeups.
 */
export interface Schedule {
  next(now: Date): Date;
}

export interface ScheduleParser {
  parse(descriptor: string): Schedule;
}

export const isSchedule = (value: unknown): value is Schedule =>
  typeof value === 'object' &&
  value !== null &&
  'next' in value &&
  typeof value.next === 'function';

export const isScheduleParser = (value: unknown): value is ScheduleParser =>
  typeof value === 'object' &&
  value !== null &&
  'parse' in value &&
  typeof value.parse === 'function';
