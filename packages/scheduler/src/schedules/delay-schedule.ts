import { addMilliseconds } from 'date-fns';

import type { Schedule } from '../domain/ports/schedule.js';
import { InvalidScheduleError } from '../errors.js';

/**
 * Fires at a fixed interval measured from the moment the previous activation was computed.
 */
export class DelaySchedule implements Schedule {
  constructor(readonly delayMs: number) {
    if (!Number.isInteger(delayMs) || delayMs < 1) {
      throw new InvalidScheduleError(
        `Delay must be a whole number of milliseconds of at least 1 (received ${String(delayMs)}).`,
      );
    }
  }

  next(now: Date): Date {
    return addMilliseconds(now, this.delayMs);
  }
}

export const every = (delayMs: number): DelaySchedule => new DelaySchedule(delayMs);
