import { addDays, addHours, getDay, isAfter, set } from 'date-fns';

import type { Schedule } from '../domain/ports/schedule.js';
import { InvalidScheduleError } from '../errors.js';

export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

const assertInRange = (label: string, value: number, max: number): void => {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidScheduleError(
      `${label} must be an integer between 0 and ${String(max)} (received ${String(value)}).`,
    );
  }
};

// Calendar schedules read and write wall-clock fields, so they follow the zone of the Date
// they are handed (TZDate instances keep their zone through every date-fns call).

export class HourlySchedule implements Schedule {
  constructor(readonly minute: number = 0) {
    assertInRange('Minute', minute, 59);
  }

  next(now: Date): Date {
    const candidate = set(now, { minutes: this.minute, seconds: 0, milliseconds: 0 });
    return isAfter(candidate, now) ? candidate : addHours(candidate, 1);
  }
}

export class DailySchedule implements Schedule {
  constructor(
    readonly hour: number,
    readonly minute: number = 0,
  ) {
    assertInRange('Hour', hour, 23);
    assertInRange('Minute', minute, 59);
  }

  next(now: Date): Date {
    const candidate = set(now, {
      hours: this.hour,
      minutes: this.minute,
      seconds: 0,
      milliseconds: 0,
    });
    return isAfter(candidate, now) ? candidate : addDays(candidate, 1);
  }
}

export class WeeklySchedule implements Schedule {
  constructor(
    readonly weekday: number,
    readonly hour: number = 0,
    readonly minute: number = 0,
  ) {
    assertInRange('Weekday', weekday, 6);
    assertInRange('Hour', hour, 23);
    assertInRange('Minute', minute, 59);
  }

  next(now: Date): Date {
    const sameDay = set(now, {
      hours: this.hour,
      minutes: this.minute,
      seconds: 0,
      milliseconds: 0,
    });
    const candidate = addDays(sameDay, (this.weekday - getDay(sameDay) + 7) % 7);
    return isAfter(candidate, now) ? candidate : addDays(candidate, 7);
  }
}

export const hourly = (minute = 0): HourlySchedule => new HourlySchedule(minute);

export const daily = (hour: number, minute = 0): DailySchedule => new DailySchedule(hour, minute);

export const weekly = (weekday: number, hour = 0, minute = 0): WeeklySchedule =>
  new WeeklySchedule(weekday, hour, minute);
