import type { Schedule, ScheduleParser } from '../domain/ports/schedule.js';
import { InvalidScheduleError } from '../errors.js';
import { daily, hourly, weekly, type Weekday } from './calendar-schedules.js';
import { every } from './delay-schedule.js';

const DURATION_UNITS_MS: Readonly<Record<string, number>> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h|d))+$/;
const DURATION_SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h|d)/g;
const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

const WEEKDAYS: Readonly<Record<string, Weekday>> = {
  sun: 0,
  sunday: 0,
  mon: 1,
  monday: 1,
  tue: 2,
  tuesday: 2,
  wed: 3,
  wednesday: 3,
  thu: 4,
  thursday: 4,
  fri: 5,
  friday: 5,
  sat: 6,
  saturday: 6,
};

/**
 * Parses a compound duration such as `1h30m` or `500ms` into whole milliseconds.
 */
export function parseDuration(text: string): number {
  if (!DURATION_PATTERN.test(text)) {
    throw new InvalidScheduleError(`Invalid duration "${text}".`, text);
  }

  let total = 0;
  for (const [, amount, unit] of text.matchAll(DURATION_SEGMENT)) {
    const factor = unit === undefined ? undefined : DURATION_UNITS_MS[unit];
    if (amount === undefined || factor === undefined) {
      throw new InvalidScheduleError(`Invalid duration "${text}".`, text);
    }
    total += Number(amount) * factor;
  }
  return Math.round(total);
}

interface ClockTime {
  readonly hour: number;
  readonly minute: number;
}

const parseClock = (text: string, descriptor: string): ClockTime => {
  const match = CLOCK_PATTERN.exec(text);
  if (!match) {
    throw new InvalidScheduleError(
      `Invalid time of day "${text}" in "${descriptor}"; expected HH:MM.`,
      descriptor,
    );
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
};

const parseWeekday = (text: string, descriptor: string): Weekday => {
  const weekday = WEEKDAYS[text.toLowerCase()];
  if (weekday === undefined) {
    throw new InvalidScheduleError(`Unknown weekday "${text}" in "${descriptor}".`, descriptor);
  }
  return weekday;
};

const withDescriptor = (descriptor: string, build: () => Schedule): Schedule => {
  try {
    return build();
  } catch (error) {
    if (error instanceof InvalidScheduleError && error.descriptor === undefined) {
      throw new InvalidScheduleError(`${error.message} (in "${descriptor}")`, descriptor);
    }
    throw error;
  }
};

/**
 * Default parser understanding the `@every`, `@hourly`, `@daily`, `@midnight` and `@weekly`
 * descriptors.
 */
export const descriptorParser: ScheduleParser = {
  parse(descriptor: string): Schedule {
    const [keyword, ...args] = descriptor.trim().split(/\s+/);
    const unexpected = () =>
      new InvalidScheduleError(`Unrecognised schedule descriptor "${descriptor}".`, descriptor);

    return withDescriptor(descriptor, () => {
      switch (keyword?.toLowerCase()) {
        case '@every': {
          const [duration] = args;
          if (duration === undefined || args.length !== 1) {
            throw unexpected();
          }
          return every(parseDuration(duration));
        }
        case '@hourly': {
          if (args.length > 0) {
            throw unexpected();
          }
          return hourly(0);
        }
        case '@midnight': {
          if (args.length > 0) {
            throw unexpected();
          }
          return daily(0, 0);
        }
        case '@daily': {
          const [clock] = args;
          if (clock === undefined) {
            return daily(0, 0);
          }
          if (args.length > 1) {
            throw unexpected();
          }
          const { hour, minute } = parseClock(clock, descriptor);
          return daily(hour, minute);
        }
        case '@weekly': {
          const [day, clock] = args;
          if (day === undefined) {
            return weekly(0, 0, 0);
          }
          if (args.length > 2) {
            throw unexpected();
          }
          const weekday = parseWeekday(day, descriptor);
          const { hour, minute } =
            clock === undefined ? { hour: 0, minute: 0 } : parseClock(clock, descriptor);
          return weekly(weekday, hour, minute);
        }
        default: {
          throw unexpected();
        }
      }
    });
  },
};
