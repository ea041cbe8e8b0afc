import { TZDate } from '@date-fns/tz';
import { describe, expect, it } from 'vitest';

import { InvalidScheduleError } from '../errors.js';
import { DelaySchedule, every } from './delay-schedule.js';

describe('every', () => {
  it('adds the delay to the supplied time', () => {
    const schedule = every(250);

    expect(schedule).toBeInstanceOf(DelaySchedule);
    expect(schedule.next(new Date(1000)).getTime()).toBe(1250);
  });

  it('keeps the zone of the supplied time', () => {
    const now = new TZDate(Date.parse('2024-06-01T12:00:00.000Z'), 'Asia/Tokyo');

    const next = every(60_000).next(now);

    expect(next).toBeInstanceOf(TZDate);
    expect(next.getTime()).toBe(Date.parse('2024-06-01T12:01:00.000Z'));
  });

  it.each([0, -5, 0.5, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects a delay of %s',
    (delay) => {
      expect(() => every(delay)).toThrow(InvalidScheduleError);
    },
  );
});
