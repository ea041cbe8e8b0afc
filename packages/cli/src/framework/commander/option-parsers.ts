import { InvalidOptionArgumentError } from 'commander';

import { isValidTimeZone } from '@tickwork/scheduler';

export const parsePositiveInteger =
  (max: number) =>
  (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
      throw new InvalidOptionArgumentError(
        `Expected a whole number between 1 and ${String(max)}.`,
      );
    }
    return parsed;
  };

export const parseDurationMs = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidOptionArgumentError('Expected a positive number of milliseconds.');
  }
  return parsed;
};

export const parseInstant = (value: string): Date => {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new InvalidOptionArgumentError(`Expected an ISO-8601 date-time, received "${value}".`);
  }
  return new Date(time);
};

export const parseTimeZone = (value: string): string => {
  if (!isValidTimeZone(value)) {
    throw new InvalidOptionArgumentError(`Unknown time zone "${value}".`);
  }
  return value;
};
