import { constructFrom } from 'date-fns';

import type { Job } from './ports/job.js';
import type { Schedule } from './ports/schedule.js';

export type EntryId = number;

/**
 * Scheduler bookkeeping binding one job to one schedule.
 *
 * `next` and `prev` are only written by the control loop once it runs.
 */
export interface Entry {
  readonly id: EntryId;
  readonly schedule: Schedule;
  readonly job: Job;
  next: Date | undefined;
  prev: Date | undefined;
}

export type EntrySnapshot = Readonly<Entry>;

export const createEntry = (id: EntryId, schedule: Schedule, job: Job): Entry => ({
  id,
  schedule,
  job,
  next: undefined,
  prev: undefined,
});

/**
 * Orders entries by ascending `next`. Entries that were never scheduled sort last.
 */
export const compareEntries = (left: Entry, right: Entry): number => {
  if (left.next === undefined) {
    return right.next === undefined ? 0 : 1;
  }
  if (right.next === undefined) {
    return -1;
  }
  return left.next.getTime() - right.next.getTime();
};

export const sortEntries = (entries: Entry[]): void => {
  entries.sort(compareEntries);
};

/**
 * Whether the entry is due at `now`, i.e. it has a fire time that is not after `now`.
 */
export const isDue = (entry: Entry, now: Date): boolean =>
  entry.next !== undefined && entry.next.getTime() <= now.getTime();

// Copies keep the zone of TZDate values and stop callers from mutating the live entry's dates.
const copyDate = (date: Date | undefined): Date | undefined =>
  date === undefined ? undefined : constructFrom(date, date);

export const snapshotEntry = (entry: Entry): EntrySnapshot =>
  Object.freeze({
    id: entry.id,
    schedule: entry.schedule,
    job: entry.job,
    next: copyDate(entry.next),
    prev: copyDate(entry.prev),
  });
