import process from 'node:process';

import { TZDate } from '@date-fns/tz';
import { formatUnknownError } from '@tickwork/core/reporting';

import {
  resolveSchedulerSettings,
  type SchedulerOption,
  type SchedulerSettings,
} from '../config/options.js';
import {
  createEntry,
  isDue,
  snapshotEntry,
  sortEntries,
  type Entry,
  type EntryId,
  type EntrySnapshot,
} from '../domain/entry.js';
import type { Job, JobFunction } from '../domain/ports/job.js';
import type { Schedule } from '../domain/ports/schedule.js';
import { InvalidScheduleError, SchedulerStateError } from '../errors.js';
import { FuncJob } from '../jobs/func-job.js';
import { ControlChannel } from './control-channel.js';
import { JobWaiter } from './job-waiter.js';

/**
 * Largest delay accepted by Node.js timers. Longer waits are clamped and simply re-armed.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const JOB_SPAN_NAME = 'tickwork.scheduler.job';

type ControlMessage =
  | { readonly type: 'add'; readonly entry: Entry }
  | { readonly type: 'remove'; readonly id: EntryId }
  | { readonly type: 'snapshot'; readonly reply: (entries: readonly EntrySnapshot[]) => void }
  | { readonly type: 'wake'; readonly generation: number }
  | { readonly type: 'stop' };

type SchedulerState = 'idle' | 'running' | 'stopped';

/**
 * In-process scheduler that runs jobs on their schedules.
 *
 * Once started, the entry collection is owned by a single control loop. Registration, removal,
 * snapshots and shutdown reach it as messages, so callers never block and never race the loop.
 */
export class Scheduler {
  private readonly settings: SchedulerSettings;
  private readonly collection: Entry[] = [];
  private readonly control = new ControlChannel<ControlMessage>();
  private readonly waiter = new JobWaiter();
  private state: SchedulerState = 'idle';
  private lastId: EntryId = 0;

  constructor(options: readonly SchedulerOption[] = []) {
    this.settings = resolveSchedulerSettings(options);
  }

  get running(): boolean {
    return this.state === 'running';
  }

  get timeZone(): string {
    return this.settings.timeZone;
  }

  addFunc(schedule: Schedule | string, fn: JobFunction): EntryId {
    return this.addJob(schedule, new FuncJob(fn));
  }

  /**
   * Registers a job and returns its id. String schedules go through the configured parser.
   *
   * @throws {InvalidScheduleError} When a string schedule cannot be parsed.
   */
  addJob(schedule: Schedule | string, job: Job): EntryId {
    const resolved = typeof schedule === 'string' ? this.parse(schedule) : schedule;
    this.lastId += 1;
    const entry = createEntry(this.lastId, resolved, job);

    if (this.state === 'running') {
      this.control.send({ type: 'add', entry });
    } else {
      this.collection.push(entry);
    }
    return entry.id;
  }

  /**
   * Removes an entry. Unknown ids are ignored.
   */
  remove(id: EntryId): void {
    if (this.state === 'running') {
      this.control.send({ type: 'remove', id });
      return;
    }
    this.removeEntry(id);
  }

  /**
   * Returns the entries ordered as the loop last saw them.
   */
  async entries(): Promise<readonly EntrySnapshot[]> {
    if (this.state !== 'running') {
      return this.collection.map((entry) => snapshotEntry(entry));
    }
    return await new Promise<readonly EntrySnapshot[]>((resolve) => {
      this.control.send({ type: 'snapshot', reply: resolve });
    });
  }

  start(): void {
    if (!this.claim('start')) {
      return;
    }
    this.loop().catch((error: unknown) => {
      this.settings.logger.error('control loop failed', 'error', error);
    });
  }

  /**
   * Runs the control loop and resolves when it exits after {@link stop}.
   */
  async run(): Promise<void> {
    if (!this.claim('run')) {
      return;
    }
    await this.loop();
  }

  /**
   * Stops the loop if it is running. The returned promise resolves once every job already
   * launched has settled; no job is launched after the stop request is processed.
   */
  stop(): Promise<void> {
    if (this.state === 'running') {
      this.control.send({ type: 'stop' });
      this.state = 'stopped';
    }
    return this.waiter.wait();
  }

  private claim(operation: 'start' | 'run'): boolean {
    if (this.state === 'stopped') {
      throw new SchedulerStateError(operation, 'the scheduler has been stopped.');
    }
    if (this.state === 'running') {
      return false;
    }
    this.state = 'running';
    return true;
  }

  private parse(descriptor: string): Schedule {
    try {
      return this.settings.parser.parse(descriptor);
    } catch (error) {
      if (error instanceof InvalidScheduleError) {
        throw error;
      }
      throw new InvalidScheduleError(
        `Unable to parse schedule "${descriptor}": ${formatUnknownError(error)}`,
        descriptor,
      );
    }
  }

  private now(): TZDate {
    return new TZDate(Date.now(), this.settings.timeZone);
  }

  private async loop(): Promise<void> {
    const { logger } = this.settings;
    const startedAt = this.now();
    for (const entry of this.collection) {
      this.scheduleNext(entry, startedAt);
      logger.info('schedule', 'now', startedAt, 'entry', entry.id, 'next', entry.next);
    }

    // Wakeups are posted into the same mailbox as control messages, so the loop waits on a
    // single receive per cycle and anything sent before a wakeup is handled first.
    let generation = 0;
    for (;;) {
      sortEntries(this.collection);
      generation += 1;
      const cancelWake = this.armWake(generation);
      const message = await this.control.receive();
      cancelWake();

      switch (message.type) {
        case 'wake': {
          // A wakeup posted just before its timer was cancelled is stale.
          if (message.generation === generation) {
            const now = this.now();
            logger.info('wake', 'now', now);
            this.fireDue(now);
          }
          break;
        }
        case 'stop': {
          logger.info('stop');
          return;
        }
        case 'add': {
          const now = this.now();
          this.scheduleNext(message.entry, now);
          this.collection.push(message.entry);
          logger.info('added', 'now', now, 'entry', message.entry.id, 'next', message.entry.next);
          break;
        }
        case 'remove': {
          this.removeEntry(message.id);
          logger.info('removed', 'entry', message.id);
          break;
        }
        case 'snapshot': {
          message.reply(this.collection.map((entry) => snapshotEntry(entry)));
          break;
        }
      }
    }
  }

  private armWake(generation: number): () => void {
    const handle = setTimeout(() => {
      this.control.send({ type: 'wake', generation });
    }, this.wakeDelay());
    return () => {
      clearTimeout(handle);
    };
  }

  private wakeDelay(): number {
    const next = this.collection[0]?.next;
    if (next === undefined) {
      return MAX_TIMER_DELAY_MS;
    }
    return Math.min(Math.max(0, next.getTime() - Date.now()), MAX_TIMER_DELAY_MS);
  }

  private fireDue(now: TZDate): void {
    for (const entry of this.collection) {
      if (!isDue(entry, now)) {
        break;
      }
      this.launch(entry);
      entry.prev = entry.next;
      this.scheduleNext(entry, now);
      this.settings.logger.info('run', 'now', now, 'entry', entry.id, 'next', entry.next);
    }
  }

  private scheduleNext(entry: Entry, now: TZDate): void {
    try {
      const next = entry.schedule.next(now);
      if (!(next instanceof Date) || Number.isNaN(next.getTime())) {
        throw new InvalidScheduleError(`Schedule returned an invalid date: ${String(next)}`);
      }
      entry.next = next;
    } catch (error) {
      entry.next = undefined;
      this.settings.logger.error('schedule failed', 'entry', entry.id, 'error', error);
    }
  }

  private removeEntry(id: EntryId): void {
    const index = this.collection.findIndex((entry) => entry.id === id);
    if (index !== -1) {
      this.collection.splice(index, 1);
    }
  }

  private launch(entry: Entry): void {
    this.waiter.add();
    this.execute(entry).catch((error: unknown) => {
      // Reached only when the logger or tracer throws while reporting a job fault.
      process.emitWarning(
        `Failed to report the outcome of entry ${String(entry.id)}: ${formatUnknownError(error)}`,
        'SchedulerWarning',
      );
    });
  }

  private async execute(entry: Entry): Promise<void> {
    try {
      const span = this.settings.tracer.startSpan(JOB_SPAN_NAME, {
        attributes: { 'tickwork.entry.id': entry.id },
      });
      try {
        // Yield first so the job never runs on the control loop's stack.
        await Promise.resolve();
        await entry.job.run();
        span.end({ status: 'ok' });
      } catch (fault) {
        span.setAttribute('tickwork.job.error', formatUnknownError(fault));
        span.end({ status: 'error' });
        this.settings.logger.error('job failed', 'entry', entry.id, 'error', fault);
      }
    } finally {
      this.waiter.done();
    }
  }
}

export const createScheduler = (...options: SchedulerOption[]): Scheduler => new Scheduler(options);
