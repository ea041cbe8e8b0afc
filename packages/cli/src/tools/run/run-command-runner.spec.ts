import { describe, expect, it } from 'vitest';

import type { StructuredLogEvent, StructuredLogger } from '@tickwork/core/logging';
import { createScheduler, every } from '@tickwork/scheduler';

import type { JobRunContext } from '../../config/scheduler-config.js';
import { registerConfiguredJobs } from './run-command-runner.js';

const createRecordingLogger = () => {
  const events: StructuredLogEvent[] = [];
  const logger: StructuredLogger = {
    log(entry) {
      events.push(entry);
    },
  };
  return { events, logger };
};

describe('registerConfiguredJobs', () => {
  it('registers each job in declaration order', async () => {
    const scheduler = createScheduler();
    const { logger } = createRecordingLogger();

    const registered = registerConfiguredJobs(
      scheduler,
      {
        jobs: [
          { name: 'report', schedule: '@daily 06:00', run: () => undefined },
          { name: 'poll', schedule: every(5000), run: () => undefined },
        ],
      },
      logger,
    );

    expect([...registered]).toEqual([
      ['report', 1],
      ['poll', 2],
    ]);
    const entries = await scheduler.entries();
    expect(entries.map((entry) => entry.id)).toEqual([1, 2]);
  });

  it('hands jobs their name and a logger scoped to the job', async () => {
    const scheduler = createScheduler();
    const { events, logger } = createRecordingLogger();
    const contexts: JobRunContext[] = [];

    registerConfiguredJobs(
      scheduler,
      {
        jobs: [
          {
            name: 'cleanup',
            schedule: '@hourly',
            run: (context) => {
              contexts.push(context);
              context.logger.log({ level: 'info', name: 'cleanup', event: 'swept' });
            },
          },
        ],
      },
      logger,
    );

    const [entry] = await scheduler.entries();
    await entry?.job.run();

    expect(contexts.map((context) => context.name)).toEqual(['cleanup']);
    expect(events).toEqual([
      { level: 'info', name: 'cleanup', event: 'swept', context: { job: 'cleanup' } },
    ]);
  });

  it('propagates failures from asynchronous jobs', async () => {
    const scheduler = createScheduler();
    const { logger } = createRecordingLogger();

    registerConfiguredJobs(
      scheduler,
      {
        jobs: [
          {
            name: 'flaky',
            schedule: '@every 1s',
            run: async () => {
              await Promise.resolve();
              throw new Error('upstream unavailable');
            },
          },
        ],
      },
      logger,
    );

    const [entry] = await scheduler.entries();
    await expect(entry?.job.run()).rejects.toThrow('upstream unavailable');
  });
});
