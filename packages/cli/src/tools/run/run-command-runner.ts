import process from 'node:process';

import type { Command } from 'commander';

import { resolveConfigPath } from '@tickwork/core/config';
import type { StructuredLogger } from '@tickwork/core/logging';
import { createTelemetryRuntime } from '@tickwork/core/telemetry';
import {
  createScheduler,
  createStructuredSchedulerLogger,
  withLogger,
  withTimeZone,
  withTracer,
  type EntryId,
  type Scheduler,
  type SchedulerOption,
} from '@tickwork/scheduler';

import type { SchedulerConfig } from '../../config/scheduler-config.js';
import { loadSchedulerConfig } from '../../config/scheduler-config.js';
import { toWritableTarget, type CliIo } from '../../io/cli-io.js';
import type { CliGlobalOptions } from '../../kernel/types.js';
import { createCliLogger, withLogContext } from '../../logging/create-cli-logger.js';
import { resolveRunCommandOptions } from './options.js';
import { waitForShutdown, type SignalSource } from './shutdown.js';

const LOGGER_NAME = 'tickwork.cli';

export interface ExecuteRunCommandOptions {
  readonly command: Command;
  readonly io: CliIo;
  readonly globalOptions: CliGlobalOptions;
  readonly signals?: SignalSource;
  readonly cwd?: string;
}

/**
 * Registers every configured job on the scheduler. Each job receives a logger whose context
 * carries the job name.
 */
export const registerConfiguredJobs = (
  scheduler: Scheduler,
  config: SchedulerConfig,
  logger: StructuredLogger,
): Map<string, EntryId> => {
  const registered = new Map<string, EntryId>();
  for (const job of config.jobs) {
    const jobLogger = withLogContext(logger, { job: job.name });
    const id = scheduler.addFunc(job.schedule, async () => {
      await job.run({ name: job.name, logger: jobLogger });
    });
    registered.set(job.name, id);
  }
  return registered;
};

export const executeRunCommand = async ({
  command,
  io,
  globalOptions,
  signals = process,
  cwd,
}: ExecuteRunCommandOptions): Promise<void> => {
  const options = resolveRunCommandOptions(command);
  const logger = createCliLogger(globalOptions, io);
  const configPath = await resolveConfigPath({
    ...(cwd === undefined ? {} : { cwd }),
    ...(options.config === undefined ? {} : { configPath: options.config }),
  });
  const loaded = await loadSchedulerConfig(configPath);
  const telemetry = createTelemetryRuntime(options.telemetry, {
    logger,
    output: toWritableTarget(io, 'stdout'),
  });

  const timeZone = options.timeZone ?? loaded.config.timeZone;
  const schedulerOptions: SchedulerOption[] = [
    withLogger(createStructuredSchedulerLogger(logger, { name: 'tickwork.scheduler' })),
    withTracer(telemetry.tracer),
    ...(timeZone === undefined ? [] : [withTimeZone(timeZone)]),
  ];
  const scheduler = createScheduler(...schedulerOptions);
  const registered = registerConfiguredJobs(scheduler, loaded.config, logger);

  logger.log({
    level: 'info',
    name: LOGGER_NAME,
    event: 'started',
    data: {
      config: loaded.path,
      timeZone: scheduler.timeZone,
      jobs: Object.fromEntries(registered),
    },
  });

  const running = scheduler.run();
  const reason = await waitForShutdown({
    signals,
    ...(options.forMs === undefined ? {} : { durationMs: options.forMs }),
  });

  const startedAt = performance.now();
  logger.log({ level: 'info', name: LOGGER_NAME, event: 'stopping', data: { reason } });
  await scheduler.stop();
  await running;
  await telemetry.exportSpans();
  logger.log({
    level: 'info',
    name: LOGGER_NAME,
    event: 'stopped',
    elapsedMs: performance.now() - startedAt,
  });
};
