import { loadConfigModule } from '@tickwork/core/config';
import type { StructuredLogger } from '@tickwork/core/logging';
import { isSchedule, type Schedule } from '@tickwork/scheduler';
import { z } from 'zod';

/**
 * Context handed to every configured job when it runs.
 */
export interface JobRunContext {
  readonly name: string;
  readonly logger: StructuredLogger;
}

export type ConfiguredJobRun = (context: JobRunContext) => unknown;

export interface ConfiguredJob {
  readonly name: string;
  readonly schedule: string | Schedule;
  readonly run: ConfiguredJobRun;
}

export interface SchedulerConfig {
  readonly timeZone?: string;
  readonly jobs: readonly ConfiguredJob[];
}

export interface LoadedSchedulerConfig {
  readonly path: string;
  readonly directory: string;
  readonly config: SchedulerConfig;
}

export class ConfigValidationError extends Error {
  constructor(
    readonly path: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid configuration in ${path}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}

const nonEmptyString = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'String must not be empty.' });

const scheduleSchema = z.custom<Schedule>(isSchedule, {
  message: 'Expected a schedule descriptor or an object with a next(now) method.',
});

const jobRunSchema = z.custom<ConfiguredJobRun>((value) => typeof value === 'function', {
  message: 'Expected a function.',
});

const jobSchema = z
  .object({
    name: nonEmptyString,
    schedule: z.union([nonEmptyString, scheduleSchema]),
    run: jobRunSchema,
  })
  .passthrough();

const schedulerConfigSchema = z
  .object({
    timeZone: nonEmptyString.optional(),
    jobs: z.array(jobSchema),
  })
  .passthrough()
  .superRefine((config, context) => {
    const seen = new Set<string>();
    for (const [index, job] of config.jobs.entries()) {
      if (seen.has(job.name)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['jobs', index, 'name'],
          message: `Duplicate job name "${job.name}".`,
        });
      }
      seen.add(job.name);
    }
  });

/**
 * Validates an already loaded configuration value.
 *
 * @throws {ConfigValidationError} When the value does not describe a scheduler configuration.
 */
export function parseSchedulerConfig(value: unknown, path: string): SchedulerConfig {
  const result = schedulerConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(
      path,
      result.error.issues.map(
        (issue) =>
          `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`,
      ),
    );
  }

  const { timeZone, jobs } = result.data;
  return {
    ...(timeZone === undefined ? {} : { timeZone }),
    jobs: jobs.map(({ name, schedule, run }) => ({ name, schedule, run })),
  } satisfies SchedulerConfig;
}

/**
 * Loads a tickwork configuration file, resolving function and promise exports before validating
 * the result.
 */
export async function loadSchedulerConfig(configPath: string): Promise<LoadedSchedulerConfig> {
  const loaded = await loadConfigModule<unknown>({ path: configPath });
  return {
    path: loaded.path,
    directory: loaded.directory,
    config: parseSchedulerConfig(loaded.config, loaded.path),
  };
}
