export {
  createScheduler,
  JOB_SPAN_NAME,
  MAX_TIMER_DELAY_MS,
  Scheduler,
} from './application/scheduler.js';

export {
  isValidTimeZone,
  resolveLocalTimeZone,
  resolveSchedulerSettings,
  withLogger,
  withParser,
  withTimeZone,
  withTracer,
  type SchedulerOption,
  type SchedulerSettings,
} from './config/options.js';

export {
  compareEntries,
  sortEntries,
  type Entry,
  type EntryId,
  type EntrySnapshot,
} from './domain/entry.js';

export {
  isSchedule,
  isScheduleParser,
  isSchedulerLogger,
  type Job,
  type JobFunction,
  type Schedule,
  type ScheduleParser,
  type SchedulerLogger,
} from './domain/ports/index.js';

export {
  InvalidScheduleError,
  SchedulerConfigurationError,
  SchedulerError,
  SchedulerStateError,
} from './errors.js';

export { FuncJob } from './jobs/func-job.js';

export {
  createStructuredSchedulerLogger,
  discardLogger,
  type StructuredSchedulerLoggerOptions,
} from './logging/index.js';

export {
  daily,
  DailySchedule,
  DelaySchedule,
  descriptorParser,
  every,
  hourly,
  HourlySchedule,
  parseDuration,
  weekly,
  WeeklySchedule,
  type Weekday,
} from './schedules/index.js';
