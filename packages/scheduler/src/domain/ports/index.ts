export type { Job, JobFunction } from './job.js';
export { isSchedulerLogger, type SchedulerLogger } from './logger.js';
export { isSchedule, isScheduleParser, type Schedule, type ScheduleParser } from './schedule.js';
