export {
  createStructuredSchedulerLogger,
  discardLogger,
  MISSING_LOG_VALUE,
  toLogData,
  type StructuredSchedulerLoggerOptions,
} from './scheduler-logger.js';
