export {
  JsonLineLogger,
  TextLineLogger,
  filterLogLevel,
  isLogLevel,
  noopLogger,
  type LineOutput,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
