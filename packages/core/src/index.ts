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
} from './logging/index.js';

export {
  formatDurationMs,
  formatUnknownError,
  serialiseError,
  toLogValue,
  writeJson,
  writeLine,
  type SerialisedError,
  type WritableTarget,
} from './reporting/index.js';

export {
  JsonLineSpanExporter,
  TELEMETRY_MODES,
  createTelemetryRuntime,
  createTelemetryTracer,
  isTelemetryMode,
  isTelemetryTracer,
  noopTelemetryTracer,
  type TelemetryAttributeValue,
  type TelemetryAttributes,
  type TelemetryMode,
  type TelemetryRuntime,
  type TelemetryRuntimeOptions,
  type TelemetrySpan,
  type TelemetrySpanEndOptions,
  type TelemetrySpanOptions,
  type TelemetrySpanStatus,
  type TelemetryTracer,
  type TelemetryTracerOptions,
} from './telemetry/index.js';

export {
  ConfigFileNotFoundError,
  DEFAULT_CONFIG_FILES,
  loadConfigModule,
  resolveConfigPath,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
  type ResolveConfigPathOptions,
} from './config/index.js';
