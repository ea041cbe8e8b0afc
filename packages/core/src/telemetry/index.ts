export { createTelemetryTracer, isTelemetryTracer, noopTelemetryTracer } from './tracer.js';
export type {
  TelemetryAttributeValue,
  TelemetryAttributes,
  TelemetrySpan,
  TelemetrySpanEndOptions,
  TelemetrySpanOptions,
  TelemetrySpanStatus,
  TelemetryTracer,
  TelemetryTracerOptions,
} from './tracer.js';
export {
  JsonLineSpanExporter,
  TELEMETRY_MODES,
  createTelemetryRuntime,
  isTelemetryMode,
} from './runtime.js';
export type { TelemetryMode, TelemetryRuntime, TelemetryRuntimeOptions } from './runtime.js';
