import { trace, type HrTime } from '@opentelemetry/api';
import { ExportResultCode, type ExportResult } from '@opentelemetry/core';
import {
  BasicTracerProvider,
  SimpleSpanProcessor,
  type ReadableSpan,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';

import { noopLogger, type StructuredLogger } from '../logging/structured-logger.js';
import { formatUnknownError, type WritableTarget } from '../reporting/formatting.js';
import { createTelemetryTracer, noopTelemetryTracer, type TelemetryTracer } from './tracer.js';

/**
 * Modes supported by the telemetry runtime, describing how collected spans are exported.
 */
export type TelemetryMode = 'none' | 'stdout';

export const TELEMETRY_MODES: readonly TelemetryMode[] = Object.freeze(['none', 'stdout']);

export const isTelemetryMode = (value: unknown): value is TelemetryMode =>
  value === 'none' || value === 'stdout';

/**
 * Runtime surface for telemetry operations, exposing a tracer and an export hook.
 */
export interface TelemetryRuntime {
  readonly tracer: TelemetryTracer;
  exportSpans(): Promise<void>;
}

export interface TelemetryRuntimeOptions {
  readonly logger?: StructuredLogger;
  readonly traceExporter?: SpanExporter;
  readonly output?: WritableTarget;
}

const RUNTIME_INSTRUMENTATION = { name: 'tickwork.core.runtime' } as const;

/**
 * Creates a telemetry runtime that captures spans and exports them according to the provided mode.
 * @param {TelemetryMode} mode - Determines the exporter implementation to instantiate.
 * @param {TelemetryRuntimeOptions} options - Optional hooks for logging, exporting and output.
 * @returns {TelemetryRuntime} A runtime exposing a tracer and flush control.
 */
export function createTelemetryRuntime(
  mode: TelemetryMode,
  options: TelemetryRuntimeOptions = {},
): TelemetryRuntime {
  if (mode === 'none') {
    return {
      tracer: noopTelemetryTracer,
      async exportSpans() {
        // noop
      },
    } satisfies TelemetryRuntime;
  }

  if (mode !== 'stdout') {
    throw new Error(`Unsupported telemetry mode "${String(mode)}".`);
  }

  const logger = options.logger ?? noopLogger;
  const traceExporter =
    options.traceExporter ?? new JsonLineSpanExporter(options.output ?? process.stdout);
  const provider = new BasicTracerProvider({
    spanProcessors: [new SimpleSpanProcessor(traceExporter)],
  });

  try {
    trace.setGlobalTracerProvider(provider);
  } catch (error) {
    logger.log({
      level: 'error',
      name: 'telemetry',
      event: 'runtime_start_failed',
      data: { message: formatUnknownError(error) },
    });
  }

  const tracer = createTelemetryTracer({
    instrumentation: RUNTIME_INSTRUMENTATION,
    tracer: provider.getTracer(RUNTIME_INSTRUMENTATION.name),
  });

  return {
    tracer,
    async exportSpans() {
      try {
        await provider.forceFlush();
      } catch (error) {
        logger.log({
          level: 'error',
          name: 'telemetry',
          event: 'export_failed',
          data: { message: formatUnknownError(error) },
        });
      }
    },
  } satisfies TelemetryRuntime;
}

/**
 * Span exporter writing one JSON document per finished span.
 */
export class JsonLineSpanExporter implements SpanExporter {
  constructor(private readonly output: WritableTarget) {}

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    try {
      for (const span of spans) {
        this.output.write(`${JSON.stringify(serialiseSpan(span))}\n`);
      }
      resultCallback({ code: ExportResultCode.SUCCESS });
    } catch (error) {
      const exportError = error instanceof Error ? error : new Error(formatUnknownError(error));
      resultCallback({ code: ExportResultCode.FAILED, error: exportError });
    }
  }

  async shutdown(): Promise<void> {
    // noop
  }

  async forceFlush(): Promise<void> {
    // noop
  }
}

function serialiseSpan(span: ReadableSpan): Record<string, unknown> {
  const context = span.spanContext();
  const payload: Record<string, unknown> = {
    traceId: context.traceId,
    spanId: context.spanId,
    name: span.name,
    startTimeUnixNano: toUnixNanoString(span.startTime),
    endTimeUnixNano: toUnixNanoString(span.endTime),
    durationMs: span.duration[0] * 1000 + span.duration[1] / 1_000_000,
    attributes: span.attributes,
    status: span.status,
    instrumentationScope: span.instrumentationScope.name,
  };

  const parentSpanId = span.parentSpanContext?.spanId;
  if (parentSpanId) {
    payload['parentSpanId'] = parentSpanId;
  }

  return payload;
}

function toUnixNanoString(time: HrTime): string {
  return (BigInt(time[0]) * 1_000_000_000n + BigInt(time[1])).toString(10);
}
