import {
  trace,
  SpanStatusCode,
  type Span,
  type SpanAttributeValue,
  type SpanAttributes,
  type SpanOptions,
  type Tracer,
} from '@opentelemetry/api';

type AttributeScalar = string | number | boolean;

/**
 * Telemetry attribute values that span primitive scalars or arrays of scalars.
 */
export type TelemetryAttributeValue = SpanAttributeValue | readonly AttributeScalar[];

/**
 * Record of attributes attached to spans, keyed by attribute name.
 */
export type TelemetryAttributes = Readonly<Record<string, TelemetryAttributeValue | undefined>>;

export interface TelemetrySpanOptions {
  readonly attributes?: TelemetryAttributes;
}

export interface TelemetrySpanEndOptions {
  readonly status?: TelemetrySpanStatus;
}

export type TelemetrySpanStatus = 'ok' | 'error';

/**
 * Mutable span reference exposed to instrumentation callers.
 */
export interface TelemetrySpan {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  setAttribute(name: string, value: TelemetryAttributeValue): void;
  end(options?: TelemetrySpanEndOptions): void;
}

export interface TelemetryTracer {
  startSpan(name: string, options?: TelemetrySpanOptions): TelemetrySpan;
}

export interface TelemetryTracerOptions {
  readonly instrumentation?: {
    readonly name: string;
    readonly version?: string;
  };
  readonly tracer?: Tracer;
}

const DEFAULT_INSTRUMENTATION = 'tickwork.core.telemetry';

/**
 * Creates a tracer that delegates to the global OpenTelemetry tracer provider.
 * @param {TelemetryTracerOptions} [options] - Optional instrumentation metadata or tracer override.
 * @returns {TelemetryTracer} Tracer implementation backed by OpenTelemetry.
 */
export function createTelemetryTracer(options: TelemetryTracerOptions = {}): TelemetryTracer {
  const tracer =
    options.tracer ??
    trace.getTracer(
      options.instrumentation?.name ?? DEFAULT_INSTRUMENTATION,
      options.instrumentation?.version,
    );
  return new OpenTelemetryTracer(tracer);
}

/**
 * Tracer implementation that silently drops all span operations.
 */
export const noopTelemetryTracer: TelemetryTracer = {
  startSpan(name: string): TelemetrySpan {
    return new NoopTelemetrySpan(name);
  },
};

export const isTelemetryTracer = (value: unknown): value is TelemetryTracer =>
  typeof value === 'object' &&
  value !== null &&
  'startSpan' in value &&
  typeof value.startSpan === 'function';

class OpenTelemetryTracer implements TelemetryTracer {
  constructor(private readonly tracer: Tracer) {}

  startSpan(name: string, options?: TelemetrySpanOptions): TelemetrySpan {
    const spanOptions: SpanOptions = {};
    if (options?.attributes) {
      spanOptions.attributes = normaliseAttributes(options.attributes);
    }
    return new OpenTelemetrySpan(this.tracer.startSpan(name, spanOptions), name);
  }
}

class OpenTelemetrySpan implements TelemetrySpan {
  constructor(
    private readonly span: Span,
    readonly name: string,
  ) {}

  get spanId(): string {
    return this.span.spanContext().spanId;
  }

  get traceId(): string {
    return this.span.spanContext().traceId;
  }

  setAttribute(name: string, value: TelemetryAttributeValue): void {
    this.span.setAttribute(name, normaliseAttributeValue(value));
  }

  end(options?: TelemetrySpanEndOptions): void {
    if (options?.status) {
      this.span.setStatus({
        code: options.status === 'error' ? SpanStatusCode.ERROR : SpanStatusCode.OK,
      });
    }
    this.span.end();
  }
}

function normaliseAttributes(attributes: TelemetryAttributes): SpanAttributes {
  const record: Record<string, SpanAttributeValue> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined) {
      continue;
    }
    record[key] = normaliseAttributeValue(value);
  }
  return record;
}

function normaliseAttributeValue(value: TelemetryAttributeValue): SpanAttributeValue {
  if (isScalarArray(value)) {
    return copyScalarArray(value);
  }
  return value;
}

function isScalarArray(value: TelemetryAttributeValue): value is readonly AttributeScalar[] {
  return Array.isArray(value);
}

function copyScalarArray(values: readonly AttributeScalar[]): SpanAttributeValue {
  if (values.every((item): item is string => typeof item === 'string')) {
    return [...values];
  }
  if (values.every((item): item is number => typeof item === 'number')) {
    return [...values];
  }
  if (values.every((item): item is boolean => typeof item === 'boolean')) {
    return [...values];
  }
  return values.map((item) => String(item));
}

class NoopTelemetrySpan implements TelemetrySpan {
  readonly spanId = 'noop-span';
  readonly traceId = 'noop-trace';

  constructor(readonly name: string) {}

  setAttribute(): void {
    // noop
  }

  end(): void {
    // noop
  }
}
