import { formatDurationMs } from '../reporting/formatting.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export interface LineOutput {
  write(line: string): void;
}

const LOG_LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

export class JsonLineLogger implements StructuredLogger {
  constructor(private readonly output: LineOutput) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

/**
 * Human readable logger emitting `[level] name.event {data}` lines.
 *
 * Context and data records are appended as compact JSON when present.
 */
export class TextLineLogger implements StructuredLogger {
  constructor(private readonly output: LineOutput) {}

  log(entry: StructuredLogEvent): void {
    const elapsed = entry.elapsedMs === undefined ? '' : ` (${formatDurationMs(entry.elapsedMs)})`;
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
    this.output.write(`[${entry.level}] ${entry.name}.${entry.event}${elapsed}${context}${data}\n`);
  }
}

/**
 * Wraps a logger so that entries below the provided level are dropped.
 *
 * @param logger - Destination receiving the retained entries.
 * @param minimumLevel - Lowest level that is forwarded.
 * @returns A logger applying the level threshold.
 */
export function filterLogLevel(logger: StructuredLogger, minimumLevel: LogLevel): StructuredLogger {
  const threshold = LOG_LEVEL_ORDER[minimumLevel];
  return {
    log(entry) {
      if (LOG_LEVEL_ORDER[entry.level] >= threshold) {
        logger.log(entry);
      }
    },
  } satisfies StructuredLogger;
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};
