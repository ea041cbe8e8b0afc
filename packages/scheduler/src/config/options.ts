import { isTelemetryTracer, noopTelemetryTracer, type TelemetryTracer } from '@tickwork/core/telemetry';

import { isSchedulerLogger, type SchedulerLogger } from '../domain/ports/logger.js';
import { isScheduleParser, type ScheduleParser } from '../domain/ports/schedule.js';
import { SchedulerConfigurationError } from '../errors.js';
import { discardLogger } from '../logging/scheduler-logger.js';
import { descriptorParser } from '../schedules/descriptor-parser.js';

export interface SchedulerSettings {
  readonly timeZone: string;
  readonly logger: SchedulerLogger;
  readonly parser: ScheduleParser;
  readonly tracer: TelemetryTracer;
}

type MutableSchedulerSettings = {
  -readonly [Key in keyof SchedulerSettings]: SchedulerSettings[Key];
};

/**
 * Mutates scheduler settings during construction. Options validate their argument eagerly and
 * throw {@link SchedulerConfigurationError} when it is unusable.
 */
export type SchedulerOption = (settings: MutableSchedulerSettings) => void;

/**
 * Returns the IANA zone the host process runs in.
 */
export const resolveLocalTimeZone = (): string => Intl.DateTimeFormat().resolvedOptions().timeZone;

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

export function withTimeZone(timeZone: string): SchedulerOption {
  if (typeof timeZone !== 'string' || timeZone.trim() === '') {
    throw new SchedulerConfigurationError('timeZone', 'expected a non-empty IANA time zone name.');
  }
  if (!isValidTimeZone(timeZone)) {
    throw new SchedulerConfigurationError('timeZone', `unknown time zone "${timeZone}".`);
  }
  return (settings) => {
    settings.timeZone = timeZone;
  };
}

export function withLogger(logger: SchedulerLogger): SchedulerOption {
  if (!isSchedulerLogger(logger)) {
    throw new SchedulerConfigurationError('logger', 'expected an object with info and error methods.');
  }
  return (settings) => {
    settings.logger = logger;
  };
}

export function withParser(parser: ScheduleParser): SchedulerOption {
  if (!isScheduleParser(parser)) {
    throw new SchedulerConfigurationError('parser', 'expected an object with a parse method.');
  }
  return (settings) => {
    settings.parser = parser;
  };
}

export function withTracer(tracer: TelemetryTracer): SchedulerOption {
  if (!isTelemetryTracer(tracer)) {
    throw new SchedulerConfigurationError('tracer', 'expected an object with a startSpan method.');
  }
  return (settings) => {
    settings.tracer = tracer;
  };
}

export function resolveSchedulerSettings(options: readonly SchedulerOption[]): SchedulerSettings {
  const settings: MutableSchedulerSettings = {
    timeZone: resolveLocalTimeZone(),
    logger: discardLogger,
    parser: descriptorParser,
    tracer: noopTelemetryTracer,
  };

  for (const option of options) {
    if (typeof option !== 'function') {
      throw new SchedulerConfigurationError('options', 'expected option functions.');
    }
    option(settings);
  }

  return Object.freeze({ ...settings });
}
