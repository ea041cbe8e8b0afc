import { Option, type Command } from 'commander';

import { TELEMETRY_MODES, isTelemetryMode, type TelemetryMode } from '@tickwork/core/telemetry';

import { parseDurationMs, parseTimeZone } from '../../framework/commander/option-parsers.js';

export interface RunCommandOptions {
  readonly config?: string;
  readonly timeZone?: string;
  readonly forMs?: number;
  readonly telemetry: TelemetryMode;
}

export const registerRunCommandOptions = (command: Command): void => {
  const telemetryOption = new Option('--telemetry <mode>', 'Telemetry exporter for job spans')
    .choices(TELEMETRY_MODES)
    .default('none');

  command
    .option('-c, --config <path>', 'Path to the tickwork configuration file')
    .option('--time-zone <zone>', 'IANA time zone overriding the configuration', parseTimeZone)
    .option('--for <ms>', 'Stop after the given number of milliseconds', parseDurationMs)
    .addOption(telemetryOption);
};

export const resolveRunCommandOptions = (command: Command): RunCommandOptions => {
  const options = command.opts<Record<string, unknown>>();
  const config = options['config'];
  const timeZone = options['timeZone'];
  const forMs = options['for'];
  const telemetry = options['telemetry'];
  return {
    telemetry: isTelemetryMode(telemetry) ? telemetry : 'none',
    ...(typeof config === 'string' ? { config } : {}),
    ...(typeof timeZone === 'string' ? { timeZone } : {}),
    ...(typeof forMs === 'number' ? { forMs } : {}),
  } satisfies RunCommandOptions;
};
