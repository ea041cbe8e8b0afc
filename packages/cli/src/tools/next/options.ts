import type { Command } from 'commander';

import {
  parseInstant,
  parsePositiveInteger,
  parseTimeZone,
} from '../../framework/commander/option-parsers.js';

export const DEFAULT_NEXT_COUNT = 5;
export const MAX_NEXT_COUNT = 1000;

export interface NextCommandOptions {
  readonly count: number;
  readonly from?: Date;
  readonly timeZone?: string;
  readonly json: boolean;
}

export const registerNextCommandOptions = (command: Command): void => {
  command
    .option(
      '-n, --count <count>',
      'Number of activations to print',
      parsePositiveInteger(MAX_NEXT_COUNT),
      DEFAULT_NEXT_COUNT,
    )
    .option('--from <instant>', 'ISO-8601 instant to start from (defaults to now)', parseInstant)
    .option('--time-zone <zone>', 'IANA time zone calendar schedules run in', parseTimeZone)
    .option('--json', 'Emit a JSON array instead of one time per line', false);
};

export const resolveNextCommandOptions = (command: Command): NextCommandOptions => {
  const options = command.opts<Record<string, unknown>>();
  const count = options['count'];
  const from = options['from'];
  const timeZone = options['timeZone'];
  return {
    count: typeof count === 'number' ? count : DEFAULT_NEXT_COUNT,
    json: options['json'] === true,
    ...(from instanceof Date ? { from } : {}),
    ...(typeof timeZone === 'string' ? { timeZone } : {}),
  } satisfies NextCommandOptions;
};
