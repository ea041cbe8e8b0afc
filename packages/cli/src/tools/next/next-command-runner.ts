import { TZDate } from '@date-fns/tz';
import type { Command } from 'commander';
import { formatISO } from 'date-fns';

import { writeJson, writeLine } from '@tickwork/core/reporting';
import { descriptorParser, resolveLocalTimeZone, type Schedule } from '@tickwork/scheduler';

import { toWritableTarget, type CliIo } from '../../io/cli-io.js';
import { resolveNextCommandOptions } from './options.js';

export interface ExecuteNextCommandOptions {
  readonly descriptor: string;
  readonly command: Command;
  readonly io: CliIo;
  readonly now?: () => number;
}

/**
 * Walks a schedule forward from `from`, feeding each activation back in as the next start.
 */
export const computeActivations = (
  schedule: Schedule,
  from: Date,
  count: number,
  timeZone: string,
): Date[] => {
  const activations: Date[] = [];
  let cursor: Date = new TZDate(from.getTime(), timeZone);
  for (let index = 0; index < count; index += 1) {
    cursor = schedule.next(cursor);
    activations.push(cursor);
  }
  return activations;
};

export const executeNextCommand = ({
  descriptor,
  command,
  io,
  now = Date.now,
}: ExecuteNextCommandOptions): void => {
  const options = resolveNextCommandOptions(command);
  const schedule = descriptorParser.parse(descriptor);
  const timeZone = options.timeZone ?? resolveLocalTimeZone();
  const from = options.from ?? new Date(now());

  const activations = computeActivations(schedule, from, options.count, timeZone).map((date) =>
    formatISO(date),
  );

  const target = toWritableTarget(io, 'stdout');
  if (options.json) {
    writeJson(target, activations);
    return;
  }
  for (const activation of activations) {
    writeLine(target, activation);
  }
};
