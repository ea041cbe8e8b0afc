import { Option, type Command } from 'commander';

import { isLogLevel, type LogLevel } from '@tickwork/core/logging';

import type { CliGlobalOptions } from '../../kernel/types.js';

const JSON_LOGS_HELP = 'Emit machine-readable JSON logs.';
const LOG_LEVEL_HELP = 'Lowest log level to print.';

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze(['debug', 'info', 'warn', 'error']);

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'pretty',
  logLevel: 'info',
} as const);

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: defaultGlobalOptions.logFormat,
  logLevel: defaultGlobalOptions.logLevel,
});

export const registerGlobalOptions = (program: Command): void => {
  program
    .option('--json-logs', JSON_LOGS_HELP, false)
    .addOption(
      new Option('--log-level <level>', LOG_LEVEL_HELP)
        .choices(LOG_LEVELS)
        .default(defaultGlobalOptions.logLevel),
    );
};

export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const options = program.optsWithGlobals<Record<string, unknown>>();
  const logLevel = options['logLevel'];

  return {
    logFormat: options['jsonLogs'] === true ? 'json' : 'pretty',
    logLevel: isLogLevel(logLevel) ? logLevel : defaultGlobalOptions.logLevel,
  };
};
