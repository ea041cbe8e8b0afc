import type { Command } from 'commander';

import type { CliCommandModule } from '../../kernel/types.js';
import { registerRunCommandOptions } from './options.js';
import { executeRunCommand } from './run-command-runner.js';
import type { SignalSource } from './shutdown.js';

export interface RunCommandModuleOptions {
  readonly signals?: SignalSource;
  readonly cwd?: string;
}

export const createRunCommandModule = (
  moduleOptions: RunCommandModuleOptions = {},
): CliCommandModule => ({
  id: 'scheduler.run',
  register(program, context) {
    const runCommand = program
      .command('run')
      .summary('Run the jobs of a tickwork configuration.')
      .description(
        'Load the configuration, start the scheduler and keep running until SIGINT, SIGTERM ' +
          'or the --for deadline. In-flight jobs are awaited before exiting.',
      );

    registerRunCommandOptions(runCommand);
    runCommand.action(async (_options: unknown, command: Command) => {
      await executeRunCommand({
        command,
        io: context.io,
        globalOptions: context.getGlobalOptions(),
        ...moduleOptions,
      });
    });
  },
});

export const runCommandModule: CliCommandModule = createRunCommandModule();
