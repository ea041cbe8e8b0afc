import type { Command } from 'commander';

import type { CliCommandModule } from '../../kernel/types.js';
import { executeNextCommand } from './next-command-runner.js';
import { registerNextCommandOptions } from './options.js';

export const nextCommandModule: CliCommandModule = {
  id: 'schedule.next',
  register(program, context) {
    const nextCommand = program
      .command('next')
      .summary('Preview upcoming activations of a schedule descriptor.')
      .description(
        'Print the next activations of a descriptor such as "@every 15m" or "@weekly mon 09:00".',
      )
      .argument('<descriptor...>', 'Schedule descriptor; words may be passed unquoted');

    registerNextCommandOptions(nextCommand);
    nextCommand.action((descriptor: string[], _options: unknown, command: Command) => {
      executeNextCommand({ descriptor: descriptor.join(' '), command, io: context.io });
    });
  },
};
