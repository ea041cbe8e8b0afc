import process from 'node:process';

import { CommanderError } from 'commander';

import { createCommanderProgram } from '../framework/commander/program.js';
import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import { createProcessCliIo } from '../io/cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
} from './types.js';

const readNonZeroProcessExitCode = (): number | undefined => {
  const exitCode = process.exitCode;
  if (typeof exitCode !== 'number') {
    return undefined;
  }

  return exitCode === 0 ? undefined : exitCode;
};

const readCommanderExitCode = (error: CommanderError): number | undefined => {
  const { exitCode } = error;
  return Number.isInteger(exitCode) ? exitCode : undefined;
};

/**
 * Creates the CLI kernel. Command modules register onto a shared commander program; `run`
 * parses the argument vector and maps failures to an exit code instead of throwing.
 */
export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    io,
  });

  const state: { globalOptions: CliGlobalOptions } = {
    globalOptions: createDefaultGlobalOptions(),
  };

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => state.globalOptions,
  };

  program.hook('preAction', () => {
    state.globalOptions = readGlobalOptions(program);
  });

  const runProgram = async (argv: readonly string[]): Promise<void> => {
    const args = [...argv];
    if (args.length === 0) {
      throw new Error('Argument vector must include at least the node executable.');
    }

    if (args.length <= 2) {
      program.outputHelp();
      return;
    }

    await program.parseAsync(args, { from: 'node' });
  };

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      const previousExitCode = process.exitCode;

      try {
        await runProgram(argv);

        const processExitCode = readNonZeroProcessExitCode();
        return processExitCode ?? 0;
      } catch (error) {
        if (error instanceof CommanderError) {
          const processExitCode = readNonZeroProcessExitCode();
          const commanderExitCode = readCommanderExitCode(error);
          return processExitCode ?? commanderExitCode ?? 1;
        }

        const message = formatCliError(error);
        const needsNewline = message.endsWith('\n') ? '' : '\n';
        io.writeErr(`${message}${needsNewline}`);

        const processExitCode = readNonZeroProcessExitCode();
        return processExitCode ?? 1;
      } finally {
        process.exitCode = previousExitCode;
      }
    },
  };
};

export interface CreateTickworkCliKernelOptions extends CliKernelOptions {
  readonly modules: readonly CliCommandModule[];
}

export const createTickworkCliKernel = ({
  modules,
  ...options
}: CreateTickworkCliKernelOptions): CliKernel => {
  const kernel = createCliKernel(options);
  for (const module of modules) {
    kernel.register(module);
  }
  return kernel;
};
