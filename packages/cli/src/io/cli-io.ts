import process from 'node:process';

import type { WritableTarget } from '@tickwork/core/reporting';

/**
 * Output surface used by commands, so tests can capture what a command prints.
 */
export interface CliIo {
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;

  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  exit(code: number): never;
}

export interface ProcessCliIoOptions {
  readonly process?: NodeJS.Process;
}

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target = options.process ?? process;

  return {
    stdout: target.stdout,
    stderr: target.stderr,
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    exit: (code: number): never => {
      const nonZeroExitCode =
        target.exitCode !== undefined && target.exitCode !== 0 ? target.exitCode : undefined;
      const resolvedCode = code === 0 && nonZeroExitCode !== undefined ? nonZeroExitCode : code;
      return target.exit(resolvedCode);
    },
  };
};

/**
 * Adapts one of the CLI output channels to the {@link WritableTarget} shape used by loggers
 * and exporters.
 */
export const toWritableTarget = (io: CliIo, channel: 'stdout' | 'stderr'): WritableTarget => ({
  write: (line: string) => {
    if (channel === 'stdout') {
      io.writeOut(line);
    } else {
      io.writeErr(line);
    }
  },
});
