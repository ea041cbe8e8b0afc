import { PassThrough } from 'node:stream';

import type { CliIo } from '../io/cli-io.js';

export interface MemoryCliIo extends CliIo {
  readonly stdoutBuffer: string;
  readonly stderrBuffer: string;
  readonly exitCodes: readonly number[];
  /**
   * Non-empty stdout lines written so far.
   */
  stdoutLines(): string[];
}

export const createMemoryCliIo = (): MemoryCliIo => {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const recordedExitCodes: number[] = [];

  return {
    stdout,
    stderr,
    writeOut: (chunk: string) => {
      stdoutChunks.push(chunk);
      stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      stderrChunks.push(chunk);
      stderr.write(chunk);
    },
    exit: (code: number): never => {
      recordedExitCodes.push(code);
      throw new Error(`process exit called with code ${String(code)}`);
    },
    stdoutLines: () =>
      stdoutChunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0),
    get stdoutBuffer(): string {
      return stdoutChunks.join('');
    },
    get stderrBuffer(): string {
      return stderrChunks.join('');
    },
    get exitCodes(): readonly number[] {
      return recordedExitCodes;
    },
  };
};
