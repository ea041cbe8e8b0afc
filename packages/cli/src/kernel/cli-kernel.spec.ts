import { describe, expect, it } from 'vitest';

import { InvalidScheduleError } from '@tickwork/scheduler';

import { createMemoryCliIo } from '../testing/memory-cli-io.js';
import { createCliKernel, createTickworkCliKernel } from './cli-kernel.js';
import type { CliCommandModule, CliGlobalOptions } from './types.js';

const createEchoModule = (seen: CliGlobalOptions[] = []): CliCommandModule => ({
  id: 'test.echo',
  register(program, context) {
    program.command('echo').action(() => {
      seen.push(context.getGlobalOptions());
    });
  },
});

const createKernel = (...modules: CliCommandModule[]) => {
  const io = createMemoryCliIo();
  const kernel = createTickworkCliKernel({
    programName: 'tickwork',
    version: '1.2.3',
    description: 'Test harness',
    io,
    modules,
  });
  return { io, kernel };
};

describe('createCliKernel', () => {
  it('prints help when no command is given', async () => {
    const { io, kernel } = createKernel(createEchoModule());

    await expect(kernel.run(['node', 'tickwork'])).resolves.toBe(0);
    expect(io.stdoutBuffer).toContain('Usage: tickwork');
  });

  it('prints the version', async () => {
    const { io, kernel } = createKernel();

    await expect(kernel.run(['node', 'tickwork', '--version'])).resolves.toBe(0);
    expect(io.stdoutBuffer).toBe('1.2.3\n');
  });

  it('maps unknown commands to a failing exit code', async () => {
    const { io, kernel } = createKernel(createEchoModule());

    await expect(kernel.run(['node', 'tickwork', 'bogus'])).resolves.toBe(1);
    expect(io.stderrBuffer).toContain("unknown command 'bogus'");
  });

  it('uses default global options when none are given', async () => {
    const seen: CliGlobalOptions[] = [];
    const { kernel } = createKernel(createEchoModule(seen));

    await kernel.run(['node', 'tickwork', 'echo']);

    expect(seen).toEqual([{ logFormat: 'pretty', logLevel: 'info' }]);
  });

  it('passes parsed global options to command modules', async () => {
    const seen: CliGlobalOptions[] = [];
    const { kernel } = createKernel(createEchoModule(seen));

    await kernel.run(['node', 'tickwork', '--json-logs', '--log-level', 'warn', 'echo']);

    expect(seen).toEqual([{ logFormat: 'json', logLevel: 'warn' }]);
  });

  it('rejects unknown log levels', async () => {
    const { io, kernel } = createKernel(createEchoModule());

    await expect(kernel.run(['node', 'tickwork', '--log-level', 'loud', 'echo'])).resolves.toBe(1);
    expect(io.stderrBuffer).toContain("argument 'loud' is invalid");
  });

  it('reports command failures and returns exit code 1', async () => {
    const failing: CliCommandModule = {
      id: 'test.failing',
      register(program) {
        program.command('fail').action(() => {
          throw new InvalidScheduleError('Unrecognised schedule descriptor "@often".', '@often');
        });
      },
    };
    const { io, kernel } = createKernel(failing);

    await expect(kernel.run(['node', 'tickwork', 'fail'])).resolves.toBe(1);
    expect(io.stderrBuffer).toBe(
      'InvalidScheduleError: Unrecognised schedule descriptor "@often".\n',
    );
  });

  it('rejects an empty argument vector', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ programName: 'tickwork', version: '0.0.0', io });

    await expect(kernel.run([])).resolves.toBe(1);
    expect(io.stderrBuffer).toContain('Argument vector must include at least the node executable.');
  });
});
