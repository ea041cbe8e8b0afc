import { EventEmitter } from 'node:events';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createTickworkCliKernel } from '../src/kernel/cli-kernel.js';
import { createMemoryCliIo, type MemoryCliIo } from '../src/testing/memory-cli-io.js';
import { createRunCommandModule } from '../src/tools/run/run-command-module.js';

interface LoggedEvent {
  readonly level: string;
  readonly name: string;
  readonly event: string;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

const HEARTBEAT_CONFIG = String.raw`export default {
  timeZone: 'UTC',
  jobs: [
    {
      name: 'heartbeat',
      schedule: '@every 20ms',
      run: ({ logger }) => {
        logger.log({ level: 'info', name: 'heartbeat', event: 'tick' });
      },
    },
  ],
};
`;

const readEvents = (io: MemoryCliIo): LoggedEvent[] =>
  io.stdoutLines().map((line) => JSON.parse(line) as LoggedEvent);

describe('tickwork run', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'tickwork-cli-run-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  const createKernel = (signals: EventEmitter) => {
    const io = createMemoryCliIo();
    const kernel = createTickworkCliKernel({
      programName: 'tickwork',
      version: '0.0.0',
      io,
      modules: [createRunCommandModule({ signals, cwd: workspace })],
    });
    return { io, kernel };
  };

  it('runs configured jobs until a termination signal arrives', async () => {
    await writeFile(path.join(workspace, 'tickwork.config.mjs'), HEARTBEAT_CONFIG, 'utf8');
    const signals = new EventEmitter();
    const { io, kernel } = createKernel(signals);

    const exit = kernel.run(['node', 'tickwork', '--json-logs', 'run']);
    await vi.waitFor(
      () => {
        expect(io.stdoutBuffer).toContain('"event":"tick"');
      },
      { timeout: 5000, interval: 20 },
    );
    signals.emit('SIGTERM');

    await expect(exit).resolves.toBe(0);
    const events = readEvents(io);
    expect(events[0]).toMatchObject({
      name: 'tickwork.cli',
      event: 'started',
      data: { timeZone: 'UTC', jobs: { heartbeat: 1 } },
    });
    expect(events.find((event) => event.event === 'tick')).toMatchObject({
      name: 'heartbeat',
      context: { job: 'heartbeat' },
    });
    expect(events.find((event) => event.event === 'stopping')).toMatchObject({
      data: { reason: 'SIGTERM' },
    });
    expect(events.at(-1)).toMatchObject({ name: 'tickwork.cli', event: 'stopped' });
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('stops after the --for deadline and honours a time zone override', async () => {
    await writeFile(
      path.join(workspace, 'jobs.config.json'),
      JSON.stringify({ timeZone: 'UTC', jobs: [] }),
      'utf8',
    );
    const { io, kernel } = createKernel(new EventEmitter());

    const exitCode = await kernel.run([
      'node',
      'tickwork',
      '--json-logs',
      'run',
      '--config',
      'jobs.config.json',
      '--time-zone',
      'Asia/Tokyo',
      '--for',
      '50',
    ]);

    expect(exitCode).toBe(0);
    const events = readEvents(io);
    expect(events.find((event) => event.event === 'started')).toMatchObject({
      data: { timeZone: 'Asia/Tokyo', jobs: {} },
    });
    expect(events.find((event) => event.event === 'stopping')).toMatchObject({
      data: { reason: 'timeout' },
    });
  });

  it('reports a missing configuration file', async () => {
    const { io, kernel } = createKernel(new EventEmitter());

    const exitCode = await kernel.run(['node', 'tickwork', 'run', '--config', 'missing.mjs']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(
      'ConfigFileNotFoundError: Configuration file not found: missing.mjs\n',
    );
  });

  it('reports invalid configuration files', async () => {
    await writeFile(
      path.join(workspace, 'tickwork.config.json'),
      JSON.stringify({ jobs: [{ name: 'broken', schedule: '@hourly' }] }),
      'utf8',
    );
    const { io, kernel } = createKernel(new EventEmitter());

    const exitCode = await kernel.run(['node', 'tickwork', 'run']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(
      `ConfigValidationError: Invalid configuration in ${path.join(workspace, 'tickwork.config.json')}:\n` +
        '  - jobs.0.run: Expected a function.\n',
    );
  });
});
