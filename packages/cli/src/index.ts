import type { SchedulerConfig } from './config/scheduler-config.js';

export { createCliKernel, createTickworkCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo, toWritableTarget } from './io/cli-io.js';
export type { CliIo } from './io/cli-io.js';
export {
  ConfigValidationError,
  loadSchedulerConfig,
  parseSchedulerConfig,
  type ConfiguredJob,
  type ConfiguredJobRun,
  type JobRunContext,
  type LoadedSchedulerConfig,
  type SchedulerConfig,
} from './config/scheduler-config.js';
export { createRunCommandModule, runCommandModule } from './tools/run/run-command-module.js';
export { nextCommandModule } from './tools/next/next-command-module.js';
export { computeActivations } from './tools/next/next-command-runner.js';

/**
 * Identity helper giving configuration files type checking.
 */
export const defineConfig = <TConfig extends SchedulerConfig>(config: TConfig): TConfig => config;
