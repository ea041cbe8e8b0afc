import type { Job, JobFunction } from '../domain/ports/job.js';

/**
 * Adapts a bare function to the {@link Job} capability.
 */
export class FuncJob implements Job {
  constructor(private readonly fn: JobFunction) {}

  run(): void | Promise<void> {
    return this.fn();
  }
}
