import { inspect } from 'node:util';

import { ConfigFileNotFoundError } from '@tickwork/core/config';
import { SchedulerError } from '@tickwork/scheduler';
import { ZodError } from 'zod';

import { ConfigValidationError } from '../config/scheduler-config.js';

/**
 * Errors the user can fix from the command line are reported by message; anything else keeps
 * its stack for debugging.
 */
const isUserFacingError = (error: Error): boolean =>
  error instanceof SchedulerError ||
  error instanceof ConfigFileNotFoundError ||
  error instanceof ConfigValidationError;

export const formatCliError = (error: unknown): string => {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('\n');
  }

  if (error instanceof Error) {
    if (isUserFacingError(error)) {
      return `${error.name}: ${error.message}`;
    }
    return error.stack ?? error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};
