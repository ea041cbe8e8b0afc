export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchedulerError';
  }
}

/**
 * Raised while building a scheduler when an option carries an unusable value.
 */
export class SchedulerConfigurationError extends SchedulerError {
  constructor(
    readonly option: string,
    message: string,
  ) {
    super(`Invalid scheduler option "${option}": ${message}`);
    this.name = 'SchedulerConfigurationError';
  }
}

/**
 * Raised when a schedule descriptor cannot be parsed or a built-in schedule receives
 * out-of-range parameters.
 */
export class InvalidScheduleError extends SchedulerError {
  constructor(
    message: string,
    readonly descriptor?: string,
  ) {
    super(message);
    this.name = 'InvalidScheduleError';
  }
}

export class SchedulerStateError extends SchedulerError {
  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(`Cannot ${operation}: ${message}`);
    this.name = 'SchedulerStateError';
  }
}
