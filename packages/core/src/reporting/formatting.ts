/**
 * Minimal interface describing a writable target suitable for command output streams.
 */
export interface WritableTarget {
  write(line: string): void;
}

export interface SerialisedError {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
}

const LINE_TERMINATOR = '\n';

/**
 * Formats a millisecond duration with a single decimal place suffix.
 *
 * @param value - Duration in milliseconds to format.
 * @returns String representation with a millisecond suffix.
 */
export function formatDurationMs(value: number): string {
  return `${value.toFixed(1)}ms`;
}

/**
 * Converts arbitrary error inputs into a stable string description.
 *
 * @param error - Error-like value to format.
 * @returns Human readable error summary.
 */
export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === 'symbol') {
    return error.description ?? 'Symbol()';
  }
  return String(error);
}

/**
 * Serialises an unknown error into a structured payload for logging.
 *
 * @param error - Error-like value to serialise.
 * @returns Structured error payload describing the value.
 */
export function serialiseError(error: unknown): SerialisedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: formatUnknownError(error),
  };
}

/**
 * Converts a value captured in a log record into a JSON friendly shape.
 *
 * Errors become {@link SerialisedError} payloads, dates their ISO representation and bigints
 * decimal strings. Other values pass through unchanged.
 *
 * @param value - Value attached to a log record.
 * @returns A value that `JSON.stringify` renders faithfully.
 */
export function toLogValue(value: unknown): unknown {
  if (value instanceof Error) {
    return serialiseError(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString(10);
  }
  return value;
}

/**
 * Writes a JSON payload to the provided target followed by a newline terminator.
 *
 * @param target - Writable destination for the encoded payload.
 * @param payload - Arbitrary value to serialise as JSON.
 */
export function writeJson(target: WritableTarget, payload: unknown): void {
  target.write(`${JSON.stringify(payload)}${LINE_TERMINATOR}`);
}

/**
 * Writes a plain-text line to the provided target followed by a newline terminator.
 *
 * @param target - Writable destination for the text content.
 * @param line - Text content to emit.
 */
export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}${LINE_TERMINATOR}`);
}
