export {
  formatDurationMs,
  formatUnknownError,
  serialiseError,
  toLogValue,
  writeJson,
  writeLine,
} from './formatting.js';

export type { SerialisedError, WritableTarget } from './formatting.js';
