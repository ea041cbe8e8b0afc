export { createMemoryCliIo, type MemoryCliIo } from './memory-cli-io.js';
