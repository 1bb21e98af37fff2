export type { MemoryKeySetConfig } from './interfaces/memoryKeySetConfig.js';
export { MemoryKeySet } from './memoryKeySet.js';
