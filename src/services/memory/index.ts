/**
 * Memory Services
 */

export { MemoryStore } from './memory-store.js';
export type { MemoryStoreOptions } from './memory-store.js';
export { MemoryManager, DEFAULT_MEMORY_POLICY } from './memory-manager.js';
export type { PruneReport } from './memory-manager.js';
