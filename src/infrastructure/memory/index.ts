export { KeyedMutex } from './keyed-mutex.js';
export { MemorySyncStore } from './memory-store.js';
