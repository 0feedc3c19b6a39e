export { cacheKey, expiryFrom, type CacheStore } from './store.js';
export { MemoryCacheStore } from './memory.js';
export { FileCacheStore } from './file.js';
export { ResilientCache } from './resilient.js';
