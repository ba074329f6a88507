export { CacheLayer, cacheKey, isCacheable, CACHE_KEY_PREFIX, type CacheStats } from './cache-layer.js';
export { MemoryCacheStore, type CacheStore } from './store.js';
export { RedisCacheStore, createRedisStore } from './redis-store.js';
