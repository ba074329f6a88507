import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { CacheStore } from './store.js';
import { logger as rootLogger } from '../logger.js';

export class RedisCacheStore implements CacheStore {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) return;
    await this.redis.set(key, value, 'PX', Math.ceil(ttlMs));
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

export function createRedisStore(url: string, logger: Logger = rootLogger): RedisCacheStore {
  const log = logger.child({ component: 'redis' });
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    retryStrategy(times) {
      return Math.min(times * 50, 2000);
    }
  });

  redis.on('connect', () => {
    log.info('Redis connected');
  });

  redis.on('error', (err: Error) => {
    log.error({ error: err.message }, 'Redis error');
  });

  redis.on('reconnecting', () => {
    log.warn('Redis reconnecting');
  });

  return new RedisCacheStore(redis);
}
