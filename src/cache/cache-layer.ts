import { z } from 'zod';
import type { Logger } from 'pino';
import type { BrainMode, BrainResult } from '../types/index.js';
import { hashParts, normalizeText } from '../crypto/index.js';
import { logger as rootLogger } from '../logger.js';
import type { CacheStore } from './store.js';

// Bump when the key derivation or the stored shape changes
export const CACHE_KEY_PREFIX = 'brain:v1:';

const confidenceSchema = z.object({
  score: z.number().min(0).max(1),
  tier: z.enum(['high', 'medium', 'low']),
  factors: z.array(z.tuple([z.string(), z.number()])),
  decision: z.enum(['accept', 'accept_with_disclaimer', 'reject'])
});

const cachedResultSchema = z.object({
  mode: z.enum(['chat', 'analyze', 'parse']),
  text: z.string(),
  labels: z.array(z.object({ label: z.string(), category: z.string() })),
  confidence: confidenceSchema,
  source: z.enum(['remote', 'cache', 'fallback'])
});

export function cacheKey(mode: BrainMode, query: string): string {
  return `${CACHE_KEY_PREFIX}${hashParts(mode, normalizeText(query))}`;
}

export function isCacheable(mode: BrainMode): boolean {
  return mode !== 'chat';
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  errors: number;
  abandoned: number;
}

class CacheAbandonedError extends Error {
  constructor() {
    super('Cache operation abandoned');
    this.name = 'CacheAbandonedError';
  }
}

// The store call keeps running; only our wait for it ends
function untilAborted<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return operation();
  if (signal.aborted) return Promise.reject(new CacheAbandonedError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CacheAbandonedError());
    signal.addEventListener('abort', onAbort, { once: true });
    operation().then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

// Best-effort: a failing store degrades to a miss, never to an error
export class CacheLayer {
  private readonly counters: CacheStats = { hits: 0, misses: 0, writes: 0, errors: 0, abandoned: 0 };
  private readonly logger: Logger;

  constructor(private readonly store: CacheStore, logger?: Logger) {
    this.logger = (logger ?? rootLogger).child({ component: 'cache' });
  }

  // A signal that aborts before the store answers turns the read into a miss
  async get(mode: BrainMode, query: string, signal?: AbortSignal): Promise<BrainResult | undefined> {
    if (!isCacheable(mode)) return undefined;
    const key = cacheKey(mode, query);

    let raw: string | null;
    try {
      raw = await untilAborted(() => this.store.get(key), signal);
    } catch (error) {
      if (error instanceof CacheAbandonedError) {
        this.counters.abandoned++;
        this.logger.warn({ key }, 'Cache read abandoned at deadline');
        return undefined;
      }
      this.counters.errors++;
      this.logger.error({ error, key }, 'Cache read failed');
      return undefined;
    }

    if (raw === null) {
      this.counters.misses++;
      return undefined;
    }

    const parsed = decode(raw);
    if (!parsed) {
      this.counters.misses++;
      this.logger.warn({ key }, 'Discarding unreadable cache entry');
      return undefined;
    }

    this.counters.hits++;
    return { ...parsed, source: 'cache' };
  }

  async put(mode: BrainMode, query: string, value: BrainResult, ttlMs: number, signal?: AbortSignal): Promise<void> {
    if (!isCacheable(mode)) return;
    const key = cacheKey(mode, query);
    try {
      await untilAborted(() => this.store.set(key, JSON.stringify(value), ttlMs), signal);
      this.counters.writes++;
    } catch (error) {
      if (error instanceof CacheAbandonedError) {
        this.counters.abandoned++;
        this.logger.warn({ key }, 'Cache write abandoned at deadline');
        return;
      }
      this.counters.errors++;
      this.logger.error({ error, key }, 'Cache write failed');
    }
  }

  async invalidate(mode: BrainMode, query: string): Promise<void> {
    const key = cacheKey(mode, query);
    try {
      await this.store.del(key);
    } catch (error) {
      this.counters.errors++;
      this.logger.error({ error, key }, 'Cache invalidate failed');
    }
  }

  stats(): CacheStats {
    return { ...this.counters };
  }

  async close(): Promise<void> {
    await this.store.close?.();
  }
}

function decode(raw: string): BrainResult | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = cachedResultSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}
