/**
 * Cache layer for DNS/MX lookups.
 *
 * Two backends behind one interface:
 * - in-memory TTL map (default, and fallback)
 * - Redis (REDIS_ENABLED=true), shared across instances; values that come
 *   back from Redis are validated before use
 *
 * CONFIGURATION:
 *   REDIS_ENABLED=true|false
 *   REDIS_URL=redis://host:port
 *   MX_CACHE_TTL_SECONDS=600
 */

import { z } from 'zod';
import { MxRecord } from '../types/email';
import { config } from '../config/env';
import { logger } from './logger';
import { redisStore, TtlStore } from './redis';

const log = logger.child('cache');

export interface ICache<T> {
  /**
   * @returns Value if present and not expired, null otherwise
   */
  get(key: string): Promise<T | null>;
  set(key: string, value: T, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export class InMemoryCache<T> implements ICache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }

    return entry.data;
  }

  async set(key: string, value: T, ttlMs: number): Promise<void> {
    this.entries.set(key, { data: value, expiresAt: this.now() + ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  cleanupExpired(): number {
    const now = this.now();
    let cleaned = 0;

    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.entries.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      log.debug(`Cache cleanup: ${cleaned} expired entries removed`);
    }
    return cleaned;
  }
}

/**
 * Redis-backed cache; every write also lands in memory so a Redis outage
 * mid-session keeps recent entries
 */
export class RedisCache<T> implements ICache<T> {
  private readonly fallback = new InMemoryCache<T>();

  constructor(private readonly schema: z.ZodType<T>, private readonly store: TtlStore = redisStore) {}

  async get(key: string): Promise<T | null> {
    const raw = await this.store.get(key);
    if (raw !== null) {
      try {
        const parsed = this.schema.safeParse(JSON.parse(raw));
        if (parsed.success) {
          return parsed.data;
        }
        log.warn(`Ignoring malformed cache entry ${key}`);
      } catch (error) {
        log.warn(`Ignoring unparseable cache entry ${key}`, { error: error instanceof Error ? error.message : String(error) });
      }
    }

    return this.fallback.get(key);
  }

  async set(key: string, value: T, ttlMs: number): Promise<void> {
    const stored = await this.store.setWithTtl(key, JSON.stringify(value), ttlMs / 1000);
    await this.fallback.set(key, value, ttlMs);

    if (!stored) {
      log.debug('Redis SET skipped, entry kept in memory only', { key });
    }
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(key);
    await this.fallback.delete(key);
  }

  async clear(): Promise<void> {
    await this.fallback.clear();
    // Redis keys expire on their own; flushing the shared keyspace is not ours to do
    log.warn('Redis cache clear only clears the in-memory copy');
  }
}

const mxRecordsSchema = z.array(
  z.object({
    exchange: z.string(),
    priority: z.number(),
  })
);

/**
 * MX record cache keyed by lowercased domain. An empty array is a cached
 * "no MX" answer.
 */
export class MxCache {
  constructor(private readonly backend: ICache<MxRecord[]>, private readonly defaultTtlMs: number) {}

  async getMx(domain: string): Promise<MxRecord[] | null> {
    const records = await this.backend.get(`mx:${domain.toLowerCase()}`);
    log.debug(`MX cache ${records ? 'hit' : 'miss'} for domain: ${domain}`);
    return records;
  }

  async setMx(domain: string, records: MxRecord[], ttlMs?: number): Promise<void> {
    const ttl = ttlMs ?? this.defaultTtlMs;
    await this.backend.set(`mx:${domain.toLowerCase()}`, records, ttl);
    log.debug(`MX records cached for domain: ${domain}`, { recordCount: records.length, ttlMs: ttl });
  }

  async clear(): Promise<void> {
    await this.backend.clear();
  }
}

function createMxBackend(): ICache<MxRecord[]> {
  if (config.redis.enabled) {
    // Triggers the lazy connection; RedisCache reads through to memory until it is ready
    redisStore.open();
    log.info('Using Redis-backed MX cache');
    return new RedisCache(mxRecordsSchema);
  }

  log.debug('Using in-memory MX cache');
  const memory = new InMemoryCache<MxRecord[]>();

  const cleanupInterval = setInterval(() => memory.cleanupExpired(), 5 * 60 * 1000);
  // Unref so it doesn't keep process alive in tests
  cleanupInterval.unref();

  return memory;
}

export const mxCache = new MxCache(createMxBackend(), config.mxCacheTtlSeconds * 1000);
