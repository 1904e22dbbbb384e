/**
 * Redis store behind the MX cache.
 *
 * The connection opens on first use. While Redis is disabled, connecting or
 * down, reads answer null and writes answer false; the cache then serves
 * from memory.
 */

import Redis from 'ioredis';
import { config } from '../config/env';
import { errorMessage } from './errors';
import { logger } from './logger';

const log = logger.child('redis');

export interface RedisStoreOptions {
  enabled: boolean;
  url: string;
  keyPrefix: string;
}

/** String store with per-key expiry, as the MX cache uses it */
export interface TtlStore {
  get(key: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
}

export interface RedisStoreStatus {
  enabled: boolean;
  ready: boolean;
  lastError: string | null;
}

export class RedisStore implements TtlStore {
  private connection: Redis | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: RedisStoreOptions) {}

  /**
   * Open the connection if it is not open yet; null while Redis is disabled
   */
  open(): Redis | null {
    if (!this.options.enabled) {
      return null;
    }
    if (this.connection) {
      return this.connection;
    }

    const connection = new Redis(this.options.url, {
      keyPrefix: this.options.keyPrefix,
      // Fail commands at once while disconnected
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: 5000,
      commandTimeout: 3000,
      retryStrategy: (attempt: number) => Math.min(attempt * 500, 10_000),
    });

    connection.on('ready', () => {
      this.lastError = null;
      log.info('MX cache connected to Redis');
    });
    connection.on('error', (error: Error) => {
      if (this.lastError === null) {
        log.warn('Redis unavailable, MX cache serving from memory', { error: error.message });
      }
      this.lastError = error.message;
    });

    this.connection = connection;
    return connection;
  }

  status(): RedisStoreStatus {
    return {
      enabled: this.options.enabled,
      ready: this.connection?.status === 'ready',
      lastError: this.lastError,
    };
  }

  async get(key: string): Promise<string | null> {
    const connection = this.readyConnection();
    if (!connection) {
      return null;
    }
    try {
      return await connection.get(key);
    } catch (error) {
      log.warn(`Redis read of ${key} failed`, { error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Store with an expiry in whole seconds (at least 1)
   */
  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const connection = this.readyConnection();
    if (!connection) {
      return false;
    }
    try {
      await connection.set(key, value, 'EX', Math.max(1, Math.ceil(ttlSeconds)));
      return true;
    } catch (error) {
      log.warn(`Redis write of ${key} failed`, { error: errorMessage(error) });
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    const connection = this.readyConnection();
    if (!connection) {
      return false;
    }
    try {
      await connection.del(key);
      return true;
    } catch (error) {
      log.warn(`Redis delete of ${key} failed`, { error: errorMessage(error) });
      return false;
    }
  }

  private readyConnection(): Redis | null {
    const connection = this.open();
    return connection?.status === 'ready' ? connection : null;
  }
}

export const redisStore = new RedisStore(config.redis);
