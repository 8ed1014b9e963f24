// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';

import { getLogger } from '../logging/index.js';
import type { KeyValueStore } from './types.js';

const logger = getLogger({ component: 'redis-store' });

export interface RedisStoreOptions {
  keyPrefix?: string;
  connectTimeoutMs?: number;
}

export class RedisStore implements KeyValueStore {
  private readonly redis: Redis;

  constructor(url: string, options: RedisStoreOptions = {}) {
    this.redis = new Redis(url, {
      keyPrefix: options.keyPrefix ?? 'veracity:',
      connectTimeout: options.connectTimeoutMs ?? 5000,
      maxRetriesPerRequest: 2,
      lazyConnect: false,
    });

    this.redis.on('error', (error: Error) => {
      logger.error('Redis connection error', error);
    });
    this.redis.on('ready', () => {
      logger.info('Redis connected');
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lists
  // ─────────────────────────────────────────────────────────────────────────────

  async lpush(key: string, ...values: string[]): Promise<number> {
    return this.redis.lpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.redis.lrange(key, start, stop);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    await this.redis.ltrim(key, start, stop);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Utility
  // ─────────────────────────────────────────────────────────────────────────────

  async ping(): Promise<string> {
    return this.redis.ping();
  }

  async disconnect(): Promise<void> {
    await this.redis.quit();
  }
}
