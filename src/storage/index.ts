// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import type { KeyValueStore } from './types.js';

export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore } from './redis.js';

const logger = getLogger({ component: 'storage' });

/**
 * Redis when a URL is configured, otherwise an in-process store.
 */
export function createStore(redisUrl?: string): KeyValueStore {
  if (redisUrl) {
    logger.info('Using Redis store');
    return new RedisStore(redisUrl);
  }
  logger.info('Using in-memory store');
  return new MemoryStore();
}
