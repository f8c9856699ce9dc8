// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Backend Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore, StoreBackend } from './types.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import { getLogger } from '../logging/index.js';

export type { KeyValueStore, StoreBackend } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore } from './redis.js';

const logger = getLogger({ component: 'storage' });

export interface StoreHandle {
  readonly store: KeyValueStore;
  readonly backend: StoreBackend;
}

/**
 * Redis when a URL is configured, otherwise an in-process MemoryStore.
 */
export function createStore(options: { redisUrl?: string }): StoreHandle {
  if (options.redisUrl) {
    logger.info('Using Redis storage');
    return { store: new RedisStore(options.redisUrl), backend: 'redis' };
  }

  logger.warn('REDIS_URL not set, using in-memory storage (results are lost on restart)');
  return { store: new MemoryStore(), backend: 'memory' };
}
