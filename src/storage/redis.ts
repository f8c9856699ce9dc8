// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — KeyValueStore over ioredis
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';
import type { KeyValueStore } from './types.js';
import { getLogger } from '../logging/index.js';

const logger = getLogger({ component: 'redis-store' });

export class RedisStore implements KeyValueStore {
  private readonly redis: Redis;

  constructor(redisOrUrl: Redis | string) {
    this.redis = typeof redisOrUrl === 'string'
      ? new Redis(redisOrUrl, { maxRetriesPerRequest: 1, lazyConnect: false })
      : redisOrUrl;

    this.redis.on('error', (error: Error) => {
      logger.error('Redis connection error', error);
    });
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return (await this.redis.expire(key, ttlSeconds)) === 1;
  }

  async lpush(key: string, ...values: string[]): Promise<number> {
    return this.redis.lpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.redis.lrange(key, start, stop);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    await this.redis.ltrim(key, start, stop);
  }

  async ping(): Promise<string> {
    return this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
