// ═══════════════════════════════════════════════════════════════════════════════
// CACHE STORE — Append-Only Classification History per Keyword
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each keyword owns a list at `<prefix>analysis:<keyword>`, newest first.
// `put` prepends a row and never rewrites one; `get` returns the newest row
// that has not expired.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from '../storage/types.js';
import type { CacheConfig } from '../config/schema.js';
import type { ClassificationResult } from '../analyzers/response-assembler.js';
import { getLogger } from '../logging/index.js';
import { fromCacheRow, parseRow, serializeRow, toCacheRow } from './layout.js';

const logger = getLogger({ component: 'cache' });

export interface CacheStore {
  /** Newest live entry, or null. Storage errors propagate. */
  get(keyword: string): Promise<ClassificationResult | null>;
  put(result: ClassificationResult): Promise<void>;
}

export class KeyValueCacheStore implements CacheStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly config: Pick<CacheConfig, 'ttlHours' | 'historyLimit' | 'keyPrefix'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  key(keyword: string): string {
    return `${this.config.keyPrefix}analysis:${keyword}`;
  }

  async get(keyword: string): Promise<ClassificationResult | null> {
    const rows = await this.store.lrange(this.key(keyword), 0, -1);
    const now = this.now().getTime();

    for (const text of rows) {
      const row = parseRow(text);
      if (!row.ok) {
        logger.warn('Skipping unreadable cache row', { keyword, reason: row.error });
        continue;
      }
      if (Date.parse(row.value.expires_at) <= now) {
        continue;
      }

      const result = fromCacheRow(row.value);
      if (!result.ok) {
        logger.warn('Skipping unreadable cache row', { keyword, reason: result.error });
        continue;
      }
      return result.value;
    }

    return null;
  }

  async put(result: ClassificationResult): Promise<void> {
    const key = this.key(result.keyword);
    await this.store.lpush(key, serializeRow(toCacheRow(result)));
    await this.store.ltrim(key, 0, this.config.historyLimit - 1);
    await this.store.expire(key, Math.ceil(this.config.ttlHours * 3600));
  }
}
