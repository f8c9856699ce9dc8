// ═══════════════════════════════════════════════════════════════════════════════
// CACHE MODULE
// ═══════════════════════════════════════════════════════════════════════════════

export { KeyValueCacheStore, type CacheStore } from './store.js';
export { CacheRowSchema, fromCacheRow, parseRow, serializeRow, toCacheRow, type CacheRow } from './layout.js';
