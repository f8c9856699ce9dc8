// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Key-Value Store Interface
// ═══════════════════════════════════════════════════════════════════════════════

export interface KeyValueStore {
  // List operations
  lpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  ltrim(key: string, start: number, stop: number): Promise<void>;

  // Key operations
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  // Utility
  ping(): Promise<string>;
  close(): Promise<void>;
}

export type StoreBackend = 'memory' | 'redis';
