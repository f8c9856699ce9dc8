// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Process KeyValueStore for Tests and Local Runs
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

interface Expiring<T> {
  value: T;
  expiresAt?: number;
}

export class MemoryStore implements KeyValueStore {
  private lists: Map<string, Expiring<string[]>> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  private live<T>(map: Map<string, Expiring<T>>, key: string): Expiring<T> | undefined {
    const entry = map.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== undefined && this.now() >= entry.expiresAt) {
      map.delete(key);
      return undefined;
    }

    return entry;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async lpush(key: string, ...values: string[]): Promise<number> {
    let entry = this.live(this.lists, key);
    if (!entry) {
      entry = { value: [] };
      this.lists.set(key, entry);
    }
    // Redis pushes one at a time, so the last argument ends up at the head
    for (const value of values) {
      entry.value.unshift(value);
    }
    return entry.value.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.live(this.lists, key)?.value;
    if (!list) return [];

    const [startIdx, stopIdx] = resolveRange(list.length, start, stop);
    if (startIdx > stopIdx || startIdx >= list.length) return [];

    return list.slice(startIdx, stopIdx + 1);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    const entry = this.live(this.lists, key);
    if (!entry) return;

    const [startIdx, stopIdx] = resolveRange(entry.value.length, start, stop);
    entry.value = entry.value.slice(startIdx, stopIdx + 1);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // KEY OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(this.lists, key);
    if (!entry) return false;
    entry.expiresAt = this.now() + ttlSeconds * 1000;
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UTILITY
  // ═══════════════════════════════════════════════════════════════════════════════

  async ping(): Promise<string> {
    return 'PONG';
  }

  async close(): Promise<void> {
    this.lists.clear();
  }
}

// Negative indices count from the end, like Redis
function resolveRange(length: number, start: number, stop: number): [number, number] {
  const startIdx = start < 0 ? Math.max(0, length + start) : start;
  const stopIdx = stop < 0 ? length + stop : Math.min(stop, length - 1);
  return [startIdx, stopIdx];
}
