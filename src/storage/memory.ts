// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Process KeyValueStore (default and tests)
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

export class MemoryStore implements KeyValueStore {
  private lists: Map<string, string[]> = new Map();

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async lpush(key: string, ...values: string[]): Promise<number> {
    const list = this.lists.get(key) ?? [];
    // Redis pushes each value to the head in turn
    for (const value of values) {
      list.unshift(value);
    }
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key);
    if (!list) return [];
    const [from, to] = resolveRange(list.length, start, stop);
    return from > to ? [] : list.slice(from, to + 1);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    const list = this.lists.get(key);
    if (!list) return;
    const [from, to] = resolveRange(list.length, start, stop);
    if (from > to) {
      this.lists.delete(key);
    } else {
      this.lists.set(key, list.slice(from, to + 1));
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UTILITY
  // ═══════════════════════════════════════════════════════════════════════════════

  async ping(): Promise<string> {
    return 'PONG';
  }

  async disconnect(): Promise<void> {
    this.lists.clear();
  }
}

/** Clamp Redis-style inclusive indices to [0, len - 1]. */
function resolveRange(len: number, start: number, stop: number): [number, number] {
  const from = start < 0 ? Math.max(0, len + start) : start;
  const to = Math.min(len - 1, stop < 0 ? len + stop : stop);
  return [from, to];
}
