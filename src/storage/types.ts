// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Key-Value Store Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The subset of Redis semantics the service relies on. Indices for list
 * operations follow Redis (inclusive stop, negative counts from the end).
 */
export interface KeyValueStore {
  // List operations
  lpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  ltrim(key: string, start: number, stop: number): Promise<void>;

  // Utility
  ping(): Promise<string>;
  disconnect(): Promise<void>;
}
