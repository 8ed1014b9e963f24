// ═══════════════════════════════════════════════════════════════════════════════
// VERDICT CACHE — Process-Wide, Bounded, Keyed by Raw Input Text
// ═══════════════════════════════════════════════════════════════════════════════
//
// Key: SHA-256 hex of the exact input (no trimming or case folding).
// Eviction: least recently used beyond maxEntries; optional TTL.
// Concurrent misses for the same key share one computation.
// Error verdicts are handed back but never stored.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { createHash } from 'node:crypto';

import { getLogger } from '../logging/index.js';
import type { Verdict } from './types.js';

const logger = getLogger({ component: 'verdict-cache' });

export interface VerdictCacheOptions {
  maxEntries?: number;
  /** 0 = entries never expire */
  ttlSeconds?: number;
  now?: () => number;
}

interface CacheEntry {
  readonly verdict: Verdict;
  readonly expiresAt: number | null;
}

export function hashText(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export class VerdictCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<Verdict>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: VerdictCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.ttlMs = (options.ttlSeconds ?? 0) * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Stored verdict for `text`, if present and fresh. A hit refreshes the
   * entry's LRU position.
   */
  get(text: string): Verdict | undefined {
    return this.lookup(hashText(text));
  }

  /**
   * Return the cached verdict, or run `compute` once (shared by concurrent
   * callers for the same text) and store its result.
   */
  getOrCompute(text: string, compute: () => Promise<Verdict>): Promise<Verdict> {
    const key = hashText(text);

    const cached = this.lookup(key);
    if (cached) {
      logger.debug('Cache hit', { key: key.slice(0, 12) });
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const computation = compute()
      .then((verdict) => {
        if (verdict.label !== 'Error') {
          this.store(key, verdict);
        }
        return verdict;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, computation);
    return computation;
  }

  clear(): void {
    this.entries.clear();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private lookup(key: string): Verdict | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    // Map iteration order is insertion order; re-insert to mark as most recent.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.verdict;
  }

  private store(key: string, verdict: Verdict): void {
    this.entries.delete(key);
    this.entries.set(key, {
      verdict,
      expiresAt: this.ttlMs > 0 ? this.now() + this.ttlMs : null,
    });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
