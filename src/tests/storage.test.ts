// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TESTS — Memory Store and Verification History
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';

import { HistoryStore } from '../history/index.js';
import { MemoryStore } from '../storage/index.js';
import type { Verdict } from '../verification/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MEMORY STORE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should answer pings', async () => {
    expect(await store.ping()).toBe('PONG');
  });

  it('should drop every list on disconnect', async () => {
    await store.lpush('list', 'a');
    await store.disconnect();
    expect(await store.lrange('list', 0, -1)).toEqual([]);
  });

  describe('List Operations', () => {
    it('should push each value to the head in turn', async () => {
      expect(await store.lpush('list', 'a', 'b')).toBe(2);
      expect(await store.lpush('list', 'c')).toBe(3);
      expect(await store.lrange('list', 0, -1)).toEqual(['c', 'b', 'a']);
    });

    it('should clamp ranges like Redis', async () => {
      await store.lpush('list', 'a', 'b', 'c');
      expect(await store.lrange('list', 0, 10)).toEqual(['c', 'b', 'a']);
      expect(await store.lrange('list', -2, -1)).toEqual(['b', 'a']);
      expect(await store.lrange('list', 5, 10)).toEqual([]);
      expect(await store.lrange('missing', 0, -1)).toEqual([]);
    });

    it('should trim lists and drop emptied ones', async () => {
      await store.lpush('list', 'a', 'b', 'c', 'd');
      await store.ltrim('list', 0, 1);
      expect(await store.lrange('list', 0, -1)).toEqual(['d', 'c']);

      await store.ltrim('list', 5, 10);
      expect(await store.lrange('list', 0, -1)).toEqual([]);
      expect(await store.lpush('list', 'e')).toBe(1);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// HISTORY TESTS
// ─────────────────────────────────────────────────────────────────────────────────

function verdict(label: Verdict['label'], confidence: number): Verdict {
  return { label, confidence, explanation: 'details', outcome: 'AGGREGATED' };
}

describe('HistoryStore', () => {
  const fixedDate = new Date('2024-05-01T12:00:00.000Z');
  let store: MemoryStore;
  let history: HistoryStore;

  beforeEach(() => {
    store = new MemoryStore();
    history = new HistoryStore(store, 3, () => fixedDate);
  });

  it('should record a verdict with an id and date', async () => {
    const entry = await history.record('Water boils at 100 degrees.', verdict('True', 0.912));

    expect(entry.claim).toBe('Water boils at 100 degrees.');
    expect(entry.label).toBe('True');
    expect(entry.confidence).toBe(0.912);
    expect(entry.date).toBe('2024-05-01T12:00:00.000Z');
    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should list newest first', async () => {
    await history.record('first claim', verdict('True', 0.9));
    await history.record('second claim', verdict('False', 0.8));

    const records = await history.recent();
    expect(records.map(r => r.claim)).toEqual(['second claim', 'first claim']);
  });

  it('should keep only the retention limit', async () => {
    for (const claim of ['one', 'two', 'three', 'four', 'five']) {
      await history.record(claim, verdict('Low Confidence', 0.3));
    }

    expect(await store.lrange('history:verifications', 0, -1)).toHaveLength(3);
    expect((await history.recent(10)).map(r => r.claim)).toEqual(['five', 'four', 'three']);
  });

  it('should honour smaller counts', async () => {
    await history.record('one', verdict('True', 0.7));
    await history.record('two', verdict('True', 0.7));

    expect((await history.recent(1)).map(r => r.claim)).toEqual(['two']);
    expect(await history.recent(0)).toEqual([]);
  });

  it('should skip malformed entries', async () => {
    await history.record('valid', verdict('True', 0.7));
    await store.lpush('history:verifications', '{not json', JSON.stringify({ claim: 'missing fields' }));

    const records = await history.recent();
    expect(records.map(r => r.claim)).toEqual(['valid']);
  });
});
