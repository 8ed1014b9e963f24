// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION HISTORY — Most Recent Verdicts, Newest First
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { getLogger } from '../logging/index.js';
import type { KeyValueStore } from '../storage/index.js';
import { tryCatch } from '../types/result.js';
import type { Verdict } from '../verification/types.js';

const logger = getLogger({ component: 'history' });

const HISTORY_KEY = 'history:verifications';

export const HistoryRecordSchema = z.object({
  id: z.string(),
  claim: z.string(),
  label: z.enum(['True', 'False', 'Low Confidence', 'Error']),
  confidence: z.number(),
  date: z.string(),
});

export type HistoryRecord = z.infer<typeof HistoryRecordSchema>;

export class HistoryStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly limit: number = 50,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Append a verdict, dropping anything beyond the retention limit. */
  async record(claim: string, verdict: Verdict): Promise<HistoryRecord> {
    const entry: HistoryRecord = {
      id: uuidv4(),
      claim,
      label: verdict.label,
      confidence: verdict.confidence,
      date: this.now().toISOString(),
    };

    await this.store.lpush(HISTORY_KEY, JSON.stringify(entry));
    await this.store.ltrim(HISTORY_KEY, 0, this.limit - 1);
    return entry;
  }

  /** Up to `count` records (capped at the retention limit), newest first. */
  async recent(count: number = this.limit): Promise<HistoryRecord[]> {
    const n = Math.max(0, Math.min(count, this.limit));
    if (n === 0) return [];

    const raw = await this.store.lrange(HISTORY_KEY, 0, n - 1);
    const records: HistoryRecord[] = [];
    for (const line of raw) {
      const parsed = parseRecord(line);
      if (parsed) {
        records.push(parsed);
      } else {
        logger.warn('Skipping malformed history entry');
      }
    }
    return records;
  }
}

function parseRecord(line: string): HistoryRecord | null {
  const json = tryCatch((): unknown => JSON.parse(line));
  if (!json.ok) return null;
  const result = HistoryRecordSchema.safeParse(json.value);
  return result.success ? result.data : null;
}
