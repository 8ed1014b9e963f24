// ═══════════════════════════════════════════════════════════════════════════════
// EVIDENCE RANKER — Credibility × Relevance Ordering
// ═══════════════════════════════════════════════════════════════════════════════

import type { EvidenceItem } from './types.js';

export interface RankerOptions {
  credibilityWeight?: number;
  similarityWeight?: number;
  topK?: number;
}

export const DEFAULT_RANKER_OPTIONS: Required<RankerOptions> = {
  credibilityWeight: 0.6,
  similarityWeight: 0.4,
  topK: 4,
};

const WEIGHT_TOLERANCE = 1e-9;

export class EvidenceRanker {
  private readonly credibilityWeight: number;
  private readonly similarityWeight: number;
  private readonly topK: number;

  constructor(options: RankerOptions = {}) {
    const merged = { ...DEFAULT_RANKER_OPTIONS, ...options };

    if (merged.credibilityWeight <= 0 || merged.similarityWeight <= 0) {
      throw new RangeError('Ranker weights must be positive');
    }
    if (Math.abs(merged.credibilityWeight + merged.similarityWeight - 1) > WEIGHT_TOLERANCE) {
      throw new RangeError(
        `Ranker weights must sum to 1 (got ${merged.credibilityWeight} + ${merged.similarityWeight})`
      );
    }
    if (!Number.isInteger(merged.topK) || merged.topK < 1) {
      throw new RangeError(`topK must be a positive integer (got ${merged.topK})`);
    }

    this.credibilityWeight = merged.credibilityWeight;
    this.similarityWeight = merged.similarityWeight;
    this.topK = merged.topK;
  }

  combinedScore(item: EvidenceItem): number {
    return item.credibilityScore * this.credibilityWeight + (item.similarityScore ?? 0) * this.similarityWeight;
  }

  /**
   * Attach `combinedScore`, sort descending (stable for equal scores) and
   * keep the best `topK`.
   */
  rank(items: readonly EvidenceItem[]): EvidenceItem[] {
    return items
      .map((item): EvidenceItem => ({ ...item, combinedScore: this.combinedScore(item) }))
      .sort((a, b) => (b.combinedScore ?? 0) - (a.combinedScore ?? 0))
      .slice(0, this.topK);
  }
}
