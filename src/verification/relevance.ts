// ═══════════════════════════════════════════════════════════════════════════════
// RELEVANCE FILTER — Drop Evidence Unrelated to the Claim
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import { clamp01, type EvidenceItem, type SimilarityScorer } from './types.js';

const logger = getLogger({ component: 'relevance' });

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;

export interface RelevanceFilterOptions {
  /** Items must score strictly above this */
  threshold?: number;
}

export class RelevanceFilter {
  private readonly threshold: number;

  constructor(
    private readonly scorer: SimilarityScorer,
    options: RelevanceFilterOptions = {}
  ) {
    this.threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  }

  /**
   * Returns copies of the items whose similarity to the claim exceeds the
   * threshold, in input order, each carrying its `similarityScore`.
   */
  async filter(claim: string, items: readonly EvidenceItem[]): Promise<EvidenceItem[]> {
    const scored = await Promise.all(
      items.map(async (item): Promise<EvidenceItem> => ({
        ...item,
        similarityScore: await this.score(claim, item),
      }))
    );

    const kept = scored.filter(item => (item.similarityScore ?? 0) > this.threshold);

    logger.debug('Relevance filter applied', {
      total: items.length,
      kept: kept.length,
      threshold: this.threshold,
    });

    return kept;
  }

  private async score(claim: string, item: EvidenceItem): Promise<number> {
    try {
      const raw = await this.scorer.similarity(claim, item.content);
      if (!Number.isFinite(raw)) {
        logger.warn('Similarity scorer returned a non-finite value', { source: item.source, value: String(raw) });
        return 0;
      }
      return clamp01(raw);
    } catch (error) {
      logger.warn('Similarity scorer failed', {
        source: item.source,
        error: error instanceof Error ? error.message : String(error),
      });
      return 0;
    }
  }
}
