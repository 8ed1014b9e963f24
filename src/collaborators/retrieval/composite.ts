// ═══════════════════════════════════════════════════════════════════════════════
// COMPOSITE RETRIEVER — Fan Out, Isolate Failures, Rank by Credibility
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';
import type { EvidenceItem, EvidenceRetriever } from '../../verification/types.js';

const logger = getLogger({ component: 'retrieval' });

export interface CompositeRetrieverOptions {
  maxEvidence?: number;
}

export class CompositeRetriever implements EvidenceRetriever {
  private readonly maxEvidence: number;

  constructor(
    private readonly retrievers: readonly EvidenceRetriever[],
    options: CompositeRetrieverOptions = {}
  ) {
    this.maxEvidence = options.maxEvidence ?? 10;
  }

  /**
   * Union of every retriever's items, most credible first (stable), capped.
   * A retriever that throws contributes nothing.
   */
  async retrieve(keywords: string[]): Promise<EvidenceItem[]> {
    const outcomes = await Promise.allSettled(this.retrievers.map(r => r.retrieve(keywords)));

    const items: EvidenceItem[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        items.push(...outcome.value);
      } else {
        logger.warn('Evidence retriever failed', {
          retriever: index,
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        });
      }
    });

    return items
      .sort((a, b) => b.credibilityScore - a.credibilityScore)
      .slice(0, this.maxEvidence);
  }
}
