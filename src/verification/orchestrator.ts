// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION ORCHESTRATOR — Claim → Evidence → Stance → Verdict
// ═══════════════════════════════════════════════════════════════════════════════
//
//   START
//     → CLAIMS_EXTRACTED      (none → NO_CLAIM)
//     → KEYWORDS_EXTRACTED
//     → EVIDENCE_RETRIEVED    (none → NO_EVIDENCE)
//     → FILTERED              (none → NO_RELEVANT_EVIDENCE)
//     → RANKED
//     → CLASSIFIED
//     → AGGREGATED
//
// Any throw along the way becomes an Error verdict. verify() never rejects.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger, withTiming } from '../logging/index.js';
import { aggregateConsensus, DEFAULT_CONSENSUS_THRESHOLD } from './consensus.js';
import type { VerdictCache } from './cache.js';
import { formatExplanation } from './explanation.js';
import type { EvidenceRanker } from './ranker.js';
import type { RelevanceFilter } from './relevance.js';
import {
  clamp01,
  type ClaimExtractor,
  type EvidenceItem,
  type EvidenceRetriever,
  type KeywordExtractor,
  type StanceResult,
  type Verdict,
} from './types.js';

const logger = getLogger({ component: 'orchestrator' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type PipelineState =
  | 'START'
  | 'CLAIMS_EXTRACTED'
  | 'KEYWORDS_EXTRACTED'
  | 'EVIDENCE_RETRIEVED'
  | 'FILTERED'
  | 'RANKED'
  | 'CLASSIFIED'
  | 'AGGREGATED';

export interface StanceClassifierPort {
  classify(claim: string, evidence: EvidenceItem): Promise<StanceResult>;
}

export interface OrchestratorDependencies {
  claimExtractor: ClaimExtractor;
  keywordExtractor: KeywordExtractor;
  retriever: EvidenceRetriever;
  relevanceFilter: RelevanceFilter;
  ranker: EvidenceRanker;
  classifier: StanceClassifierPort;
  cache: VerdictCache;
}

export interface OrchestratorOptions {
  consensusThreshold?: number;
  noClaimConfidence?: number;
  noEvidenceConfidence?: number;
  noRelevantEvidenceConfidence?: number;
}

export const MESSAGES = {
  NO_CLAIM: 'No valid claims found. Please provide a clear factual statement.',
  NO_EVIDENCE: 'Not enough reliable evidence found.',
  NO_RELEVANT_EVIDENCE: 'No semantically relevant evidence found.',
  ERROR_PREFIX: 'An internal error occurred: ',
} as const;

// ─────────────────────────────────────────────────────────────────────────────────
// ORCHESTRATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class VerificationOrchestrator {
  private readonly deps: OrchestratorDependencies;
  private readonly options: Required<OrchestratorOptions>;

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions = {}) {
    this.deps = deps;
    this.options = {
      consensusThreshold: options.consensusThreshold ?? DEFAULT_CONSENSUS_THRESHOLD,
      noClaimConfidence: options.noClaimConfidence ?? 0.3,
      noEvidenceConfidence: options.noEvidenceConfidence ?? 0.3,
      noRelevantEvidenceConfidence: options.noRelevantEvidenceConfidence ?? 0.4,
    };
  }

  /**
   * Verify one piece of text. Identical text is answered from the cache.
   */
  async verify(text: string): Promise<Verdict> {
    try {
      return await this.deps.cache.getOrCompute(text, () => this.run(text));
    } catch (error) {
      return this.errorVerdict(error);
    }
  }

  private async run(text: string): Promise<Verdict> {
    try {
      return await this.pipeline(text);
    } catch (error) {
      logger.error('Verification failed', error);
      return this.errorVerdict(error);
    }
  }

  private async pipeline(text: string): Promise<Verdict> {
    const { claimExtractor, keywordExtractor, retriever, relevanceFilter, ranker, classifier } = this.deps;

    const [claim] = claimExtractor.extract(text);
    if (claim === undefined) {
      return this.earlyExit('NO_CLAIM', this.options.noClaimConfidence, MESSAGES.NO_CLAIM);
    }
    this.enter('CLAIMS_EXTRACTED', { claim });

    const keywords = keywordExtractor.extract(claim);
    this.enter('KEYWORDS_EXTRACTED', { keywords });

    const retrieved = await withTiming('Evidence retrieval', () => retriever.retrieve(keywords), logger);
    const evidence = retrieved.map(item => ({ ...item, credibilityScore: clamp01(item.credibilityScore) }));
    if (evidence.length === 0) {
      return this.earlyExit('NO_EVIDENCE', this.options.noEvidenceConfidence, MESSAGES.NO_EVIDENCE);
    }
    this.enter('EVIDENCE_RETRIEVED', { count: evidence.length });

    const relevant = await relevanceFilter.filter(claim, evidence);
    if (relevant.length === 0) {
      return this.earlyExit(
        'NO_RELEVANT_EVIDENCE',
        this.options.noRelevantEvidenceConfidence,
        MESSAGES.NO_RELEVANT_EVIDENCE
      );
    }
    this.enter('FILTERED', { count: relevant.length });

    const ranked = ranker.rank(relevant);
    this.enter('RANKED', { count: ranked.length });

    const stances = await Promise.all(ranked.map(item => classifier.classify(claim, item)));
    this.enter('CLASSIFIED', { labels: stances.map(s => s.label) });

    const consensus = aggregateConsensus(stances, this.options.consensusThreshold);
    this.enter('AGGREGATED', { label: consensus.label, confidence: consensus.confidence });

    return {
      label: consensus.label,
      confidence: clamp01(consensus.confidence),
      explanation: formatExplanation(stances, consensus.scores),
      outcome: 'AGGREGATED',
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private enter(state: PipelineState, context: Record<string, unknown>): void {
    logger.debug(`Pipeline → ${state}`, context);
  }

  private earlyExit(
    outcome: 'NO_CLAIM' | 'NO_EVIDENCE' | 'NO_RELEVANT_EVIDENCE',
    confidence: number,
    explanation: string
  ): Verdict {
    logger.info('Verification ended early', { outcome });
    return { label: 'Low Confidence', confidence: clamp01(confidence), explanation, outcome };
  }

  private errorVerdict(error: unknown): Verdict {
    const message = error instanceof Error ? error.message : String(error);
    return {
      label: 'Error',
      confidence: 0,
      explanation: `${MESSAGES.ERROR_PREFIX}${message}`,
      outcome: 'ERROR',
    };
  }
}
