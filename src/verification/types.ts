// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION TYPES — Evidence, Stance, Verdict
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// EVIDENCE
// ─────────────────────────────────────────────────────────────────────────────────

export const SOURCE_TYPES = [
  'wikipedia',
  'government',
  'academic',
  'news_trusted',
  'web',
  'other',
] as const;

export type SourceType = typeof SOURCE_TYPES[number];

/**
 * One retrieved piece of text plus provenance.
 * `similarityScore` is set by the relevance filter, `combinedScore` by the ranker.
 */
export interface EvidenceItem {
  readonly content: string;
  readonly source: string;
  readonly url?: string;
  readonly credibilityScore: number;
  readonly sourceType: SourceType;
  readonly similarityScore?: number;
  readonly combinedScore?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STANCE
// ─────────────────────────────────────────────────────────────────────────────────

export type StanceLabel = 'ENTAILMENT' | 'CONTRADICTION' | 'NEUTRAL';

export interface StanceResult {
  readonly label: StanceLabel;
  readonly confidence: number;
  readonly sourceEvidence: EvidenceItem;
  /** Label voted by each backend that answered, keyed by backend name */
  readonly modelVotes: Readonly<Record<string, StanceLabel>>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// VERDICT
// ─────────────────────────────────────────────────────────────────────────────────

export type VerdictLabel = 'True' | 'False' | 'Low Confidence' | 'Error';

export type VerificationOutcome =
  | 'AGGREGATED'
  | 'NO_CLAIM'
  | 'NO_EVIDENCE'
  | 'NO_RELEVANT_EVIDENCE'
  | 'ERROR';

export interface Verdict {
  readonly label: VerdictLabel;
  readonly confidence: number;
  readonly explanation: string;
  readonly outcome: VerificationOutcome;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLABORATOR CONTRACTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ClaimExtractor {
  extract(text: string): string[];
}

export interface KeywordExtractor {
  extract(claim: string): string[];
}

export interface EvidenceRetriever {
  retrieve(keywords: string[]): Promise<EvidenceItem[]>;
}

export interface SimilarityScorer {
  similarity(a: string, b: string): number | Promise<number>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/** Clamp to [0,1]; non-finite input becomes 0. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
