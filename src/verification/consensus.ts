// ═══════════════════════════════════════════════════════════════════════════════
// CONSENSUS AGGREGATOR — Credibility-Weighted Stance Vote
// ═══════════════════════════════════════════════════════════════════════════════

import type { StanceLabel, StanceResult, VerdictLabel } from './types.js';

export const DEFAULT_CONSENSUS_THRESHOLD = 0.6;

export type ConsensusScores = Readonly<Record<StanceLabel, number>>;

export interface ConsensusResult {
  readonly label: Exclude<VerdictLabel, 'Error'>;
  readonly confidence: number;
  /** Normalized per-label weight shares; all zero when no weight was cast */
  readonly scores: ConsensusScores;
  readonly winner: StanceLabel;
}

/** Order in which equal scores are resolved */
const TIE_ORDER: readonly StanceLabel[] = ['ENTAILMENT', 'CONTRADICTION', 'NEUTRAL'];

/**
 * Each stance votes with weight credibility × confidence. The winning label
 * decides: ENTAILMENT at or above `threshold` is True, CONTRADICTION at or
 * above it is False. Anything else, including a NEUTRAL win, is Low
 * Confidence carrying the winner's share.
 */
export function aggregateConsensus(
  results: readonly StanceResult[],
  threshold: number = DEFAULT_CONSENSUS_THRESHOLD
): ConsensusResult {
  const raw: Record<StanceLabel, number> = { ENTAILMENT: 0, CONTRADICTION: 0, NEUTRAL: 0 };

  for (const result of results) {
    raw[result.label] += result.sourceEvidence.credibilityScore * result.confidence;
  }

  const total = raw.ENTAILMENT + raw.CONTRADICTION + raw.NEUTRAL;
  const scores: ConsensusScores = total > 0
    ? {
        ENTAILMENT: raw.ENTAILMENT / total,
        CONTRADICTION: raw.CONTRADICTION / total,
        NEUTRAL: raw.NEUTRAL / total,
      }
    : { ENTAILMENT: 0, CONTRADICTION: 0, NEUTRAL: 0 };

  let winner: StanceLabel = 'ENTAILMENT';
  for (const label of TIE_ORDER) {
    if (scores[label] > scores[winner]) winner = label;
  }

  if (total > 0 && winner === 'ENTAILMENT' && scores.ENTAILMENT >= threshold) {
    return { label: 'True', confidence: scores.ENTAILMENT, scores, winner };
  }
  if (total > 0 && winner === 'CONTRADICTION' && scores.CONTRADICTION >= threshold) {
    return { label: 'False', confidence: scores.CONTRADICTION, scores, winner };
  }
  return { label: 'Low Confidence', confidence: scores[winner], scores, winner };
}
