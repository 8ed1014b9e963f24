// ═══════════════════════════════════════════════════════════════════════════════
// ENSEMBLE — Combine Backend Votes into One Stance
// ═══════════════════════════════════════════════════════════════════════════════

import { clamp01, type StanceLabel } from '../types.js';

export interface Vote {
  readonly backend: string;
  readonly label: StanceLabel;
  readonly score: number;
  readonly weight: number;
}

export interface EnsembleResult {
  readonly label: StanceLabel;
  readonly confidence: number;
}

/** Order in which equal masses are resolved */
const TIE_ORDER: readonly StanceLabel[] = ['NEUTRAL', 'ENTAILMENT', 'CONTRADICTION'];

const NO_VOTES: EnsembleResult = { label: 'NEUTRAL', confidence: 0.5 };

/**
 * Weighted soft vote. A vote for L with score s and normalized weight w puts
 * w·s on L and w·(1−s)/2 on each other label. A single vote is returned as is.
 */
export function combineVotes(votes: readonly Vote[]): EnsembleResult {
  const usable = votes.filter(v => v.weight > 0 && Number.isFinite(v.weight));
  const [only] = usable;
  if (!only) return NO_VOTES;
  if (usable.length === 1) {
    return { label: only.label, confidence: clamp01(only.score) };
  }

  const totalWeight = usable.reduce((sum, v) => sum + v.weight, 0);
  const mass: Record<StanceLabel, number> = { ENTAILMENT: 0, CONTRADICTION: 0, NEUTRAL: 0 };

  for (const vote of usable) {
    const w = vote.weight / totalWeight;
    const s = clamp01(vote.score);
    for (const label of TIE_ORDER) {
      mass[label] += label === vote.label ? w * s : (w * (1 - s)) / 2;
    }
  }

  let winner: StanceLabel = 'NEUTRAL';
  for (const label of TIE_ORDER) {
    if (mass[label] > mass[winner]) winner = label;
  }

  const total = mass.ENTAILMENT + mass.CONTRADICTION + mass.NEUTRAL;
  return { label: winner, confidence: total > 0 ? clamp01(mass[winner] / total) : 0.5 };
}
