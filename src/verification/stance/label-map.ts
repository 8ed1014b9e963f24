// ═══════════════════════════════════════════════════════════════════════════════
// LABEL MAP — Backend Vocabulary → Canonical Stance Labels
// ═══════════════════════════════════════════════════════════════════════════════
//
// Backends speak different vocabularies:
//
//   NLI models            ENTAILMENT / CONTRADICTION / NEUTRAL (any case)
//   MNLI positional heads LABEL_0 = contradiction
//                         LABEL_1 = neutral
//                         LABEL_2 = entailment
//   Fact-check datasets   SUPPORTS / REFUTES / NOT ENOUGH INFO
//   Zero-shot prompts     true / false / unverified / unrelated
//
// Anything not listed maps to NEUTRAL.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { StanceLabel } from '../types.js';

const LABEL_TABLE: ReadonlyMap<string, StanceLabel> = new Map<string, StanceLabel>([
  // Canonical
  ['entailment', 'ENTAILMENT'],
  ['contradiction', 'CONTRADICTION'],
  ['neutral', 'NEUTRAL'],

  // MNLI positional codes
  ['label_0', 'CONTRADICTION'],
  ['label_1', 'NEUTRAL'],
  ['label_2', 'ENTAILMENT'],

  // Fact-check / zero-shot vocabulary
  ['supports', 'ENTAILMENT'],
  ['supported', 'ENTAILMENT'],
  ['true', 'ENTAILMENT'],
  ['refutes', 'CONTRADICTION'],
  ['refuted', 'CONTRADICTION'],
  ['contradicts', 'CONTRADICTION'],
  ['false', 'CONTRADICTION'],
  ['not enough info', 'NEUTRAL'],
  ['not_enough_info', 'NEUTRAL'],
  ['unrelated', 'NEUTRAL'],
  ['unverified', 'NEUTRAL'],
]);

/**
 * Map a raw backend label to a canonical stance. Case and surrounding
 * whitespace are ignored; unknown labels are NEUTRAL.
 */
export function mapLabel(raw: string): StanceLabel {
  return LABEL_TABLE.get(raw.trim().toLowerCase()) ?? 'NEUTRAL';
}
