// ═══════════════════════════════════════════════════════════════════════════════
// EXPLANATION — Human-Readable Evidence Summary
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConsensusScores } from './consensus.js';
import type { StanceResult } from './types.js';

export const EXCERPT_LENGTH = 300;

function percent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

function excerpt(content: string): string {
  return content.length > EXCERPT_LENGTH ? `${content.slice(0, EXCERPT_LENGTH)}...` : content;
}

function formatSource(result: StanceResult, index: number): string {
  const evidence = result.sourceEvidence;
  return [
    `**Source ${index + 1}: ${evidence.source}**`,
    `Verdict: ${result.label} (Confidence: ${percent(result.confidence)})`,
    `Credibility Score: ${evidence.credibilityScore.toFixed(2)}`,
    `Excerpt: ${excerpt(evidence.content)}`,
    `URL: ${evidence.url ?? 'n/a'}`,
  ].join('\n');
}

/**
 * Markdown summary of every classified source, headed by the source count
 * and the consensus breakdown.
 *
 * @example
 * **Analyzed 1 sources:**
 * Consensus: ENTAILMENT 100.00% | CONTRADICTION 0.00% | NEUTRAL 0.00%
 *
 * **Source 1: Wikipedia - Water**
 * Verdict: ENTAILMENT (Confidence: 90.00%)
 * ...
 */
export function formatExplanation(results: readonly StanceResult[], scores: ConsensusScores): string {
  const header = [
    `**Analyzed ${results.length} sources:**`,
    `Consensus: ENTAILMENT ${percent(scores.ENTAILMENT)} | CONTRADICTION ${percent(scores.CONTRADICTION)} | NEUTRAL ${percent(scores.NEUTRAL)}`,
  ].join('\n');

  return [header, ...results.map(formatSource)].join('\n\n');
}
