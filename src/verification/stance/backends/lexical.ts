// ═══════════════════════════════════════════════════════════════════════════════
// LEXICAL BACKEND — Keyword Overlap + Negation Heuristic
// ═══════════════════════════════════════════════════════════════════════════════
//
// Deterministic, offline. Measures how many claim terms the evidence mentions
// and whether a negation sits next to them. Answers in fact-check vocabulary
// (supports / refutes / not enough info).
//
// ═══════════════════════════════════════════════════════════════════════════════

import { defaultTokenizer, type Tokenizer } from '../../../collaborators/text.js';
import type { BackendAnswer, StanceBackend } from '../types.js';

const NEGATION = /\b(not|no|never|neither|nor|false|fake|myth|hoax|debunked|denies|denied|isn't|aren't|wasn't|weren't|doesn't|don't|didn't|cannot|can't)\b/;

/** Characters either side of a keyword searched for a negation */
const NEGATION_WINDOW = 20;

export interface LexicalBackendOptions {
  /** Minimum share of claim terms the evidence must contain to take a side */
  minOverlap?: number;
  tokenizer?: Tokenizer;
}

export class LexicalStanceBackend implements StanceBackend {
  readonly name = 'lexical';

  private readonly minOverlap: number;
  private readonly tokenizer: Tokenizer;

  constructor(options: LexicalBackendOptions = {}) {
    this.minOverlap = options.minOverlap ?? 0.3;
    this.tokenizer = options.tokenizer ?? defaultTokenizer;
  }

  async classify(premise: string, hypothesis: string): Promise<BackendAnswer> {
    const keywords = this.tokenizer.tokenizeUnique(hypothesis);
    const overlap = matchScore(premise, keywords, this.tokenizer);

    if (overlap < this.minOverlap) {
      return { label: 'not enough info', score: 0.6 };
    }

    const claimNegated = NEGATION.test(hypothesis.toLowerCase());
    const evidenceNegated = negatedNear(premise, keywords);
    const label = claimNegated === evidenceNegated ? 'supports' : 'refutes';

    return { label, score: 0.5 + 0.4 * overlap };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/** Share of keywords found among the text's tokens (whole words only). */
export function matchScore(
  text: string,
  keywords: readonly string[],
  tokenizer: Tokenizer = defaultTokenizer
): number {
  if (!text || keywords.length === 0) return 0;
  const terms = new Set(tokenizer.tokenize(text));
  const hits = keywords.filter(k => terms.has(k.toLowerCase())).length;
  return hits / keywords.length;
}

/** True when a negation appears within the window around any keyword occurrence. */
export function negatedNear(text: string, keywords: readonly string[]): boolean {
  const normalized = text.toLowerCase();
  for (const keyword of keywords) {
    const lowered = keyword.toLowerCase();
    let index = normalized.indexOf(lowered);
    while (index !== -1) {
      const window = normalized.slice(
        Math.max(0, index - NEGATION_WINDOW),
        index + lowered.length + NEGATION_WINDOW
      );
      if (NEGATION.test(window)) return true;
      index = normalized.indexOf(lowered, index + lowered.length);
    }
  }
  return false;
}
