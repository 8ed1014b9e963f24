// ═══════════════════════════════════════════════════════════════════════════════
// CLAIM EXTRACTOR — Pick Declarative Sentences out of Free Text
// ═══════════════════════════════════════════════════════════════════════════════

import type { ClaimExtractor } from '../verification/types.js';

const MIN_TEXT_LENGTH = 10;
const MIN_WORDS = 6;

const QUESTION_OPENERS = /^(How|What|When|Where|Why|Who)/;
const COMMAND_OPENERS = /^(Please|Let|Can you)/i;

/** Split after ., ! or ? followed by whitespace, and on line breaks. */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map(s => s.trim())
    .filter(Boolean);
}

export class HeuristicClaimExtractor implements ClaimExtractor {
  /**
   * Sentences that read as factual statements. Falls back to the whole
   * trimmed text when none qualify; text under 10 characters yields nothing.
   */
  extract(text: string): string[] {
    const trimmed = text.trim();
    if (trimmed.length < MIN_TEXT_LENGTH) return [];

    const claims = splitSentences(trimmed).filter(sentence =>
      sentence.split(/\s+/).length >= MIN_WORDS &&
      !sentence.endsWith('?') &&
      !QUESTION_OPENERS.test(sentence) &&
      !COMMAND_OPENERS.test(sentence)
    );

    return claims.length > 0 ? claims : [trimmed];
  }
}
