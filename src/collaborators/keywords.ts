// ═══════════════════════════════════════════════════════════════════════════════
// KEYWORD EXTRACTOR — Entities, Years and Content Words
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeywordExtractor } from '../verification/types.js';
import { defaultTokenizer, getStopWords, type Tokenizer } from './text.js';

const MAX_KEYWORDS = 10;
const MAX_PHRASE_WORDS = 3;

const CAPITALIZED_RUN = /\b[A-Z][a-zA-Z0-9'-]*(?:\s+[A-Z][a-zA-Z0-9'-]*)*/g;
const YEAR = /\b(1[0-9]{3}|20[0-9]{2})\b/g;

/**
 * Runs of capitalized words (leading stop words such as "The" dropped),
 * at most three words long, followed by four-digit years.
 */
export function extractEntities(text: string): string[] {
  const stop = getStopWords();
  const entities: string[] = [];

  for (const match of text.matchAll(CAPITALIZED_RUN)) {
    const words = match[0].split(/\s+/);
    while (words.length > 0 && stop.has((words[0] ?? '').toLowerCase())) {
      words.shift();
    }
    if (words.length > 0 && words.length <= MAX_PHRASE_WORDS) {
      entities.push(words.join(' '));
    }
  }

  for (const match of text.matchAll(YEAR)) {
    entities.push(match[0]);
  }

  return entities;
}

export class FrequencyKeywordExtractor implements KeywordExtractor {
  constructor(private readonly tokenizer: Tokenizer = defaultTokenizer) {}

  /**
   * Up to ten keywords, most frequent first. Case-insensitive duplicates
   * are merged under their first spelling; equal counts keep first-seen order.
   */
  extract(claim: string): string[] {
    const candidates = [...extractEntities(claim), ...this.tokenizer.tokenize(claim)];

    const counts = new Map<string, { display: string; count: number }>();
    for (const candidate of candidates) {
      const key = candidate.toLowerCase();
      const existing = counts.get(key);
      if (existing) {
        existing.count++;
      } else {
        counts.set(key, { display: candidate, count: 1 });
      }
    }

    return [...counts.values()]
      .sort((a, b) => b.count - a.count)
      .slice(0, MAX_KEYWORDS)
      .map(entry => entry.display);
  }
}
