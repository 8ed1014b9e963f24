// ═══════════════════════════════════════════════════════════════════════════════
// TEXT UTILITIES — Tokenizer and Stop Words
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// STOP WORDS
// ─────────────────────────────────────────────────────────────────────────────────

const StopWordsFileSchema = z.object({
  words: z.array(z.string().min(1)),
});

let stopWords: ReadonlySet<string> | null = null;

/**
 * English stop words from data/stop-words.json, read once.
 * Negations are deliberately absent from the list.
 */
export function getStopWords(): ReadonlySet<string> {
  if (!stopWords) {
    const raw = readFileSync(new URL('../../data/stop-words.json', import.meta.url), 'utf8');
    const parsed = StopWordsFileSchema.parse(JSON.parse(raw));
    stopWords = new Set(parsed.words.map(w => w.toLowerCase()));
  }
  return stopWords;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TOKENIZER
// ─────────────────────────────────────────────────────────────────────────────────

export interface TokenizerOptions {
  lowercase?: boolean;
  removeStopWords?: boolean;
  minLength?: number;
}

const DEFAULT_TOKENIZER_OPTIONS: Required<TokenizerOptions> = {
  lowercase: true,
  removeStopWords: true,
  minLength: 3,
};

export class Tokenizer {
  private readonly options: Required<TokenizerOptions>;

  constructor(options: TokenizerOptions = {}) {
    this.options = { ...DEFAULT_TOKENIZER_OPTIONS, ...options };
  }

  tokenize(text: string): string[] {
    if (!text) return [];

    let tokens = text.split(/[^a-zA-Z0-9]+/).filter(Boolean);

    if (this.options.lowercase) {
      tokens = tokens.map(t => t.toLowerCase());
    }
    if (this.options.removeStopWords) {
      const stop = getStopWords();
      tokens = tokens.filter(t => !stop.has(t.toLowerCase()));
    }
    return tokens.filter(t => t.length >= this.options.minLength);
  }

  tokenizeUnique(text: string): string[] {
    return [...new Set(this.tokenize(text))];
  }
}

export const defaultTokenizer = new Tokenizer();
