// ═══════════════════════════════════════════════════════════════════════════════
// SIMILARITY SCORERS — Lexical Overlap and Embedding Cosine
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';

import { getLogger } from '../logging/index.js';
import type { SimilarityScorer } from '../verification/types.js';
import { defaultTokenizer, type Tokenizer } from './text.js';

const logger = getLogger({ component: 'similarity' });

/** Returned when embeddings cannot be computed */
export const FALLBACK_SIMILARITY = 0.5;

// ─────────────────────────────────────────────────────────────────────────────────
// LEXICAL
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Share of the first text's content words that also occur in the second.
 * Offline and deterministic.
 */
export class LexicalSimilarityScorer implements SimilarityScorer {
  constructor(private readonly tokenizer: Tokenizer = defaultTokenizer) {}

  similarity(claim: string, evidence: string): number {
    const claimTerms = this.tokenizer.tokenizeUnique(claim);
    if (claimTerms.length === 0) return 0;

    const evidenceTerms = new Set(this.tokenizer.tokenize(evidence));
    const shared = claimTerms.filter(term => evidenceTerms.has(term)).length;
    return shared / claimTerms.length;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// EMBEDDINGS
// ─────────────────────────────────────────────────────────────────────────────────

export type Embedder = (texts: string[], signal?: AbortSignal) => Promise<number[][]>;

export interface EmbeddingScorerOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  /** Replaces the OpenAI client, e.g. in tests */
  embed?: Embedder;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Cosine similarity of OpenAI embeddings. Without a client, or when the
 * request fails, every pair scores 0.5.
 */
export class EmbeddingSimilarityScorer implements SimilarityScorer {
  private readonly embed: Embedder | null;
  private readonly timeoutMs: number;

  constructor(options: EmbeddingScorerOptions = {}) {
    this.embed = options.embed ?? createEmbedder(options.apiKey, options.model ?? 'text-embedding-3-small');
    this.timeoutMs = options.timeoutMs ?? 8000;
  }

  async similarity(a: string, b: string): Promise<number> {
    if (!this.embed) {
      return FALLBACK_SIMILARITY;
    }

    try {
      const [first, second] = await this.embed([a, b], AbortSignal.timeout(this.timeoutMs));
      if (!first || !second) return FALLBACK_SIMILARITY;
      return Math.max(0, Math.min(1, cosineSimilarity(first, second)));
    } catch (error) {
      logger.warn('Embedding request failed; using fallback similarity', {
        error: error instanceof Error ? error.message : String(error),
      });
      return FALLBACK_SIMILARITY;
    }
  }
}

function createEmbedder(apiKey: string | undefined, model: string): Embedder | null {
  if (!apiKey) return null;
  const client = new OpenAI({ apiKey });

  return async (texts, signal) => {
    const response = await client.embeddings.create({ model, input: texts }, { signal });
    return response.data.map(item => item.embedding);
  };
}
