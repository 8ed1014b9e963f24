// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATORS — Claim, Keyword, Similarity and Evidence Providers
// ═══════════════════════════════════════════════════════════════════════════════

export { HeuristicClaimExtractor, splitSentences } from './claims.js';
export { FrequencyKeywordExtractor, extractEntities } from './keywords.js';
export {
  LexicalSimilarityScorer,
  EmbeddingSimilarityScorer,
  cosineSimilarity,
  FALLBACK_SIMILARITY,
  type Embedder,
} from './similarity.js';
export { Tokenizer, defaultTokenizer, getStopWords } from './text.js';
export { WikipediaRetriever, type WikipediaRetrieverOptions } from './retrieval/wikipedia.js';
export { CompositeRetriever } from './retrieval/composite.js';
export { WebSearchRetriever, BRAVE_SEARCH_URL, type WebSearchRetrieverOptions } from './retrieval/web-search.js';
