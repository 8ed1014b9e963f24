// ═══════════════════════════════════════════════════════════════════════════════
// WEB SEARCH RETRIEVER — Brave Search API Result Snippets
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { getLogger } from '../../logging/index.js';
import { inferSourceType, scoreCredibility } from '../../verification/credibility.js';
import type { EvidenceItem, EvidenceRetriever } from '../../verification/types.js';

const logger = getLogger({ component: 'web-search' });

export const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search';

const SearchResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

const TAG = /<[^>]+>/g;

export interface WebSearchRetrieverOptions {
  apiKey: string;
  endpoint?: string;
  timeoutMs?: number;
  /** Keywords joined into the query */
  maxKeywords?: number;
  maxItems?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Search result snippets as evidence. Source type and credibility come from
 * each result's hostname.
 */
export class WebSearchRetriever implements EvidenceRetriever {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly maxKeywords: number;
  private readonly maxItems: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WebSearchRetrieverOptions) {
    this.apiKey = options.apiKey;
    this.endpoint = options.endpoint ?? BRAVE_SEARCH_URL;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxKeywords = options.maxKeywords ?? 5;
    this.maxItems = options.maxItems ?? 3;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async retrieve(keywords: string[]): Promise<EvidenceItem[]> {
    const query = keywords.slice(0, this.maxKeywords).join(' ').trim();
    if (!query) return [];

    const params = new URLSearchParams({ q: query, count: String(this.maxItems * 2) });
    const response = await this.fetchImpl(`${this.endpoint}?${params.toString()}`, {
      headers: { Accept: 'application/json', 'X-Subscription-Token': this.apiKey },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Web search returned HTTP ${response.status}`);
    }

    const results = SearchResponseSchema.parse(await response.json()).web?.results ?? [];
    const evidence: EvidenceItem[] = [];

    for (const result of results) {
      if (evidence.length >= this.maxItems) break;
      const content = (result.description ?? '').replace(TAG, '').trim();
      if (!result.url || !result.title || !content) continue;

      const sourceType = inferSourceType(result.url);
      evidence.push({
        content,
        source: `Web - ${result.title}`,
        url: result.url,
        credibilityScore: scoreCredibility(sourceType, result.url),
        sourceType,
      });
    }

    logger.debug('Web search evidence retrieved', { query, count: evidence.length });
    return evidence;
  }
}
