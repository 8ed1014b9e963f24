// ═══════════════════════════════════════════════════════════════════════════════
// WIKIPEDIA RETRIEVER — MediaWiki Search + REST Page Summaries
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { getLogger } from '../../logging/index.js';
import { scoreCredibility } from '../../verification/credibility.js';
import type { EvidenceItem, EvidenceRetriever } from '../../verification/types.js';

const logger = getLogger({ component: 'wikipedia' });

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

const SearchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({ title: z.string() })),
  }),
});

const SummaryResponseSchema = z.object({
  type: z.string().optional(),
  title: z.string(),
  extract: z.string().default(''),
  content_urls: z
    .object({ desktop: z.object({ page: z.string() }) })
    .optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// RETRIEVER
// ─────────────────────────────────────────────────────────────────────────────────

export interface WikipediaRetrieverOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Keywords joined into the search query */
  maxKeywords?: number;
  /** Search hits to consider */
  searchLimit?: number;
  maxItems?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

export class WikipediaRetriever implements EvidenceRetriever {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxKeywords: number;
  private readonly searchLimit: number;
  private readonly maxItems: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WikipediaRetrieverOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://en.wikipedia.org').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxKeywords = options.maxKeywords ?? 4;
    this.searchLimit = options.searchLimit ?? 5;
    this.maxItems = options.maxItems ?? 3;
    this.userAgent = options.userAgent ?? 'veracity/1.0 (claim verification service)';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async retrieve(keywords: string[]): Promise<EvidenceItem[]> {
    const query = keywords.slice(0, this.maxKeywords).join(' ').trim();
    if (!query) return [];

    const titles = await this.search(query);
    const evidence: EvidenceItem[] = [];

    for (const title of titles) {
      if (evidence.length >= this.maxItems) break;
      try {
        const item = await this.summary(title);
        if (item) evidence.push(item);
      } catch (error) {
        logger.warn('Wikipedia summary failed', {
          title,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.debug('Wikipedia evidence retrieved', { query, count: evidence.length });
    return evidence;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Requests
  // ─────────────────────────────────────────────────────────────────────────────

  private async search(query: string): Promise<string[]> {
    const params = new URLSearchParams({
      action: 'query',
      list: 'search',
      srsearch: query,
      srlimit: String(this.searchLimit),
      format: 'json',
    });
    const body = await this.getJson(`${this.baseUrl}/w/api.php?${params.toString()}`);
    return SearchResponseSchema.parse(body).query.search.map(hit => hit.title);
  }

  private async summary(title: string): Promise<EvidenceItem | null> {
    const slug = encodeURIComponent(title.replace(/ /g, '_'));
    const page = SummaryResponseSchema.parse(
      await this.getJson(`${this.baseUrl}/api/rest_v1/page/summary/${slug}`)
    );

    if (page.type === 'disambiguation' || !page.extract.trim()) {
      return null;
    }

    const url = page.content_urls?.desktop.page ?? `${this.baseUrl}/wiki/${slug}`;
    return {
      content: page.extract,
      source: `Wikipedia - ${page.title}`,
      url,
      credibilityScore: scoreCredibility('wikipedia', url),
      sourceType: 'wikipedia',
    };
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${new URL(url).pathname}`);
    }
    return response.json();
  }
}
