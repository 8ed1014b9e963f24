// ═══════════════════════════════════════════════════════════════════════════════
// CREDIBILITY MODEL — Static Source Trust Scores
// ═══════════════════════════════════════════════════════════════════════════════
//
// Rules are checked in order against the URL hostname; the first match wins.
// A URL that matches nothing (or does not parse) falls back to the source
// type default.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { SOURCE_TYPES, type SourceType } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RULES
// ─────────────────────────────────────────────────────────────────────────────────

interface DomainRule {
  readonly kind: 'domain' | 'suffix';
  readonly patterns: readonly string[];
  readonly score: number;
}

export const DOMAIN_RULES: readonly DomainRule[] = [
  { kind: 'domain', patterns: ['wikipedia.org'], score: 0.95 },
  { kind: 'suffix', patterns: ['.gov'], score: 0.92 },
  { kind: 'suffix', patterns: ['.edu'], score: 0.88 },
  { kind: 'domain', patterns: ['reuters.com', 'apnews.com', 'bbc.com', 'bbc.co.uk'], score: 0.85 },
  { kind: 'domain', patterns: ['nature.com', 'science.org', 'ncbi.nlm.nih.gov'], score: 0.90 },
];

export const SOURCE_TYPE_DEFAULTS: Readonly<Record<SourceType, number>> = {
  wikipedia: 0.95,
  government: 0.92,
  academic: 0.88,
  news_trusted: 0.80,
  web: 0.60,
  other: 0.60,
};

const FALLBACK_SCORE = 0.60;

// ─────────────────────────────────────────────────────────────────────────────────
// HOST MATCHING
// ─────────────────────────────────────────────────────────────────────────────────

function extractHost(url: string | undefined): string | undefined {
  if (!url) return undefined;
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return undefined;
  }
}

function matchesDomain(host: string, domain: string): boolean {
  return host === domain || host.endsWith('.' + domain);
}

function matchesRule(host: string, rule: DomainRule): boolean {
  return rule.patterns.some(pattern =>
    rule.kind === 'suffix' ? host.endsWith(pattern) : matchesDomain(host, pattern)
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCORING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Trust score in [0,1] for a source. Total: unknown source types and
 * malformed URLs get the generic default.
 */
export function scoreCredibility(sourceType: SourceType | string, url?: string): number {
  const host = extractHost(url);
  if (host) {
    for (const rule of DOMAIN_RULES) {
      if (matchesRule(host, rule)) return rule.score;
    }
  }

  return isSourceType(sourceType) ? SOURCE_TYPE_DEFAULTS[sourceType] : FALLBACK_SCORE;
}

/**
 * Best-effort source type for a URL, used by retrievers that do not know it.
 */
export function inferSourceType(url: string | undefined): SourceType {
  const host = extractHost(url);
  if (!host) return 'other';
  if (matchesDomain(host, 'wikipedia.org')) return 'wikipedia';
  if (host.endsWith('.gov')) return 'government';
  if (host.endsWith('.edu')) return 'academic';
  if (['reuters.com', 'apnews.com', 'bbc.com', 'bbc.co.uk'].some(d => matchesDomain(host, d))) {
    return 'news_trusted';
  }
  return 'web';
}

function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some(type => type === value);
}
