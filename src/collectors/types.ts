// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTOR TYPES — Source Metrics and the Collector Contract
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each collector produces a structured record per source: a fixed set of
// well-known fields the orchestrator and prompts rely on, plus an `extra`
// bag for source-specific samples (top stories, top papers, ...).
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../types/result.js';
import type { SourceName } from '../types/phases.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SHARED LABELS
// ─────────────────────────────────────────────────────────────────────────────────

export type Trend = 'increasing' | 'stable' | 'decreasing';
export type Momentum = 'accelerating' | 'steady' | 'decelerating';
export type Maturity = 'emerging' | 'developing' | 'mature';
export type Level = 'high' | 'medium' | 'low';

// ─────────────────────────────────────────────────────────────────────────────────
// PER-SOURCE KNOWN FIELDS
// ─────────────────────────────────────────────────────────────────────────────────

/** Hacker News stories and engagement */
export interface SocialFields {
  readonly mentions_30d: number;
  readonly mentions_6m: number;
  readonly mentions_1y: number;
  readonly mentions_total: number;
  readonly avg_points_30d: number;
  readonly avg_points_6m: number;
  readonly avg_comments_30d: number;
  readonly avg_comments_6m: number;
  /** tanh-scaled engagement sentiment in [-1, 1] */
  readonly sentiment: number;
  readonly recency: Level;
  readonly growth_trend: Trend;
  readonly momentum: Momentum;
}

/** Semantic Scholar publications and citations */
export interface PapersFields {
  readonly publications_2y: number;
  readonly publications_5y: number;
  readonly publications_total: number;
  readonly avg_citations_2y: number;
  readonly avg_citations_5y: number;
  readonly citation_velocity: number;
  readonly author_diversity: number;
  readonly venue_diversity: number;
  readonly research_maturity: Maturity;
  readonly research_momentum: Momentum;
  readonly research_trend: Trend;
  readonly research_breadth: 'narrow' | 'moderate' | 'broad';
}

/** PatentsView filings */
export interface PatentsFields {
  readonly patents_2y: number;
  readonly patents_5y: number;
  readonly patents_10y: number;
  readonly patents_total: number;
  readonly unique_assignees: number;
  readonly geographic_diversity: number;
  readonly avg_citations_2y: number;
  readonly avg_citations_5y: number;
  readonly filing_velocity: number;
  readonly assignee_concentration: 'concentrated' | 'moderate' | 'diverse' | 'unknown';
  readonly geographic_reach: 'domestic' | 'regional' | 'global' | 'unknown';
  readonly patent_maturity: Maturity;
  readonly patent_momentum: Momentum;
  readonly patent_trend: Trend;
}

/** GDELT news coverage */
export interface NewsFields {
  readonly articles_30d: number;
  readonly articles_3m: number;
  readonly articles_1y: number;
  readonly articles_total: number;
  readonly unique_domains: number;
  readonly geographic_diversity: number;
  /** Average tone in [-1, 1] */
  readonly avg_tone: number;
  readonly media_attention: Level;
  readonly coverage_trend: Trend | 'unknown';
  readonly sentiment_trend: 'positive' | 'neutral' | 'negative';
  readonly mainstream_adoption: 'mainstream' | 'emerging' | 'niche';
}

/** Yahoo Finance market behaviour of related tickers */
export interface FinanceFields {
  readonly companies_found: number;
  readonly total_market_cap: number;
  readonly avg_market_cap: number;
  /** Percent */
  readonly avg_price_change_1m: number;
  readonly avg_price_change_6m: number;
  readonly avg_price_change_2y: number;
  /** Annualized, percent */
  readonly avg_volatility_1m: number;
  readonly avg_volatility_6m: number;
  readonly volume_trend: Trend;
  readonly market_maturity: Maturity;
  readonly investor_sentiment: 'positive' | 'neutral' | 'negative';
  readonly investment_momentum: Momentum;
}

export interface FieldsBySource {
  social: SocialFields;
  papers: PapersFields;
  patents: PatentsFields;
  news: NewsFields;
  finance: FinanceFields;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SOURCE METRICS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Output of one collection attempt. Immutable once produced.
 */
export interface MetricsRecord<S extends SourceName> {
  readonly source: S;
  readonly keyword: string;
  /** ISO-8601 */
  readonly collectedAt: string;
  /** Expansion terms the attempt searched with, empty for the plain keyword */
  readonly expandedTerms: readonly string[];
  readonly known: FieldsBySource[S];
  readonly extra: Readonly<Record<string, unknown>>;
  /** Non-fatal errors (one period failed, missing key, ...) */
  readonly errors: readonly string[];
}

export type SocialMetrics = MetricsRecord<'social'>;
export type PapersMetrics = MetricsRecord<'papers'>;
export type PatentsMetrics = MetricsRecord<'patents'>;
export type NewsMetrics = MetricsRecord<'news'>;
export type FinanceMetrics = MetricsRecord<'finance'>;

export type SourceMetrics =
  | SocialMetrics
  | PapersMetrics
  | PatentsMetrics
  | NewsMetrics
  | FinanceMetrics;

/**
 * JSON form of a SourceMetrics as exposed in responses and stored in the cache:
 * known fields and extras flattened into one object.
 */
export type MetricsSnapshot = Readonly<Record<string, unknown>>;

export function toSnapshot(metrics: SourceMetrics): MetricsSnapshot {
  return {
    source: metrics.source,
    keyword: metrics.keyword,
    collected_at: metrics.collectedAt,
    expanded_terms: [...metrics.expandedTerms],
    ...metrics.extra,
    ...metrics.known,
    errors: [...metrics.errors],
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTCOMES
// ─────────────────────────────────────────────────────────────────────────────────

export interface CollectorFailure {
  readonly source: SourceName;
  readonly reason: string;
  /** Errors gathered from individual requests before giving up */
  readonly errors?: readonly string[];
}

export type CollectorOutcome<S extends SourceName> = Result<MetricsRecord<S>, CollectorFailure>;

/**
 * Outcome of any source, discriminated by `value.source` when present.
 */
export type SourceOutcome = Result<SourceMetrics, CollectorFailure>;

/**
 * Uniform collector contract. `fetch` never throws for ordinary failures:
 * rate limits, timeouts and empty results come back as populated `errors`
 * or as a Failed outcome when nothing could be retrieved at all.
 */
export interface Collector<S extends SourceName> {
  readonly source: S;
  fetch(keyword: string, terms?: readonly string[], signal?: AbortSignal): Promise<CollectorOutcome<S>>;
}

export type CollectorSet = { readonly [S in SourceName]: Collector<S> };
