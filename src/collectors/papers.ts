// ═══════════════════════════════════════════════════════════════════════════════
// PAPERS COLLECTOR — Semantic Scholar Bulk Paper Search
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, type Result } from '../types/result.js';
import type { Collector, CollectorOutcome, Maturity, Momentum, PapersFields, Trend } from './types.js';
import {
  arrayField,
  buildOrQuery,
  fetchJson,
  numberField,
  round,
  stringField,
  type FetchLike,
} from './http.js';

const API_URL = 'https://api.semanticscholar.org/graph/v1/paper/search/bulk';
const FIELDS = 'paperId,title,year,citationCount,influentialCitationCount,authors,venue';

export interface PapersCollectorOptions {
  readonly timeoutMs: number;
  readonly apiKey?: string;
  readonly fetchFn?: FetchLike;
  readonly now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVED METRICS
// ─────────────────────────────────────────────────────────────────────────────────

export function citationVelocity(avgCitations2y: number, avgCitations5y: number): number {
  if (avgCitations5y === 0) {
    return avgCitations2y === 0 ? 0 : 1;
  }
  return (avgCitations2y - avgCitations5y) / avgCitations5y;
}

export function researchMaturity(publications2y: number, publications5y: number, avgCitations2y: number): Maturity {
  const total = publications2y + publications5y;
  if (total > 50 || avgCitations2y > 20) return 'mature';
  if (total < 10 && avgCitations2y < 5) return 'emerging';
  return 'developing';
}

/**
 * Yearly rate over the last 2 years against the older window's count spread over 5 years.
 */
export function researchMomentum(publications2y: number, publications5y: number): Momentum {
  const recentRate = publications2y / 2;
  const historicalRate = publications5y / 5;
  if (historicalRate === 0) {
    return recentRate === 0 ? 'steady' : 'accelerating';
  }
  const ratio = recentRate / historicalRate;
  if (ratio > 1.5) return 'accelerating';
  if (ratio < 0.5) return 'decelerating';
  return 'steady';
}

export function researchTrend(publications2y: number, publications5y: number): Trend {
  const recentRate = publications2y / 2;
  const historicalRate = publications5y / 5;
  if (historicalRate === 0) {
    return recentRate === 0 ? 'stable' : 'increasing';
  }
  const diff = (recentRate - historicalRate) / historicalRate;
  if (diff > 0.3) return 'increasing';
  if (diff < -0.3) return 'decreasing';
  return 'stable';
}

export function researchBreadth(
  authorDiversity: number,
  venueDiversity: number,
  totalPublications: number
): PapersFields['research_breadth'] {
  if (totalPublications === 0) return 'narrow';
  const authorRatio = authorDiversity / totalPublications;
  const venueRatio = venueDiversity / totalPublications;
  if (authorRatio > 2 && venueRatio > 0.3) return 'broad';
  if (authorRatio < 1.5 || venueRatio < 0.1) return 'narrow';
  return 'moderate';
}

function averageOf(papers: readonly unknown[], key: string): number {
  if (papers.length === 0) return 0;
  return papers.reduce<number>((sum, paper) => sum + numberField(paper, key), 0) / papers.length;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLECTOR
// ─────────────────────────────────────────────────────────────────────────────────

export class PapersCollector implements Collector<'papers'> {
  readonly source = 'papers' as const;

  constructor(private readonly options: PapersCollectorOptions) {}

  async fetch(
    keyword: string,
    terms: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<CollectorOutcome<'papers'>> {
    const now = this.options.now?.() ?? new Date();
    const currentYear = now.getFullYear();
    const errors: string[] = [];
    const query = buildOrQuery(keyword, terms);

    const [data2y, data5y] = await Promise.all([
      this.fetchPeriod(query, currentYear - 2, currentYear, errors, signal),
      this.fetchPeriod(query, currentYear - 5, currentYear - 2, errors, signal),
    ]);

    if (!data2y.ok && !data5y.ok) {
      return err({ source: this.source, reason: 'All API requests failed', errors });
    }

    const body2y = data2y.ok ? data2y.value : null;
    const body5y = data5y.ok ? data5y.value : null;
    const publications2y = numberField(body2y, 'total');
    const publications5y = numberField(body5y, 'total');
    const papers2y = arrayField(body2y, 'data');
    const papers5y = arrayField(body5y, 'data');

    const avgCitations2y = averageOf(papers2y, 'citationCount');
    const avgCitations5y = averageOf(papers5y, 'citationCount');

    const authors = new Set<string>();
    const venues = new Set<string>();
    for (const paper of papers5y) {
      for (const author of arrayField(paper, 'authors')) {
        const authorId = stringField(author, 'authorId');
        if (authorId) authors.add(authorId);
      }
      const venue = stringField(paper, 'venue');
      if (venue) venues.add(venue);
    }

    const known: PapersFields = {
      publications_2y: publications2y,
      publications_5y: publications5y,
      publications_total: publications2y + publications5y,
      avg_citations_2y: round(avgCitations2y),
      avg_citations_5y: round(avgCitations5y),
      citation_velocity: round(citationVelocity(avgCitations2y, avgCitations5y), 3),
      author_diversity: authors.size,
      venue_diversity: venues.size,
      research_maturity: researchMaturity(publications2y, publications5y, avgCitations2y),
      research_momentum: researchMomentum(publications2y, publications5y),
      research_trend: researchTrend(publications2y, publications5y),
      research_breadth: researchBreadth(authors.size, venues.size, publications2y + publications5y),
    };

    const topPapers = [...papers2y]
      .sort((a, b) => numberField(b, 'citationCount') - numberField(a, 'citationCount'))
      .slice(0, 5)
      .map((paper) => ({
        title: stringField(paper, 'title'),
        year: numberField(paper, 'year') || null,
        citations: numberField(paper, 'citationCount'),
        influential_citations: numberField(paper, 'influentialCitationCount'),
        authors: arrayField(paper, 'authors').length,
        venue: stringField(paper, 'venue'),
      }));

    return ok({
      source: this.source,
      keyword,
      collectedAt: now.toISOString(),
      expandedTerms: [...terms],
      known,
      extra: {
        avg_influential_citations_2y: round(averageOf(papers2y, 'influentialCitationCount')),
        avg_influential_citations_5y: round(averageOf(papers5y, 'influentialCitationCount')),
        top_papers: topPapers,
      },
      errors,
    });
  }

  /**
   * Years from yearStart (inclusive) to yearEnd (exclusive).
   */
  private async fetchPeriod(
    query: string,
    yearStart: number,
    yearEnd: number,
    errors: string[],
    signal?: AbortSignal
  ): Promise<Result<unknown, string>> {
    const headers: Record<string, string> = {};
    if (this.options.apiKey) {
      headers['x-api-key'] = this.options.apiKey;
    }

    const result = await fetchJson({
      url: API_URL,
      query: { query, year: `${yearStart}-${yearEnd - 1}`, fields: FIELDS, limit: 100 },
      headers,
      timeoutMs: this.options.timeoutMs,
      signal,
    }, this.options.fetchFn);

    if (!result.ok) {
      errors.push(result.error);
    }
    return result;
  }
}
