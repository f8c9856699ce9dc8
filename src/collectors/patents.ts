// ═══════════════════════════════════════════════════════════════════════════════
// PATENTS COLLECTOR — PatentsView Search API
// ═══════════════════════════════════════════════════════════════════════════════
//
// Windows by grant year: the last 2 years, years 3-7 back, years 8-12 back.
// An API key is required; without one every window records an error and the
// collector reports a failure.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, type Result } from '../types/result.js';
import type { Collector, CollectorOutcome, Maturity, Momentum, PatentsFields, Trend } from './types.js';
import {
  arrayField,
  fetchJson,
  isRecord,
  numberField,
  round,
  stringField,
  type FetchLike,
} from './http.js';

const API_URL = 'https://search.patentsview.org/api/v1/patent/';
const FIELDS = [
  'patent_id',
  'patent_title',
  'patent_abstract',
  'patent_date',
  'patent_num_times_cited_by_us_patents',
  'assignees',
];

export interface PatentsCollectorOptions {
  readonly timeoutMs: number;
  readonly apiKey?: string;
  readonly fetchFn?: FetchLike;
  readonly now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────────
// QUERY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * PatentsView query: any search term in title or abstract, within the date range.
 */
export function buildPatentQuery(
  keyword: string,
  terms: readonly string[],
  yearStart: number,
  yearEnd: number
): Record<string, unknown> {
  const textClauses = [keyword, ...terms].flatMap((term) => [
    { _text_all: { patent_title: term } },
    { _text_all: { patent_abstract: term } },
  ]);

  return {
    _and: [
      { _or: textClauses },
      { _gte: { patent_date: `${yearStart}-01-01` } },
      { _lte: { patent_date: `${yearEnd}-12-31` } },
    ],
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVED METRICS
// ─────────────────────────────────────────────────────────────────────────────────

export function filingVelocity(patents2y: number, patents5y: number): number {
  const recentRate = patents2y / 2;
  const historicalRate = patents5y / 5;
  if (historicalRate === 0) {
    return recentRate === 0 ? 0 : 1;
  }
  return (recentRate - historicalRate) / historicalRate;
}

/**
 * Share of all patents held by the top three assignees.
 */
export function assigneeConcentration(
  assigneeCounts: ReadonlyMap<string, number>,
  totalPatents: number
): PatentsFields['assignee_concentration'] {
  if (totalPatents === 0 || assigneeCounts.size === 0) return 'unknown';

  const top3 = [...assigneeCounts.values()]
    .sort((a, b) => b - a)
    .slice(0, 3)
    .reduce((sum, count) => sum + count, 0);
  const share = top3 / totalPatents;

  if (share > 0.5) return 'concentrated';
  if (share > 0.25) return 'moderate';
  return 'diverse';
}

/**
 * Countries holding more than 5% of assignments: one is domestic, up to three regional.
 */
export function geographicReach(countryCounts: ReadonlyMap<string, number>): PatentsFields['geographic_reach'] {
  const total = [...countryCounts.values()].reduce((sum, count) => sum + count, 0);
  if (total === 0) return 'unknown';

  const significant = [...countryCounts.values()].filter((count) => count / total > 0.05).length;
  if (significant === 1) return 'domestic';
  if (significant <= 3) return 'regional';
  return 'global';
}

export function patentMaturity(totalPatents: number, avgCitations2y: number): Maturity {
  if (totalPatents > 500 || avgCitations2y > 15) return 'mature';
  if (totalPatents < 50 && avgCitations2y < 5) return 'emerging';
  return 'developing';
}

export function patentMomentum(patents2y: number, patents5y: number): Momentum {
  const recentRate = patents2y / 2;
  const historicalRate = patents5y / 5;
  if (historicalRate === 0) {
    return recentRate === 0 ? 'steady' : 'accelerating';
  }
  const ratio = recentRate / historicalRate;
  if (ratio > 1.5) return 'accelerating';
  if (ratio < 0.5) return 'decelerating';
  return 'steady';
}

export function patentTrend(patents2y: number, patents5y: number): Trend {
  const recentRate = patents2y / 2;
  const historicalRate = patents5y / 5;
  if (historicalRate === 0) {
    return recentRate === 0 ? 'stable' : 'increasing';
  }
  const diff = (recentRate - historicalRate) / historicalRate;
  if (diff > 0.3) return 'increasing';
  if (diff < -0.3) return 'decreasing';
  return 'stable';
}

function avgCitations(patents: readonly unknown[]): number {
  if (patents.length === 0) return 0;
  const total = patents.reduce<number>(
    (sum, patent) => sum + numberField(patent, 'patent_num_times_cited_by_us_patents'),
    0
  );
  return total / patents.length;
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLECTOR
// ─────────────────────────────────────────────────────────────────────────────────

export class PatentsCollector implements Collector<'patents'> {
  readonly source = 'patents' as const;

  constructor(private readonly options: PatentsCollectorOptions) {}

  async fetch(
    keyword: string,
    terms: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<CollectorOutcome<'patents'>> {
    const now = this.options.now?.() ?? new Date();
    const year = now.getFullYear();
    const errors: string[] = [];

    if (!this.options.apiKey) {
      errors.push('Missing PatentsView API key');
      return err({ source: this.source, reason: 'All API requests failed', errors });
    }

    const windows: Array<[number, number]> = [
      [year - 2, year - 1],
      [year - 7, year - 3],
      [year - 12, year - 8],
    ];
    const [data2y, data5y, data10y] = await Promise.all(
      windows.map(([start, end]) => this.fetchPeriod(keyword, terms, start, end, errors, signal))
    );
    const bodies = [data2y, data5y, data10y].map((result) => (result.ok ? result.value : null));

    if (bodies.every((body) => body === null)) {
      return err({ source: this.source, reason: 'All API requests failed', errors });
    }

    const [body2y, body5y, body10y] = bodies;
    const patents2y = numberField(body2y, 'total_hits');
    const patents5y = numberField(body5y, 'total_hits');
    const patents10y = numberField(body10y, 'total_hits');
    const total = patents2y + patents5y + patents10y;

    const list2y = arrayField(body2y, 'patents');
    const list5y = arrayField(body5y, 'patents');
    const all = [...list2y, ...list5y, ...arrayField(body10y, 'patents')];

    const assigneeCounts = new Map<string, number>();
    const countryCounts = new Map<string, number>();
    for (const patent of all) {
      for (const assignee of arrayField(patent, 'assignees')) {
        const organization = stringField(assignee, 'assignee_organization');
        if (organization) increment(assigneeCounts, organization);
        const country = stringField(assignee, 'assignee_country');
        if (country && country !== 'Unknown') increment(countryCounts, country);
      }
    }

    const citations2y = avgCitations(list2y);

    const known: PatentsFields = {
      patents_2y: patents2y,
      patents_5y: patents5y,
      patents_10y: patents10y,
      patents_total: total,
      unique_assignees: assigneeCounts.size,
      geographic_diversity: countryCounts.size,
      avg_citations_2y: round(citations2y),
      avg_citations_5y: round(avgCitations(list5y)),
      filing_velocity: round(filingVelocity(patents2y, patents5y), 3),
      assignee_concentration: assigneeConcentration(assigneeCounts, total),
      geographic_reach: geographicReach(countryCounts),
      patent_maturity: patentMaturity(total, citations2y),
      patent_momentum: patentMomentum(patents2y, patents5y),
      patent_trend: patentTrend(patents2y, patents5y),
    };

    const topAssignees = [...assigneeCounts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, 5)
      .map(([name, count]) => ({ name, patent_count: count }));

    const topPatents = all
      .map((patent) => {
        const first = arrayField(patent, 'assignees')[0];
        return {
          patent_number: stringField(patent, 'patent_id', 'unknown'),
          title: stringField(patent, 'patent_title'),
          date: stringField(patent, 'patent_date'),
          assignee: isRecord(first) ? stringField(first, 'assignee_organization', 'Individual') : 'Individual',
          country: isRecord(first) ? stringField(first, 'assignee_country', 'Unknown') : 'Unknown',
          citations: numberField(patent, 'patent_num_times_cited_by_us_patents'),
        };
      })
      .sort((a, b) => b.citations - a.citations)
      .slice(0, 5);

    return ok({
      source: this.source,
      keyword,
      collectedAt: now.toISOString(),
      expandedTerms: [...terms],
      known,
      extra: {
        top_assignees: topAssignees,
        countries: Object.fromEntries(countryCounts),
        top_patents: topPatents,
      },
      errors,
    });
  }

  private async fetchPeriod(
    keyword: string,
    terms: readonly string[],
    yearStart: number,
    yearEnd: number,
    errors: string[],
    signal?: AbortSignal
  ): Promise<Result<unknown, string>> {
    const result = await fetchJson({
      url: API_URL,
      query: {
        q: JSON.stringify(buildPatentQuery(keyword, terms, yearStart, yearEnd)),
        f: JSON.stringify(FIELDS),
        o: JSON.stringify({ size: 100 }),
      },
      headers: { 'X-Api-Key': this.options.apiKey ?? '' },
      timeoutMs: this.options.timeoutMs,
      signal,
    }, this.options.fetchFn);

    if (!result.ok) {
      errors.push(result.error);
      return result;
    }

    if (isRecord(result.value) && result.value.error === true) {
      errors.push('API returned error flag');
      return err('API returned error flag');
    }

    return result;
  }
}
