// ═══════════════════════════════════════════════════════════════════════════════
// NEWS COLLECTOR — GDELT DOC 2.0 Article, Volume and Tone Data
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err } from '../types/result.js';
import type { Collector, CollectorOutcome, Level, NewsFields } from './types.js';
import {
  arrayField,
  buildOrQuery,
  fetchJson,
  isRecord,
  numberField,
  round,
  stringField,
  DAY_MS,
  type FetchLike,
} from './http.js';

const API_URL = 'https://api.gdeltproject.org/api/v2/doc/doc';
const MAX_RECORDS = 250;

export interface NewsCollectorOptions {
  readonly timeoutMs: number;
  readonly fetchFn?: FetchLike;
  readonly now?: () => Date;
}

interface PeriodData {
  readonly articles: readonly unknown[];
  readonly volumeIntensity: number;
  readonly tone: unknown;
}

export interface ToneDistribution {
  positive: number;
  neutral: number;
  negative: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVED METRICS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * GDELT timestamps: YYYYMMDDHHMMSS in UTC.
 */
export function gdeltTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/**
 * ToneChart bins run 0-10 with 5 neutral. The count-weighted mean bin maps to
 * [-1, 1]; bins >= 7 count as positive and <= 3 as negative.
 */
export function toneMetrics(toneData: unknown): { avgTone: number; distribution: ToneDistribution } {
  const distribution: ToneDistribution = { positive: 0, neutral: 0, negative: 0 };
  let total = 0;
  let weighted = 0;

  for (const bin of arrayField(toneData, 'tonechart')) {
    const index = isRecord(bin) && typeof bin.bin === 'number' ? bin.bin : 5;
    const count = numberField(bin, 'count');
    total += count;
    weighted += index * count;

    if (index >= 7) {
      distribution.positive += count;
    } else if (index <= 3) {
      distribution.negative += count;
    } else {
      distribution.neutral += count;
    }
  }

  const avgTone = total > 0 ? (weighted / total - 5) / 5 : 0;
  return { avgTone, distribution };
}

export function mediaAttention(articles30d: number, articles3m: number, articles1y: number): Level {
  const total = articles30d + articles3m + articles1y;
  if (total >= 500) return 'high';
  if (total >= 100) return 'medium';
  return 'low';
}

export function coverageTrend(volume30d: number, volume3m: number, volume1y: number): NewsFields['coverage_trend'] {
  if (volume3m === 0 && volume1y === 0) {
    return volume30d > 0 ? 'stable' : 'unknown';
  }
  const historical = (volume3m + volume1y) / 2;
  if (volume30d > historical * 1.3) return 'increasing';
  if (volume30d < historical * 0.7) return 'decreasing';
  return 'stable';
}

export function sentimentTrend(avgTone: number): NewsFields['sentiment_trend'] {
  if (avgTone > 0.2) return 'positive';
  if (avgTone < -0.2) return 'negative';
  return 'neutral';
}

export function mainstreamAdoption(uniqueDomains: number, totalArticles: number): NewsFields['mainstream_adoption'] {
  if (totalArticles === 0) return 'niche';
  const ratio = uniqueDomains / totalArticles;
  if (uniqueDomains >= 50 && ratio > 0.3) return 'mainstream';
  if (uniqueDomains >= 20) return 'emerging';
  return 'niche';
}

function volumeIntensity(timeline: unknown): number {
  const series = arrayField(timeline, 'timeline')[0];
  const points = arrayField(series, 'data');
  if (points.length === 0) return 0;
  return points.reduce<number>((sum, point) => sum + numberField(point, 'value'), 0) / points.length;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLECTOR
// ─────────────────────────────────────────────────────────────────────────────────

export class NewsCollector implements Collector<'news'> {
  readonly source = 'news' as const;

  constructor(private readonly options: NewsCollectorOptions) {}

  async fetch(
    keyword: string,
    terms: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<CollectorOutcome<'news'>> {
    const now = this.options.now?.() ?? new Date();
    const ago = (days: number): Date => new Date(now.getTime() - days * DAY_MS);
    const errors: string[] = [];
    const query = buildOrQuery(keyword, terms);

    const [data30d, data3m, data1y] = await Promise.all([
      this.fetchPeriod(query, ago(30), now, true, errors, signal),
      this.fetchPeriod(query, ago(90), ago(30), false, errors, signal),
      this.fetchPeriod(query, ago(365), ago(90), false, errors, signal),
    ]);

    if (!data30d && !data3m && !data1y) {
      return err({ source: this.source, reason: 'All API requests failed', errors });
    }

    const articles30d = data30d?.articles.length ?? 0;
    const articles3m = data3m?.articles.length ?? 0;
    const articles1y = data1y?.articles.length ?? 0;
    const total = articles30d + articles3m + articles1y;

    const countries: Record<string, number> = {};
    const domainCounts = new Map<string, number>();
    for (const data of [data30d, data3m, data1y]) {
      for (const article of data?.articles ?? []) {
        const country = stringField(article, 'sourcecountry', 'Unknown');
        countries[country] = (countries[country] ?? 0) + 1;
        const domain = stringField(article, 'domain');
        if (domain) {
          domainCounts.set(domain, (domainCounts.get(domain) ?? 0) + 1);
        }
      }
    }

    const { avgTone, distribution } = toneMetrics(data30d?.tone);
    const volume30d = data30d?.volumeIntensity ?? 0;
    const volume3m = data3m?.volumeIntensity ?? 0;
    const volume1y = data1y?.volumeIntensity ?? 0;

    const known: NewsFields = {
      articles_30d: articles30d,
      articles_3m: articles3m,
      articles_1y: articles1y,
      articles_total: total,
      unique_domains: domainCounts.size,
      geographic_diversity: Object.keys(countries).length,
      avg_tone: round(avgTone, 3),
      media_attention: mediaAttention(articles30d, articles3m, articles1y),
      coverage_trend: coverageTrend(volume30d, volume3m, volume1y),
      sentiment_trend: sentimentTrend(avgTone),
      mainstream_adoption: mainstreamAdoption(domainCounts.size, total),
    };

    const topDomains = [...domainCounts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, 5)
      .map(([domain, count]) => ({ domain, count }));

    const topArticles = (data30d?.articles ?? []).slice(0, 5).map((article) => ({
      url: stringField(article, 'url'),
      title: stringField(article, 'title'),
      domain: stringField(article, 'domain'),
      country: stringField(article, 'sourcecountry', 'Unknown'),
      date: stringField(article, 'seendate'),
    }));

    return ok({
      source: this.source,
      keyword,
      collectedAt: now.toISOString(),
      expandedTerms: [...terms],
      known,
      extra: {
        source_countries: countries,
        top_domains: topDomains,
        tone_distribution: distribution,
        volume_intensity_30d: round(volume30d, 3),
        volume_intensity_3m: round(volume3m, 3),
        volume_intensity_1y: round(volume1y, 3),
        top_articles: topArticles,
      },
      errors,
    });
  }

  /**
   * Article list plus volume timeline (and tone chart when asked). The period
   * counts as failed only when the article list cannot be fetched.
   */
  private async fetchPeriod(
    query: string,
    start: Date,
    end: Date,
    withTone: boolean,
    errors: string[],
    signal?: AbortSignal
  ): Promise<PeriodData | null> {
    const base = {
      query,
      format: 'json',
      startdatetime: gdeltTimestamp(start),
      enddatetime: gdeltTimestamp(end),
    };
    const request = (params: Record<string, string | number>) => fetchJson({
      url: API_URL,
      query: { ...base, ...params },
      timeoutMs: this.options.timeoutMs,
      signal,
    }, this.options.fetchFn);

    const [articles, timeline, tone] = await Promise.all([
      request({ mode: 'ArtList', maxrecords: MAX_RECORDS }),
      request({ mode: 'timelinevol' }),
      withTone ? request({ mode: 'ToneChart' }) : Promise.resolve(null),
    ]);

    for (const result of [articles, timeline, tone]) {
      if (result && !result.ok) {
        errors.push(result.error);
      }
    }

    if (!articles.ok) {
      return null;
    }

    return {
      articles: arrayField(articles.value, 'articles'),
      volumeIntensity: timeline.ok ? volumeIntensity(timeline.value) : 0,
      tone: tone && tone.ok ? tone.value : null,
    };
  }
}
