// ═══════════════════════════════════════════════════════════════════════════════
// SOCIAL COLLECTOR — Hacker News Mentions via the Algolia Search API
// ═══════════════════════════════════════════════════════════════════════════════
//
// Three windows: last 30 days, 30-180 days ago, 180-365 days ago.
// With expansion terms each window is searched once per term and the hit
// counts are summed.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err } from '../types/result.js';
import type { Collector, CollectorOutcome, Level, Momentum, SocialFields, Trend } from './types.js';
import {
  arrayField,
  fetchJson,
  numberField,
  round,
  stringField,
  DAY_MS,
  type FetchLike,
} from './http.js';

const API_URL = 'https://hn.algolia.com/api/v1/search';
const HITS_PER_PAGE = 20;

export interface SocialCollectorOptions {
  readonly timeoutMs: number;
  readonly fetchFn?: FetchLike;
  readonly now?: () => Date;
}

interface PeriodData {
  readonly nbHits: number;
  readonly hits: readonly unknown[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVED METRICS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Engagement sentiment: average points mapped through tanh, 50 points is neutral.
 */
export function socialSentiment(avgPoints: number): number {
  return Math.tanh((avgPoints - 50) / 100);
}

export function socialRecency(mentions30d: number, mentions6m: number, mentions1y: number): Level {
  const total = mentions30d + mentions6m + mentions1y;
  if (total === 0) return 'low';

  const recentRatio = mentions30d / total;
  if (recentRatio > 0.5) return 'high';
  if (recentRatio > 0.2) return 'medium';
  return 'low';
}

/**
 * Last 30 days against the monthly average of the previous 11 months, ±30%.
 */
export function socialGrowthTrend(mentions30d: number, mentions6m: number, mentions1y: number): Trend {
  const avgPerMonth = (mentions6m + mentions1y) / 11;
  if (mentions30d > avgPerMonth * 1.3) return 'increasing';
  if (mentions30d < avgPerMonth * 0.7) return 'decreasing';
  return 'stable';
}

export function socialMomentum(mentions30d: number, mentions6m: number, mentions1y: number): Momentum {
  if (mentions30d === 0 && mentions6m === 0) return 'steady';

  const recentAvg = mentions30d;
  const midAvg = mentions6m / 5;
  const oldAvg = mentions1y / 6;

  const midGrowth = oldAvg > 0 ? (midAvg - oldAvg) / oldAvg : (midAvg > 0 ? 1 : 0);
  const recentGrowth = midAvg > 0 ? (recentAvg - midAvg) / midAvg : (recentAvg > 0 ? 1 : 0);

  if (recentGrowth > midGrowth * 1.2) return 'accelerating';
  if (recentGrowth < midGrowth * 0.8) return 'decelerating';
  return 'steady';
}

function averages(hits: readonly unknown[]): { points: number; comments: number } {
  if (hits.length === 0) return { points: 0, comments: 0 };
  const points = hits.reduce<number>((sum, hit) => sum + numberField(hit, 'points'), 0);
  const comments = hits.reduce<number>((sum, hit) => sum + numberField(hit, 'num_comments'), 0);
  return { points: points / hits.length, comments: comments / hits.length };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLECTOR
// ─────────────────────────────────────────────────────────────────────────────────

export class SocialCollector implements Collector<'social'> {
  readonly source = 'social' as const;

  constructor(private readonly options: SocialCollectorOptions) {}

  async fetch(
    keyword: string,
    terms: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<CollectorOutcome<'social'>> {
    const now = this.options.now?.() ?? new Date();
    const nowSec = Math.floor(now.getTime() / 1000);
    const daysAgo = (days: number): number => Math.floor((now.getTime() - days * DAY_MS) / 1000);
    const errors: string[] = [];
    const queries = [keyword, ...terms];

    const [data30d, data6m, data1y] = await Promise.all([
      this.fetchPeriod(queries, `created_at_i>${daysAgo(30)}`, errors, signal),
      this.fetchPeriod(queries, `created_at_i>${daysAgo(180)},created_at_i<${daysAgo(30)}`, errors, signal),
      this.fetchPeriod(queries, `created_at_i>${daysAgo(365)},created_at_i<${daysAgo(180)}`, errors, signal),
    ]);

    if (!data30d && !data6m && !data1y) {
      return err({ source: this.source, reason: 'All API requests failed', errors });
    }

    const mentions30d = data30d?.nbHits ?? 0;
    const mentions6m = data6m?.nbHits ?? 0;
    const mentions1y = data1y?.nbHits ?? 0;
    const recent = averages(data30d?.hits ?? []);
    const mid = averages(data6m?.hits ?? []);

    const known: SocialFields = {
      mentions_30d: mentions30d,
      mentions_6m: mentions6m,
      mentions_1y: mentions1y,
      mentions_total: mentions30d + mentions6m + mentions1y,
      avg_points_30d: round(recent.points),
      avg_points_6m: round(mid.points),
      avg_comments_30d: round(recent.comments),
      avg_comments_6m: round(mid.comments),
      sentiment: round(socialSentiment(recent.points), 3),
      recency: socialRecency(mentions30d, mentions6m, mentions1y),
      growth_trend: socialGrowthTrend(mentions30d, mentions6m, mentions1y),
      momentum: socialMomentum(mentions30d, mentions6m, mentions1y),
    };

    const topStories = (data30d?.hits ?? []).slice(0, 5).map((hit) => {
      const createdAt = numberField(hit, 'created_at_i') || nowSec;
      return {
        title: stringField(hit, 'title'),
        points: numberField(hit, 'points'),
        comments: numberField(hit, 'num_comments'),
        age_days: Math.floor((nowSec - createdAt) / 86400),
      };
    });

    return ok({
      source: this.source,
      keyword,
      collectedAt: now.toISOString(),
      expandedTerms: [...terms],
      known,
      extra: { top_stories: topStories },
      errors,
    });
  }

  /**
   * One window across every query term. Null only when every query failed.
   */
  private async fetchPeriod(
    queries: readonly string[],
    numericFilters: string,
    errors: string[],
    signal?: AbortSignal
  ): Promise<PeriodData | null> {
    const results = await Promise.all(queries.map((query) => fetchJson({
      url: API_URL,
      query: { query, tags: 'story', numericFilters, hitsPerPage: HITS_PER_PAGE },
      timeoutMs: this.options.timeoutMs,
      signal,
    }, this.options.fetchFn)));

    let nbHits = 0;
    const hits: unknown[] = [];
    let succeeded = 0;

    for (const result of results) {
      if (!result.ok) {
        errors.push(result.error);
        continue;
      }
      succeeded++;
      nbHits += numberField(result.value, 'nbHits');
      hits.push(...arrayField(result.value, 'hits'));
    }

    return succeeded > 0 ? { nbHits, hits } : null;
  }
}
