// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES — Metrics Builders, Fake Collectors and a Scripted Classifier
// ═══════════════════════════════════════════════════════════════════════════════

import { vi, type Mock } from 'vitest';
import { ok, err, type Result } from '../../types/result.js';
import type { PhaseOpinion, OpinionMap, SourceName } from '../../types/phases.js';
import type {
  Collector,
  CollectorOutcome,
  CollectorSet,
  FieldsBySource,
  MetricsRecord,
  SourceMetrics,
} from '../../collectors/types.js';
import type { ClassifierClient, ClassifierError } from '../classifier-client.js';
import type { ClassificationResult } from '../response-assembler.js';
import type { CacheStore } from '../../cache/store.js';

export const COLLECTED_AT = '2026-03-01T00:00:00.000Z';

// ─────────────────────────────────────────────────────────────────────────────────
// METRICS
// ─────────────────────────────────────────────────────────────────────────────────

export const DEFAULT_FIELDS: FieldsBySource = {
  social: {
    mentions_30d: 120,
    mentions_6m: 400,
    mentions_1y: 700,
    mentions_total: 900,
    avg_points_30d: 80,
    avg_points_6m: 60,
    avg_comments_30d: 40,
    avg_comments_6m: 30,
    sentiment: 0.29,
    recency: 'medium',
    growth_trend: 'increasing',
    momentum: 'accelerating',
  },
  papers: {
    publications_2y: 40,
    publications_5y: 30,
    publications_total: 70,
    avg_citations_2y: 12,
    avg_citations_5y: 20,
    citation_velocity: 6,
    author_diversity: 150,
    venue_diversity: 25,
    research_maturity: 'developing',
    research_momentum: 'accelerating',
    research_trend: 'increasing',
    research_breadth: 'moderate',
  },
  patents: {
    patents_2y: 15,
    patents_5y: 10,
    patents_10y: 5,
    patents_total: 30,
    unique_assignees: 12,
    geographic_diversity: 4,
    avg_citations_2y: 1,
    avg_citations_5y: 3,
    filing_velocity: 7.5,
    assignee_concentration: 'diverse',
    geographic_reach: 'regional',
    patent_maturity: 'developing',
    patent_momentum: 'steady',
    patent_trend: 'increasing',
  },
  news: {
    articles_30d: 60,
    articles_3m: 90,
    articles_1y: 200,
    articles_total: 350,
    unique_domains: 80,
    geographic_diversity: 12,
    avg_tone: 0.1,
    media_attention: 'medium',
    coverage_trend: 'stable',
    sentiment_trend: 'neutral',
    mainstream_adoption: 'emerging',
  },
  finance: {
    companies_found: 2,
    total_market_cap: 0,
    avg_market_cap: 0,
    avg_price_change_1m: 3,
    avg_price_change_6m: 10,
    avg_price_change_2y: 40,
    avg_volatility_1m: 20,
    avg_volatility_6m: 22,
    volume_trend: 'stable',
    market_maturity: 'developing',
    investor_sentiment: 'positive',
    investment_momentum: 'steady',
  },
};

export function metricsFor<S extends SourceName>(
  source: S,
  known: Partial<FieldsBySource[S]> = {},
  overrides: Partial<Pick<MetricsRecord<S>, 'keyword' | 'expandedTerms' | 'errors' | 'extra'>> = {}
): MetricsRecord<S> {
  return {
    source,
    keyword: overrides.keyword ?? 'test keyword',
    collectedAt: COLLECTED_AT,
    expandedTerms: overrides.expandedTerms ?? [],
    known: { ...DEFAULT_FIELDS[source], ...known },
    extra: overrides.extra ?? {},
    errors: overrides.errors ?? [],
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLECTORS
// ─────────────────────────────────────────────────────────────────────────────────

export interface FakeCollector<S extends SourceName> extends Collector<S> {
  readonly calls: Array<{ keyword: string; terms: readonly string[] }>;
}

/**
 * Collector that answers from a script: plain-keyword calls get `first`,
 * calls with expansion terms get `expanded` (defaults to `first`).
 */
export function fakeCollector<S extends SourceName>(
  source: S,
  first: CollectorOutcome<S> | (() => Promise<CollectorOutcome<S>>),
  expanded?: CollectorOutcome<S>
): FakeCollector<S> {
  const calls: Array<{ keyword: string; terms: readonly string[] }> = [];
  return {
    source,
    calls,
    async fetch(keyword: string, terms: readonly string[] = []) {
      calls.push({ keyword, terms });
      if (terms.length > 0 && expanded) return expanded;
      return typeof first === 'function' ? first() : first;
    },
  };
}

export function failing<S extends SourceName>(source: S, reason = 'All API requests failed'): CollectorOutcome<S> {
  return err({ source, reason });
}

export interface FakeCollectorSet extends CollectorSet {
  readonly social: FakeCollector<'social'>;
  readonly papers: FakeCollector<'papers'>;
  readonly patents: FakeCollector<'patents'>;
  readonly news: FakeCollector<'news'>;
  readonly finance: FakeCollector<'finance'>;
}

export function healthyCollectors(overrides: Partial<FakeCollectorSet> = {}): FakeCollectorSet {
  return {
    social: overrides.social ?? fakeCollector('social', ok(metricsFor('social'))),
    papers: overrides.papers ?? fakeCollector('papers', ok(metricsFor('papers'))),
    patents: overrides.patents ?? fakeCollector('patents', ok(metricsFor('patents'))),
    news: overrides.news ?? fakeCollector('news', ok(metricsFor('news'))),
    finance: overrides.finance ?? fakeCollector('finance', ok(metricsFor('finance'))),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFIER
// ─────────────────────────────────────────────────────────────────────────────────

export const PEAK: PhaseOpinion = { phase: 'peak', confidence: 0.8, reasoning: 'Heavy coverage and rising mentions' };
export const SLOPE: PhaseOpinion = { phase: 'slope', confidence: 0.7, reasoning: 'Steady practical adoption' };
export const TRIGGER: PhaseOpinion = { phase: 'innovation_trigger', confidence: 0.6, reasoning: 'Early research only' };

type OpinionResult = Result<PhaseOpinion, ClassifierError>;

export interface ScriptedClassifier extends ClassifierClient {
  classifyOne: Mock<[SourceName, SourceMetrics, string], Promise<OpinionResult>>;
  synthesize: Mock<[string, OpinionMap], Promise<OpinionResult>>;
  expandQuery: Mock<[string], Promise<Result<string[], ClassifierError>>>;
}

export function scriptedClassifier(options: {
  perSource?: Partial<Record<SourceName, OpinionResult>>;
  final?: OpinionResult;
  terms?: Result<string[], ClassifierError>;
} = {}): ScriptedClassifier {
  return {
    classifyOne: vi.fn<[SourceName, SourceMetrics, string], Promise<OpinionResult>>(
      async (source) => options.perSource?.[source] ?? ok(PEAK)
    ),
    synthesize: vi.fn<[string, OpinionMap], Promise<OpinionResult>>(async () => options.final ?? ok(PEAK)),
    expandQuery: vi.fn<[string], Promise<Result<string[], ClassifierError>>>(
      async () => options.terms ?? ok(['term one', 'term two', 'term three'])
    ),
  };
}

export function classifierError(kind: ClassifierError['kind'], message: string): Result<never, ClassifierError> {
  return err({ kind, message });
}

// ─────────────────────────────────────────────────────────────────────────────────
// CACHE
// ─────────────────────────────────────────────────────────────────────────────────

export class FakeCache implements CacheStore {
  readonly stored: ClassificationResult[] = [];
  getError: Error | null = null;
  putError: Error | null = null;
  hit: ClassificationResult | null = null;

  async get(): Promise<ClassificationResult | null> {
    if (this.getError) throw this.getError;
    return this.hit;
  }

  async put(result: ClassificationResult): Promise<void> {
    if (this.putError) throw this.putError;
    this.stored.push(result);
  }
}
