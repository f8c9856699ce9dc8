// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR TESTS — Cache, Fan-Out, Expansion, Classification, Persistence
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { ok } from '../../types/result.js';
import { getDefaultConfig, type AppConfig } from '../../config/index.js';
import { MemoryStore } from '../../storage/memory.js';
import { KeyValueCacheStore } from '../../cache/store.js';
import {
  createOrchestrator,
  describeFailure,
  InsufficientDataError,
  ClassificationFailedError,
  PersistenceError,
} from '../orchestrator.js';
import type { ClassificationResult } from '../response-assembler.js';
import type { CollectorOutcome } from '../../collectors/types.js';
import {
  FakeCache,
  PEAK,
  SLOPE,
  TRIGGER,
  classifierError,
  failing,
  fakeCollector,
  healthyCollectors,
  metricsFor,
  scriptedClassifier,
  type FakeCollectorSet,
  type ScriptedClassifier,
} from './fixtures.js';

const NOW = new Date('2026-03-02T00:00:00.000Z');
const now = (): Date => NOW;

function testConfig(envelopeTimeoutMs = 120_000): AppConfig {
  const config = getDefaultConfig();
  return { ...config, collectors: { ...config.collectors, envelopeTimeoutMs } };
}

function nicheSocial(mentions30d = 10, mentionsTotal = 40): CollectorOutcome<'social'> {
  return ok(metricsFor('social', { mentions_30d: mentions30d, mentions_total: mentionsTotal }));
}

describe('HypeCycleOrchestrator', () => {
  let cache: FakeCache;
  let classifier: ScriptedClassifier;
  let collectors: FakeCollectorSet;

  beforeEach(() => {
    cache = new FakeCache();
    classifier = scriptedClassifier();
    collectors = healthyCollectors();
  });

  function orchestrator(config: AppConfig = testConfig()) {
    return createOrchestrator({ config, collectors, classifier, cache, now });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // CACHE
  // ─────────────────────────────────────────────────────────────────────────────

  describe('cache', () => {
    it('should return a live cached result without collecting', async () => {
      const cached: ClassificationResult = {
        keyword: 'test keyword',
        phase: 'plateau',
        confidence: 0.9,
        reasoning: 'cached',
        timestamp: '2026-03-01T12:00:00.000Z',
        cache_hit: true,
        expires_at: '2026-03-02T12:00:00.000Z',
        per_source_analyses: {},
        collector_data: { social: null, papers: null, patents: null, news: null, finance: null },
        collectors_succeeded: 0,
        partial_data: true,
        errors: [],
        query_expansion_applied: false,
        expanded_terms: [],
      };
      cache.hit = cached;

      const result = await orchestrator().classify('test keyword');

      expect(result).toBe(cached);
      expect(collectors.social.calls).toHaveLength(0);
      expect(classifier.synthesize).not.toHaveBeenCalled();
      expect(cache.stored).toHaveLength(0);
    });

    it('should treat a cache read failure as a miss', async () => {
      cache.getError = new Error('connection refused');

      const result = await orchestrator().classify('test keyword');

      expect(result.cache_hit).toBe(false);
      expect(collectors.social.calls).toHaveLength(1);
      expect(cache.stored).toHaveLength(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // FULL RUN
  // ─────────────────────────────────────────────────────────────────────────────

  describe('full run', () => {
    it('should classify with all five sources and persist the result', async () => {
      classifier = scriptedClassifier({
        perSource: { social: ok(PEAK), papers: ok(SLOPE), patents: ok(SLOPE), news: ok(PEAK), finance: ok(TRIGGER) },
        final: ok(SLOPE),
      });

      const result = await orchestrator().classify('test keyword');

      expect(result.phase).toBe('slope');
      expect(result.confidence).toBe(0.7);
      expect(result.reasoning).toBe('Steady practical adoption');
      expect(result.cache_hit).toBe(false);
      expect(result.timestamp).toBe('2026-03-02T00:00:00.000Z');
      expect(result.expires_at).toBe('2026-03-03T00:00:00.000Z');
      expect(result.collectors_succeeded).toBe(5);
      expect(result.partial_data).toBe(false);
      expect(result.errors).toEqual([]);
      expect(result.query_expansion_applied).toBe(false);
      expect(result.expanded_terms).toEqual([]);
      expect(result.per_source_analyses).toEqual({
        social: PEAK,
        papers: SLOPE,
        patents: SLOPE,
        news: PEAK,
        finance: TRIGGER,
      });
      expect(result.collector_data.social?.mentions_30d).toBe(120);
      expect(cache.stored).toEqual([result]);
    });

    it('should pass every per-source opinion to synthesis', async () => {
      await orchestrator().classify('test keyword');

      expect(classifier.classifyOne).toHaveBeenCalledTimes(5);
      const [keyword, opinions] = classifier.synthesize.mock.calls[0];
      expect(keyword).toBe('test keyword');
      expect(Object.keys(opinions)).toEqual(['social', 'papers', 'patents', 'news', 'finance']);
    });

    it('should not expand when social signal is healthy', async () => {
      await orchestrator().classify('test keyword');
      expect(classifier.expandQuery).not.toHaveBeenCalled();
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // THRESHOLD
  // ─────────────────────────────────────────────────────────────────────────────

  describe('minimum sources', () => {
    it('should fail with insufficient data when only two collectors succeed', async () => {
      collectors = healthyCollectors({
        papers: fakeCollector('papers', failing('papers')),
        patents: fakeCollector('patents', failing('patents', 'Missing API key')),
        finance: fakeCollector('finance', failing('finance', 'All ticker fetches failed')),
      });

      const error = await orchestrator().classify('test keyword').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InsufficientDataError);
      if (!(error instanceof InsufficientDataError)) return;
      expect(error.succeeded).toBe(2);
      expect(error.required).toBe(3);
      expect(error.reasons).toEqual({
        papers: 'All API requests failed',
        patents: 'Missing API key',
        finance: 'All ticker fetches failed',
      });
      expect(error.message).toBe(
        'Insufficient data: only 2/5 collectors succeeded. Minimum 3 required. Errors: ' +
        '["papers collector failed: All API requests failed",' +
        '"patents collector failed: Missing API key",' +
        '"finance collector failed: All ticker fetches failed"]'
      );
      expect(classifier.classifyOne).not.toHaveBeenCalled();
      expect(cache.stored).toHaveLength(0);
    });

    it('should fail without expanding or persisting when every collector fails', async () => {
      collectors = healthyCollectors({
        social: fakeCollector('social', failing('social')),
        papers: fakeCollector('papers', failing('papers')),
        patents: fakeCollector('patents', failing('patents')),
        news: fakeCollector('news', failing('news')),
        finance: fakeCollector('finance', failing('finance')),
      });

      const error = await orchestrator().classify('test keyword').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InsufficientDataError);
      if (!(error instanceof InsufficientDataError)) return;
      expect(error.succeeded).toBe(0);
      expect(error.required).toBe(3);
      expect(error.reasons).toEqual({
        social: 'All API requests failed',
        papers: 'All API requests failed',
        patents: 'All API requests failed',
        news: 'All API requests failed',
        finance: 'All API requests failed',
      });
      expect(error.errors).toEqual([
        'social collector failed: All API requests failed',
        'papers collector failed: All API requests failed',
        'patents collector failed: All API requests failed',
        'news collector failed: All API requests failed',
        'finance collector failed: All API requests failed',
      ]);
      expect(classifier.expandQuery).not.toHaveBeenCalled();
      expect(classifier.classifyOne).not.toHaveBeenCalled();
      expect(cache.stored).toHaveLength(0);
    });

    it('should proceed with exactly three sources and mark partial data', async () => {
      collectors = healthyCollectors({
        patents: fakeCollector('patents', failing('patents')),
        news: fakeCollector('news', failing('news')),
      });

      const result = await orchestrator().classify('test keyword');

      expect(result.collectors_succeeded).toBe(3);
      expect(result.partial_data).toBe(true);
      expect(result.collector_data.patents).toBeNull();
      expect(result.collector_data.news).toBeNull();
      expect(result.errors).toEqual([
        'patents collector failed: All API requests failed',
        'news collector failed: All API requests failed',
      ]);
      expect(classifier.classifyOne).toHaveBeenCalledTimes(3);
    });

    it('should record a thrown collector error as a failure', async () => {
      collectors = healthyCollectors({
        news: fakeCollector('news', async () => {
          throw new Error('socket hang up');
        }),
      });

      const result = await orchestrator().classify('test keyword');

      expect(result.collectors_succeeded).toBe(4);
      expect(result.errors).toEqual(['news collector failed: socket hang up']);
    });

    it('should fail collectors still running when the envelope expires', async () => {
      collectors = healthyCollectors({
        news: fakeCollector('news', () => new Promise<CollectorOutcome<'news'>>(() => undefined)),
      });

      const result = await orchestrator(testConfig(20)).classify('test keyword');

      expect(result.collectors_succeeded).toBe(4);
      expect(result.collector_data.news).toBeNull();
      expect(result.errors).toEqual(['news collector failed: Timeout after 0.02s']);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // EXPANSION
  // ─────────────────────────────────────────────────────────────────────────────

  describe('query expansion', () => {
    const terms = ['adiabatic computing', 'qubit annealers', 'quantum optimization'];

    it('should re-run the expandable collectors for a niche keyword', async () => {
      classifier = scriptedClassifier({ terms: ok(terms) });
      collectors = healthyCollectors({
        social: fakeCollector('social', nicheSocial(), ok(metricsFor('social', { mentions_30d: 65 }))),
      });

      const result = await orchestrator().classify('test keyword');

      expect(classifier.expandQuery).toHaveBeenCalledWith('test keyword');
      expect(result.query_expansion_applied).toBe(true);
      expect(result.expanded_terms).toEqual(terms);
      expect(collectors.social.calls).toEqual([
        { keyword: 'test keyword', terms: [] },
        { keyword: 'test keyword', terms },
      ]);
      expect(collectors.papers.calls).toHaveLength(2);
      expect(collectors.patents.calls).toHaveLength(2);
      expect(collectors.news.calls).toHaveLength(2);
      expect(result.collector_data.social?.mentions_30d).toBe(65);
    });

    it('should never re-run the finance collector', async () => {
      classifier = scriptedClassifier({ terms: ok(terms) });
      collectors = healthyCollectors({ social: fakeCollector('social', nicheSocial()) });

      await orchestrator().classify('test keyword');

      expect(collectors.finance.calls).toEqual([{ keyword: 'test keyword', terms: [] }]);
    });

    it('should trigger on low total mentions alone', async () => {
      collectors = healthyCollectors({ social: fakeCollector('social', nicheSocial(80, 90)) });

      const result = await orchestrator().classify('test keyword');

      expect(result.query_expansion_applied).toBe(true);
    });

    it('should not expand when social collection failed', async () => {
      collectors = healthyCollectors({ social: fakeCollector('social', failing('social')) });

      const result = await orchestrator().classify('test keyword');

      expect(classifier.expandQuery).not.toHaveBeenCalled();
      expect(result.query_expansion_applied).toBe(false);
      expect(result.collectors_succeeded).toBe(4);
    });

    it('should record a classifier failure during expansion and continue', async () => {
      classifier = scriptedClassifier({ terms: classifierError('rate_limited', 'Classifier rate limited') });
      collectors = healthyCollectors({ social: fakeCollector('social', nicheSocial()) });

      const result = await orchestrator().classify('test keyword');

      expect(result.query_expansion_applied).toBe(false);
      expect(result.expanded_terms).toEqual([]);
      expect(result.errors).toEqual(['Query expansion failed: Classifier rate limited']);
      expect(collectors.papers.calls).toHaveLength(1);
    });

    it('should reject expansions with too few usable terms', async () => {
      classifier = scriptedClassifier({ terms: ok(['technology', 'Test Keyword', 'software', 'edge inference']) });
      collectors = healthyCollectors({ social: fakeCollector('social', nicheSocial()) });

      const result = await orchestrator().classify('test keyword');

      expect(result.query_expansion_applied).toBe(false);
      expect(result.errors).toEqual(['Query expansion failed: Only 1 valid terms (at least 3 required)']);
    });

    it('should let expanded results lift a run over the threshold', async () => {
      classifier = scriptedClassifier({ terms: ok(terms) });
      collectors = healthyCollectors({
        social: fakeCollector('social', nicheSocial()),
        papers: fakeCollector('papers', failing('papers'), ok(metricsFor('papers'))),
        patents: fakeCollector('patents', failing('patents')),
        news: fakeCollector('news', failing('news'), ok(metricsFor('news'))),
      });

      const result = await orchestrator().classify('test keyword');

      expect(result.collectors_succeeded).toBe(4);
      expect(result.collector_data.papers).not.toBeNull();
      expect(result.collector_data.news).not.toBeNull();
      expect(result.errors).toEqual(['patents collector failed: All API requests failed']);
    });

    it('should replace an earlier success with a failed expanded re-run', async () => {
      classifier = scriptedClassifier({ terms: ok(terms) });
      collectors = healthyCollectors({
        social: fakeCollector('social', nicheSocial()),
        news: fakeCollector('news', ok(metricsFor('news')), failing('news', 'Rate limited (retry after 30s)')),
      });

      const result = await orchestrator().classify('test keyword');

      expect(result.collector_data.news).toBeNull();
      expect(result.errors).toEqual(['news collector failed: Rate limited (retry after 30s)']);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // CLASSIFICATION FAILURES
  // ─────────────────────────────────────────────────────────────────────────────

  describe('classification', () => {
    it('should omit a failed per-source analysis and record it', async () => {
      classifier = scriptedClassifier({ perSource: { news: classifierError('unavailable', 'Classifier HTTP 500') } });

      const result = await orchestrator().classify('test keyword');

      expect(result.per_source_analyses.news).toBeUndefined();
      expect(Object.keys(result.per_source_analyses)).toHaveLength(4);
      expect(result.collectors_succeeded).toBe(5);
      expect(result.errors).toEqual(['Failed to analyze news: Classifier HTTP 500']);
    });

    it('should fail when fewer than three per-source analyses succeed', async () => {
      const timedOut = classifierError('timed_out', 'Classifier request timed out after 60000ms');
      classifier = scriptedClassifier({ perSource: { social: timedOut, papers: timedOut, patents: timedOut } });

      const error = await orchestrator().classify('test keyword').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ClassificationFailedError);
      if (!(error instanceof ClassificationFailedError)) return;
      expect(error.stage).toBe('per_source');
      expect(error.classifierError?.kind).toBe('timed_out');
      expect(classifier.synthesize).not.toHaveBeenCalled();
      expect(cache.stored).toHaveLength(0);
    });

    it('should fail when synthesis fails', async () => {
      classifier = scriptedClassifier({ final: classifierError('malformed_response', 'Malformed classifier response: Empty response') });

      const error = await orchestrator().classify('test keyword').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ClassificationFailedError);
      if (!(error instanceof ClassificationFailedError)) return;
      expect(error.stage).toBe('synthesis');
      expect(error.message).toBe('Failed to synthesize analyses: Malformed classifier response: Empty response');
      expect(cache.stored).toHaveLength(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // PERSISTENCE
  // ─────────────────────────────────────────────────────────────────────────────

  describe('persistence', () => {
    it('should raise PersistenceError when the cache write fails', async () => {
      cache.putError = new Error('disk full');

      const error = await orchestrator().classify('test keyword').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      if (!(error instanceof PersistenceError)) return;
      expect(error.message).toBe('Failed to persist analysis: disk full');
    });

    it('should serve the second request from the stored row', async () => {
      const store = new KeyValueCacheStore(new MemoryStore(), getDefaultConfig().cache, now);
      const first = await createOrchestrator({
        config: testConfig(), collectors, classifier, cache: store, now,
      }).classify('test keyword');

      const second = await createOrchestrator({
        config: testConfig(), collectors, classifier, cache: store, now,
      }).classify('test keyword');

      expect(collectors.social.calls).toHaveLength(1);
      expect(second.cache_hit).toBe(true);
      expect(second.errors).toEqual([]);
      expect({ ...second, cache_hit: false }).toEqual(first);
    });
  });
});

describe('describeFailure', () => {
  it('should append collected request errors', () => {
    expect(describeFailure({
      source: 'papers',
      reason: 'All API requests failed',
      errors: ['2y: HTTP 500', '5y: Request timeout'],
    })).toBe('papers collector failed: All API requests failed (2y: HTTP 500; 5y: Request timeout)');
  });

  it('should omit the suffix without request errors', () => {
    expect(describeFailure({ source: 'news', reason: 'Timeout after 120s' })).toBe(
      'news collector failed: Timeout after 120s'
    );
  });
});
