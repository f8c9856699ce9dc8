// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR — Keyword Classification Pipeline
// ═══════════════════════════════════════════════════════════════════════════════
//
// CacheCheck → Collecting → NicheCheck → [Expanding → Collecting] →
// Classifying → Synthesizing → Persisting → Done
//
// Collector and per-source classification failures are recorded and the run
// continues. Three outcomes end a run with an exception:
//   - fewer than the minimum sources present after collection (InsufficientDataError)
//   - too few per-source opinions, or synthesis failing (ClassificationFailedError)
//   - the cache write failing (PersistenceError)
//
// Nothing is retried. Expansion re-runs four collectors once with broader
// terms; finance is never re-run.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { err, errorMessage } from '../types/result.js';
import {
  EXPANDABLE_SOURCES,
  SOURCE_NAMES,
  type OpinionMap,
  type PhaseOpinion,
  type SourceName,
} from '../types/phases.js';
import type { AppConfig } from '../config/schema.js';
import {
  toSnapshot,
  type CollectorFailure,
  type CollectorSet,
  type MetricsSnapshot,
  type SocialMetrics,
  type SourceMetrics,
  type SourceOutcome,
} from '../collectors/types.js';
import type { CacheStore } from '../cache/store.js';
import { getLogger, type Logger } from '../logging/index.js';
import type { ClassifierClient, ClassifierError } from './classifier-client.js';
import { isNiche } from './niche-detector.js';
import { validateExpansionTerms } from './expansion.js';
import {
  assembleResult,
  NO_EXPANSION,
  type ClassificationResult,
  type ExpansionState,
} from './response-assembler.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Too few collectors produced data. Callers should try a broader keyword.
 */
export class InsufficientDataError extends Error {
  constructor(
    public readonly succeeded: number,
    public readonly required: number,
    public readonly reasons: Partial<Record<SourceName, string>>,
    public readonly errors: readonly string[]
  ) {
    super(
      `Insufficient data: only ${succeeded}/${SOURCE_NAMES.length} collectors succeeded. ` +
      `Minimum ${required} required. Errors: ${JSON.stringify(errors)}`
    );
    this.name = 'InsufficientDataError';
  }
}

export class ClassificationFailedError extends Error {
  constructor(
    message: string,
    public readonly stage: 'per_source' | 'synthesis',
    public readonly classifierError?: ClassifierError
  ) {
    super(message);
    this.name = 'ClassificationFailedError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, public readonly reason?: unknown) {
    super(message);
    this.name = 'PersistenceError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface OrchestratorDeps {
  readonly config: Pick<AppConfig, 'orchestrator' | 'collectors' | 'cache'>;
  readonly collectors: CollectorSet;
  readonly classifier: ClassifierClient;
  readonly cache: CacheStore;
  readonly now?: () => Date;
}

export interface Orchestrator {
  classify(keyword: string): Promise<ClassificationResult>;
}

/**
 * Latest outcome per source. Re-running a source replaces its entry.
 */
type CollectionState = Map<SourceName, SourceOutcome>;

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function describeFailure(failure: CollectorFailure): string {
  const details = failure.errors && failure.errors.length > 0 ? ` (${failure.errors.join('; ')})` : '';
  return `${failure.source} collector failed: ${failure.reason}${details}`;
}

function presentMetrics(state: CollectionState): SourceMetrics[] {
  const present: SourceMetrics[] = [];
  for (const source of SOURCE_NAMES) {
    const outcome = state.get(source);
    if (outcome?.ok) present.push(outcome.value);
  }
  return present;
}

function socialMetrics(state: CollectionState): SocialMetrics | null {
  const outcome = state.get('social');
  if (!outcome?.ok) return null;
  const metrics = outcome.value;
  return metrics.source === 'social' ? metrics : null;
}

function failures(state: CollectionState): { reasons: Partial<Record<SourceName, string>>; messages: string[] } {
  const reasons: Partial<Record<SourceName, string>> = {};
  const messages: string[] = [];
  for (const source of SOURCE_NAMES) {
    const outcome = state.get(source);
    if (!outcome) {
      reasons[source] = 'not run';
      messages.push(`${source} collector failed: not run`);
    } else if (!outcome.ok) {
      reasons[source] = outcome.error.reason;
      messages.push(describeFailure(outcome.error));
    }
  }
  return { reasons, messages };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ORCHESTRATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class HypeCycleOrchestrator implements Orchestrator {
  private readonly logger = getLogger({ component: 'orchestrator' });
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async classify(keyword: string): Promise<ClassificationResult> {
    const log = this.logger.child({ keyword });
    const startTime = Date.now();

    const cached = await this.readCache(keyword, log);
    if (cached) {
      log.info('Cache hit');
      return cached;
    }
    log.info('Cache miss');

    // ─── Collecting ───
    const state: CollectionState = await this.fanOut(keyword, SOURCE_NAMES, [], log);
    const runErrors: string[] = [];

    // ─── Niche check and expansion ───
    const expansion = await this.maybeExpand(keyword, state, runErrors, log);

    // ─── Final threshold ───
    const { minimumSources } = this.deps.config.orchestrator;
    const present = presentMetrics(state);
    const failed = failures(state);
    if (present.length < minimumSources) {
      const errors = [...failed.messages, ...runErrors];
      log.warn('Insufficient data', { succeeded: present.length, required: minimumSources });
      throw new InsufficientDataError(present.length, minimumSources, failed.reasons, errors);
    }

    // ─── Classifying ───
    const opinions = await this.classifySources(keyword, present, runErrors, log);

    // ─── Synthesizing ───
    const synthesis = await this.deps.classifier.synthesize(keyword, opinions);
    if (!synthesis.ok) {
      log.error('Synthesis failed', undefined, { kind: synthesis.error.kind, reason: synthesis.error.message });
      throw new ClassificationFailedError(
        `Failed to synthesize analyses: ${synthesis.error.message}`,
        'synthesis',
        synthesis.error
      );
    }

    // ─── Persisting ───
    const createdAt = this.now();
    const expiresAt = new Date(createdAt.getTime() + this.deps.config.cache.ttlHours * 3600 * 1000);
    const collectorData: Partial<Record<SourceName, MetricsSnapshot>> = {};
    for (const metrics of present) {
      collectorData[metrics.source] = toSnapshot(metrics);
    }

    const result = assembleResult({
      keyword,
      final: synthesis.value,
      opinions,
      collectorData,
      expansion,
      errors: [...failed.messages, ...runErrors],
      createdAt: createdAt.toISOString(),
      expiresAt: expiresAt.toISOString(),
      cacheHit: false,
    });

    try {
      await this.deps.cache.put(result);
    } catch (error) {
      log.error('Cache write failed', error);
      throw new PersistenceError(`Failed to persist analysis: ${errorMessage(error)}`, error);
    }

    log.time('Classification complete', startTime, {
      phase: result.phase,
      confidence: result.confidence,
      succeeded: result.collectors_succeeded,
      expansion: result.query_expansion_applied,
    });
    return result;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // CACHE
  // ─────────────────────────────────────────────────────────────────────────────

  private async readCache(keyword: string, log: Logger): Promise<ClassificationResult | null> {
    try {
      return await this.deps.cache.get(keyword);
    } catch (error) {
      log.error('Cache lookup failed, treating as miss', error);
      return null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // COLLECTION
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run the given collectors concurrently inside one envelope timeout and
   * record each outcome in `into`. Collectors still running when the
   * envelope expires are failed and cancelled; finished ones are kept.
   */
  private async fanOut(
    keyword: string,
    sources: readonly SourceName[],
    terms: readonly string[],
    log: Logger,
    into: CollectionState = new Map()
  ): Promise<CollectionState> {
    const timeoutMs = this.deps.config.collectors.envelopeTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const envelope = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve('timeout');
      }, timeoutMs);
    });

    try {
      const outcomes = await Promise.all(sources.map(async (source): Promise<SourceOutcome> => {
        const winner = await Promise.race([this.runCollector(source, keyword, terms, controller.signal), envelope]);
        if (winner === 'timeout') {
          return err({ source, reason: `Timeout after ${timeoutMs / 1000}s` });
        }
        return winner;
      }));

      sources.forEach((source, index) => {
        const outcome = outcomes[index];
        into.set(source, outcome);
        if (!outcome.ok) {
          log.warn(describeFailure(outcome.error));
        }
      });
    } finally {
      clearTimeout(timer);
    }

    const succeeded = sources.filter((source) => into.get(source)?.ok).length;
    log.info('Collectors completed', { succeeded, attempted: sources.length, expanded: terms.length > 0 });
    return into;
  }

  private async runCollector(
    source: SourceName,
    keyword: string,
    terms: readonly string[],
    signal: AbortSignal
  ): Promise<SourceOutcome> {
    const collector = this.deps.collectors[source];
    try {
      return await collector.fetch(keyword, terms, signal);
    } catch (error) {
      return err({ source, reason: errorMessage(error) });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // EXPANSION
  // ─────────────────────────────────────────────────────────────────────────────

  private async maybeExpand(
    keyword: string,
    state: CollectionState,
    runErrors: string[],
    log: Logger
  ): Promise<ExpansionState> {
    const config = this.deps.config.orchestrator;
    const social = socialMetrics(state);
    const niche = isNiche(social, {
      mentions30d: config.nicheMentions30d,
      mentionsTotal: config.nicheMentionsTotal,
    });

    log.debug('Niche check', {
      niche,
      mentions30d: social?.known.mentions_30d,
      mentionsTotal: social?.known.mentions_total,
    });
    if (!niche) {
      return NO_EXPANSION;
    }

    const suggested = await this.deps.classifier.expandQuery(keyword);
    if (!suggested.ok) {
      const message = `Query expansion failed: ${suggested.error.message}`;
      log.warn(message);
      runErrors.push(message);
      return NO_EXPANSION;
    }

    const validated = validateExpansionTerms(suggested.value, keyword, {
      min: config.minExpansionTerms,
      max: config.maxExpansionTerms,
    });
    if (!validated.ok) {
      const message = `Query expansion failed: ${validated.error}`;
      log.warn(message);
      runErrors.push(message);
      return NO_EXPANSION;
    }

    log.info('Niche keyword, re-running collectors with expanded terms', { terms: validated.value });
    await this.fanOut(keyword, EXPANDABLE_SOURCES, validated.value, log, state);
    return { applied: true, terms: validated.value };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // CLASSIFICATION
  // ─────────────────────────────────────────────────────────────────────────────

  private async classifySources(
    keyword: string,
    present: readonly SourceMetrics[],
    runErrors: string[],
    log: Logger
  ): Promise<OpinionMap> {
    const results = await Promise.all(
      present.map((metrics) => this.deps.classifier.classifyOne(metrics.source, metrics, keyword))
    );

    const opinions: OpinionMap = {};
    let firstError: ClassifierError | undefined;
    present.forEach((metrics, index) => {
      const result = results[index];
      if (result.ok) {
        const opinion: PhaseOpinion = result.value;
        opinions[metrics.source] = opinion;
      } else {
        firstError ??= result.error;
        const message = `Failed to analyze ${metrics.source}: ${result.error.message}`;
        log.warn(message, { kind: result.error.kind });
        runErrors.push(message);
      }
    });

    const count = Object.keys(opinions).length;
    const { minimumSources } = this.deps.config.orchestrator;
    log.info('Per-source classification completed', { opinions: count, attempted: present.length });

    if (count < minimumSources) {
      throw new ClassificationFailedError(
        `Insufficient data for analysis: only ${count} per-source classifications succeeded. ` +
        `Errors: ${JSON.stringify(runErrors)}`,
        'per_source',
        firstError
      );
    }
    return opinions;
  }
}

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  return new HypeCycleOrchestrator(deps);
}
