// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE ASSEMBLER — ClassificationResult Construction
// ═══════════════════════════════════════════════════════════════════════════════
//
// The cache-hit and fresh paths both end here, so both produce the same shape
// with keys in the same order.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { SOURCE_NAMES, type FinalOpinion, type OpinionMap, type Phase, type SourceName } from '../types/phases.js';
import type { MetricsSnapshot } from '../collectors/types.js';

export type CollectorData = Record<SourceName, MetricsSnapshot | null>;

export interface ExpansionState {
  readonly applied: boolean;
  readonly terms: readonly string[];
}

export const NO_EXPANSION: ExpansionState = { applied: false, terms: [] };

/**
 * Externally visible classification record (JSON field names).
 */
export interface ClassificationResult {
  keyword: string;
  phase: Phase;
  confidence: number;
  reasoning: string;
  /** Creation time, ISO-8601 */
  timestamp: string;
  cache_hit: boolean;
  expires_at: string;
  per_source_analyses: OpinionMap;
  collector_data: CollectorData;
  collectors_succeeded: number;
  partial_data: boolean;
  errors: string[];
  query_expansion_applied: boolean;
  expanded_terms: string[];
}

export interface AssemblyInput {
  readonly keyword: string;
  readonly final: FinalOpinion;
  readonly opinions: OpinionMap;
  readonly collectorData: Partial<CollectorData>;
  readonly expansion: ExpansionState;
  readonly errors: readonly string[];
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly cacheHit: boolean;
}

export function assembleResult(input: AssemblyInput): ClassificationResult {
  const pick = (source: SourceName): MetricsSnapshot | null => input.collectorData[source] ?? null;
  const collectorData: CollectorData = {
    social: pick('social'),
    papers: pick('papers'),
    patents: pick('patents'),
    news: pick('news'),
    finance: pick('finance'),
  };

  const opinions: OpinionMap = {};
  for (const source of SOURCE_NAMES) {
    const opinion = input.opinions[source];
    if (opinion) {
      opinions[source] = { phase: opinion.phase, confidence: opinion.confidence, reasoning: opinion.reasoning };
    }
  }

  const succeeded = SOURCE_NAMES.filter((source) => collectorData[source] !== null).length;

  return {
    keyword: input.keyword,
    phase: input.final.phase,
    confidence: input.final.confidence,
    reasoning: input.final.reasoning,
    timestamp: input.createdAt,
    cache_hit: input.cacheHit,
    expires_at: input.expiresAt,
    per_source_analyses: opinions,
    collector_data: collectorData,
    collectors_succeeded: succeeded,
    partial_data: succeeded < SOURCE_NAMES.length,
    errors: [...input.errors],
    query_expansion_applied: input.expansion.applied,
    expanded_terms: [...input.expansion.terms],
  };
}
