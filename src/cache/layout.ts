// ═══════════════════════════════════════════════════════════════════════════════
// CACHE LAYOUT — ClassificationResult <-> Stored Row
// ═══════════════════════════════════════════════════════════════════════════════
//
// One row per classification. Collector metrics, per-source opinions and
// expansion terms are stored as JSON text; the storage layer treats them as
// opaque. Rows are validated with zod when read back.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ok, err, type Result } from '../types/result.js';
import { PHASES, type SourceName } from '../types/phases.js';
import { OpinionSchema } from '../analyzers/response-parser.js';
import {
  assembleResult,
  type ClassificationResult,
  type CollectorData,
} from '../analyzers/response-assembler.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ROW
// ─────────────────────────────────────────────────────────────────────────────────

export const CacheRowSchema = z.object({
  keyword: z.string(),
  phase: z.enum(PHASES),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  social_data: z.string().nullable(),
  papers_data: z.string().nullable(),
  patents_data: z.string().nullable(),
  news_data: z.string().nullable(),
  finance_data: z.string().nullable(),
  per_source_analyses_data: z.string().nullable(),
  query_expansion_applied: z.boolean(),
  expanded_terms_data: z.string().nullable(),
  created_at: z.string().datetime(),
  expires_at: z.string().datetime(),
});

export type CacheRow = z.infer<typeof CacheRowSchema>;

const SnapshotSchema = z.record(z.unknown());

const OpinionMapSchema = z.object({
  social: OpinionSchema.optional(),
  papers: OpinionSchema.optional(),
  patents: OpinionSchema.optional(),
  news: OpinionSchema.optional(),
  finance: OpinionSchema.optional(),
});

const TermsSchema = z.array(z.string());

// ─────────────────────────────────────────────────────────────────────────────────
// SERIALIZE
// ─────────────────────────────────────────────────────────────────────────────────

function blob(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

export function toCacheRow(result: ClassificationResult): CacheRow {
  const data = result.collector_data;
  return {
    keyword: result.keyword,
    phase: result.phase,
    confidence: result.confidence,
    reasoning: result.reasoning,
    social_data: blob(data.social),
    papers_data: blob(data.papers),
    patents_data: blob(data.patents),
    news_data: blob(data.news),
    finance_data: blob(data.finance),
    per_source_analyses_data: blob(result.per_source_analyses),
    query_expansion_applied: result.query_expansion_applied,
    expanded_terms_data: blob(result.expanded_terms),
    created_at: result.timestamp,
    expires_at: result.expires_at,
  };
}

export function serializeRow(row: CacheRow): string {
  return JSON.stringify(row);
}

// ─────────────────────────────────────────────────────────────────────────────────
// DESERIALIZE
// ─────────────────────────────────────────────────────────────────────────────────

function decodeBlob<T>(text: string | null, schema: z.ZodType<T>, field: string): Result<T | null, string> {
  if (text === null) return ok(null);
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return err(`${field} is not valid JSON`);
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(`${field} failed validation`);
}

export function parseRow(text: string): Result<CacheRow, string> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return err('Cache row is not valid JSON');
  }
  const parsed = CacheRowSchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err('Cache row failed validation');
}

/**
 * Rebuild the result a cache hit returns: `cache_hit` set, no errors.
 */
export function fromCacheRow(row: CacheRow): Result<ClassificationResult, string> {
  const collectorData: Partial<CollectorData> = {};
  const columns: ReadonlyArray<[SourceName, string | null]> = [
    ['social', row.social_data],
    ['papers', row.papers_data],
    ['patents', row.patents_data],
    ['news', row.news_data],
    ['finance', row.finance_data],
  ];
  for (const [source, text] of columns) {
    const decoded = decodeBlob(text, SnapshotSchema, `${source}_data`);
    if (!decoded.ok) return decoded;
    collectorData[source] = decoded.value;
  }

  const opinions = decodeBlob(row.per_source_analyses_data, OpinionMapSchema, 'per_source_analyses_data');
  if (!opinions.ok) return opinions;

  const terms = decodeBlob(row.expanded_terms_data, TermsSchema, 'expanded_terms_data');
  if (!terms.ok) return terms;

  return ok(assembleResult({
    keyword: row.keyword,
    final: { phase: row.phase, confidence: row.confidence, reasoning: row.reasoning },
    opinions: opinions.value ?? {},
    collectorData,
    expansion: { applied: row.query_expansion_applied, terms: terms.value ?? [] },
    errors: [],
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    cacheHit: true,
  }));
}
