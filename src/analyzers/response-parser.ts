// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE PARSER — Structured Payloads from LLM Replies
// ═══════════════════════════════════════════════════════════════════════════════
//
// Replies are decoded in two steps:
//   1. Direct JSON.parse of the trimmed reply
//   2. One bounded extraction: fenced ```json blocks first, then balanced
//      {...} spans found by a string-aware scan
//
// The decoded value must satisfy the zod schema. Nothing is clamped or
// defaulted: a confidence of 1.2 or an unknown phase is a schema error.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ok, err, type Result } from '../types/result.js';
import { PHASES, type PhaseOpinion } from '../types/phases.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const OpinionSchema = z.object({
  phase: z.enum(PHASES),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
});

export const TermsSchema = z.object({
  terms: z.array(z.string()),
});

export const TickersSchema = z.array(z.string());

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export type ParseErrorKind = 'invalid_json' | 'no_payload' | 'schema';

export interface ParseError {
  readonly kind: ParseErrorKind;
  readonly message: string;
  /** Zod issues as `path: message` lines */
  readonly issues?: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXTRACTION
// ─────────────────────────────────────────────────────────────────────────────────

/** Replies longer than this are not scanned for embedded payloads */
const MAX_SCAN_LENGTH = 50_000;

/** At most this many candidate spans are tried */
const MAX_CANDIDATES = 20;

const FENCE_PATTERN = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g;

/**
 * Balanced {...} or [...] spans, outermost first, in order of appearance.
 * Brackets inside JSON strings are ignored.
 */
export function findBalancedSpans(text: string, open: '{' | '[' = '{'): string[] {
  const close = open === '{' ? '}' : ']';
  const spans: string[] = [];
  let i = 0;

  while (i < text.length && spans.length < MAX_CANDIDATES) {
    const start = text.indexOf(open, i);
    if (start === -1) break;

    let depth = 0;
    let inString = false;
    let escaped = false;
    let end = -1;

    for (let j = start; j < text.length; j++) {
      const ch = text[j];
      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }
      if (ch === '"') {
        inString = true;
      } else if (ch === open) {
        depth++;
      } else if (ch === close) {
        depth--;
        if (depth === 0) {
          end = j;
          break;
        }
      }
    }

    if (end === -1) {
      i = start + 1;
      continue;
    }
    spans.push(text.slice(start, end + 1));
    i = end + 1;
  }

  return spans;
}

/**
 * Candidate payload strings embedded in a free-text reply.
 */
export function extractCandidates(text: string, open: '{' | '[' = '{'): string[] {
  if (text.length > MAX_SCAN_LENGTH) return [];

  const candidates: string[] = [];
  for (const match of text.matchAll(FENCE_PATTERN)) {
    const body = match[1].trim();
    if (body) candidates.push(body);
    if (candidates.length >= MAX_CANDIDATES) return candidates;
  }
  for (const span of findBalancedSpans(text, open)) {
    if (!candidates.includes(span)) candidates.push(span);
    if (candidates.length >= MAX_CANDIDATES) break;
  }
  return candidates;
}

function tryJson(text: string): { parsed: true; value: unknown } | { parsed: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { parsed: true, value };
  } catch {
    return { parsed: false };
  }
}

function schemaError(error: z.ZodError): ParseError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return { kind: 'schema', message: `Response failed validation: ${issues.join('; ')}`, issues };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Decode a reply against a schema.
 */
export function parseStructured<T>(
  content: string,
  schema: z.ZodType<T>,
  open: '{' | '[' = '{'
): Result<T, ParseError> {
  const trimmed = content.trim();
  if (!trimmed) {
    return err({ kind: 'no_payload', message: 'Empty response' });
  }

  const direct = tryJson(trimmed);
  if (direct.parsed) {
    const validated = schema.safeParse(direct.value);
    return validated.success ? ok(validated.data) : err(schemaError(validated.error));
  }

  const candidates = extractCandidates(trimmed, open);
  if (candidates.length === 0) {
    return err({ kind: 'no_payload', message: 'No structured payload found in response' });
  }

  let firstSchemaError: ParseError | null = null;
  for (const candidate of candidates) {
    const decoded = tryJson(candidate);
    if (!decoded.parsed) continue;

    const validated = schema.safeParse(decoded.value);
    if (validated.success) {
      return ok(validated.data);
    }
    firstSchemaError ??= schemaError(validated.error);
  }

  return err(firstSchemaError ?? { kind: 'invalid_json', message: 'Embedded payload is not valid JSON' });
}

export function parseOpinion(content: string): Result<PhaseOpinion, ParseError> {
  return parseStructured(content, OpinionSchema);
}

export function parseTerms(content: string): Result<string[], ParseError> {
  const parsed = parseStructured(content, TermsSchema);
  return parsed.ok ? ok(parsed.value.terms) : parsed;
}

export function parseTickers(content: string): Result<string[], ParseError> {
  return parseStructured(content, TickersSchema, '[');
}
