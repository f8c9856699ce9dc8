// ═══════════════════════════════════════════════════════════════════════════════
// QUERY EXPANSION — Term Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, type Result } from '../types/result.js';

/**
 * Words too broad to narrow a search on their own.
 */
export const GENERIC_TERMS: ReadonlySet<string> = new Set([
  'technology',
  'technologies',
  'tech',
  'system',
  'systems',
  'innovation',
  'software',
  'platform',
  'solution',
  'solutions',
  'application',
  'applications',
  'tool',
  'tools',
  'research',
  'science',
]);

export const MAX_TERM_LENGTH = 60;

export interface ExpansionLimits {
  readonly min: number;
  readonly max: number;
}

const DEFAULT_LIMITS: ExpansionLimits = { min: 3, max: 5 };

/**
 * Clean the classifier's suggested terms. Drops empty, overlong and generic
 * terms, the keyword itself and case-insensitive duplicates, then keeps the
 * first `max`. Fewer than `min` survivors is an error.
 */
export function validateExpansionTerms(
  candidates: readonly string[],
  keyword: string,
  limits: ExpansionLimits = DEFAULT_LIMITS
): Result<string[], string> {
  const keywordKey = keyword.trim().toLowerCase();
  const seen = new Set<string>();
  const terms: string[] = [];

  for (const candidate of candidates) {
    const term = candidate.trim();
    const key = term.toLowerCase();

    if (!term || term.length > MAX_TERM_LENGTH) continue;
    if (GENERIC_TERMS.has(key) || key === keywordKey || seen.has(key)) continue;

    seen.add(key);
    terms.push(term);
  }

  if (terms.length < limits.min) {
    return err(`Only ${terms.length} valid terms (at least ${limits.min} required)`);
  }
  return ok(terms.slice(0, limits.max));
}
