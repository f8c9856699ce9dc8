// ═══════════════════════════════════════════════════════════════════════════════
// NICHE DETECTOR — Sparse Social Signal Predicate
// ═══════════════════════════════════════════════════════════════════════════════

import type { SocialMetrics } from '../collectors/types.js';

export interface NicheThresholds {
  readonly mentions30d: number;
  readonly mentionsTotal: number;
}

export const DEFAULT_NICHE_THRESHOLDS: NicheThresholds = {
  mentions30d: 50,
  mentionsTotal: 100,
};

/**
 * True when social mentions are below either threshold.
 * An absent social result never counts as niche.
 */
export function isNiche(
  social: SocialMetrics | null | undefined,
  thresholds: NicheThresholds = DEFAULT_NICHE_THRESHOLDS
): boolean {
  if (!social) return false;
  const { mentions_30d, mentions_total } = social.known;
  return mentions_30d < thresholds.mentions30d || mentions_total < thresholds.mentionsTotal;
}
