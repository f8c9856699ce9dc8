// ═══════════════════════════════════════════════════════════════════════════════
// PHASE TYPES — Hype Cycle Phases, Sources and Opinions
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// PHASES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * The five adoption-curve stages, in curve order.
 */
export const PHASES = [
  'innovation_trigger',
  'peak',
  'trough',
  'slope',
  'plateau',
] as const;

export type Phase = typeof PHASES[number];

// ─────────────────────────────────────────────────────────────────────────────────
// SOURCES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Collector sources. The order is the order used in prompts and responses.
 */
export const SOURCE_NAMES = ['social', 'papers', 'patents', 'news', 'finance'] as const;

export type SourceName = typeof SOURCE_NAMES[number];

/**
 * Sources re-run with expanded terms when niche detection fires.
 * Finance is never re-fetched.
 */
export const EXPANDABLE_SOURCES: readonly SourceName[] = ['social', 'papers', 'patents', 'news'];

/**
 * Display labels used in the synthesis prompt.
 */
export const SOURCE_LABELS: Readonly<Record<SourceName, string>> = {
  social: 'Social Media (Hacker News)',
  papers: 'Academic Research (Semantic Scholar)',
  patents: 'Patents (PatentsView)',
  news: 'News Coverage (GDELT)',
  finance: 'Financial Markets (Yahoo Finance)',
};

// ─────────────────────────────────────────────────────────────────────────────────
// OPINIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One classifier verdict. Confidence is always within [0, 1];
 * values outside that range are rejected at parse time, never clamped.
 */
export interface PhaseOpinion {
  readonly phase: Phase;
  readonly confidence: number;
  readonly reasoning: string;
}

/**
 * The synthesized verdict across all per-source opinions.
 */
export type FinalOpinion = PhaseOpinion;

/**
 * Per-source opinions keyed by source. Holds 0 to 5 entries.
 */
export type OpinionMap = Partial<Record<SourceName, PhaseOpinion>>;
