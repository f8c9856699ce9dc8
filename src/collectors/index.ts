// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTORS — Module Exports and Factory
// ═══════════════════════════════════════════════════════════════════════════════

import type { CollectorsConfig } from '../config/schema.js';
import type { CollectorSet } from './types.js';
import type { FetchLike } from './http.js';
import { SocialCollector } from './social.js';
import { PapersCollector } from './papers.js';
import { PatentsCollector } from './patents.js';
import { NewsCollector } from './news.js';
import { FinanceCollector, type TickerResolver } from './finance.js';

export * from './types.js';
export { fetchJson, buildOrQuery, type FetchLike, type JsonRequest } from './http.js';
export { SocialCollector } from './social.js';
export { PapersCollector } from './papers.js';
export { PatentsCollector } from './patents.js';
export { NewsCollector } from './news.js';
export { FinanceCollector, FALLBACK_TICKERS, normalizeTickers, type TickerResolver } from './finance.js';

/**
 * Build the five collectors keyed by source.
 */
export function createCollectors(
  config: CollectorsConfig,
  tickerResolver?: TickerResolver,
  fetchFn?: FetchLike
): CollectorSet {
  const timeoutMs = config.requestTimeoutMs;
  return {
    social: new SocialCollector({ timeoutMs, fetchFn }),
    papers: new PapersCollector({ timeoutMs, apiKey: config.semanticScholarApiKey, fetchFn }),
    patents: new PatentsCollector({ timeoutMs, apiKey: config.patentsViewApiKey, fetchFn }),
    news: new NewsCollector({ timeoutMs, fetchFn }),
    finance: new FinanceCollector({ timeoutMs, resolver: tickerResolver, fetchFn }),
  };
}
