// ═══════════════════════════════════════════════════════════════════════════════
// FINANCE COLLECTOR — Yahoo Finance Chart Data for Related Tickers
// ═══════════════════════════════════════════════════════════════════════════════
//
// Tickers come from a TickerResolver (an LLM lookup in production) and fall
// back to broad technology ETFs. Each ticker's two-year daily chart is sliced
// into 1-month and 6-month windows.
//
// The chart API carries no market capitalisation, so total and average caps
// are reported as 0 and maturity is judged on volatility alone.
//
// Expansion terms are ignored: tickers depend on the keyword only.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, type Result } from '../types/result.js';
import type { Collector, CollectorOutcome, FinanceFields, Maturity, Momentum, Trend } from './types.js';
import { arrayField, fetchJson, isRecord, round, stringField, DAY_MS, type FetchLike } from './http.js';

const CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart/';
const TICKER_PATTERN = /^[A-Z]{1,5}$/;
const MAX_TICKERS = 10;
const TRADING_DAYS = 252;

export const FALLBACK_TICKERS: readonly string[] = ['QQQ', 'XLK'];

// ─────────────────────────────────────────────────────────────────────────────────
// TICKER RESOLUTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Maps a technology keyword to candidate ticker symbols. Implementations
 * return the raw candidates; validation happens here.
 */
export interface TickerResolver {
  resolveTickers(keyword: string, signal?: AbortSignal): Promise<Result<readonly string[], string>>;
}

/**
 * Uppercase, trim and keep well-formed symbols (at most ten, no duplicates).
 */
export function normalizeTickers(candidates: readonly string[]): { tickers: string[]; rejected: string[] } {
  const tickers: string[] = [];
  const rejected: string[] = [];

  for (const candidate of candidates) {
    const symbol = candidate.trim().toUpperCase();
    if (!symbol) continue;
    if (!TICKER_PATTERN.test(symbol)) {
      rejected.push(symbol);
      continue;
    }
    if (!tickers.includes(symbol) && tickers.length < MAX_TICKERS) {
      tickers.push(symbol);
    }
  }

  return { tickers, rejected };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PRICE SERIES
// ─────────────────────────────────────────────────────────────────────────────────

export interface PricePoint {
  /** Epoch milliseconds */
  readonly time: number;
  readonly close: number;
  readonly volume: number;
}

export interface TickerMetrics {
  readonly ticker: string;
  readonly name: string;
  /** Fractional changes, 0.15 = +15% */
  readonly priceChange1m: number;
  readonly priceChange6m: number;
  readonly priceChange2y: number;
  readonly avgVolume1m: number;
  readonly avgVolume6m: number;
  /** Annualized, fractional */
  readonly volatility1m: number;
  readonly volatility6m: number;
}

/**
 * Daily points from a chart response. Days with a missing close are skipped.
 */
export function parseChart(body: unknown): { name: string; points: PricePoint[] } | null {
  const chart = isRecord(body) ? body.chart : undefined;
  const result = arrayField(chart, 'result')[0];
  if (!isRecord(result)) return null;

  const timestamps = arrayField(result, 'timestamp');
  const quote = arrayField(result.indicators, 'quote')[0];
  const closes = arrayField(quote, 'close');
  const volumes = arrayField(quote, 'volume');

  const points: PricePoint[] = [];
  timestamps.forEach((timestamp, i) => {
    const close = closes[i];
    if (typeof timestamp !== 'number' || typeof close !== 'number') return;
    const volume = volumes[i];
    points.push({
      time: timestamp * 1000,
      close,
      volume: typeof volume === 'number' ? volume : 0,
    });
  });

  const meta = result.meta;
  const symbol = stringField(meta, 'symbol');
  const name = stringField(meta, 'longName') || stringField(meta, 'shortName') || symbol;
  return { name, points };
}

export function priceChange(points: readonly PricePoint[]): number {
  if (points.length < 2) return 0;
  const start = points[0].close;
  const end = points[points.length - 1].close;
  if (start === 0) return 0;
  return (end - start) / start;
}

export function averageVolume(points: readonly PricePoint[]): number {
  if (points.length === 0) return 0;
  return points.reduce((sum, point) => sum + point.volume, 0) / points.length;
}

/**
 * Sample standard deviation of daily returns, annualized over 252 trading days.
 */
export function annualizedVolatility(points: readonly PricePoint[]): number {
  const returns: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const previous = points[i - 1].close;
    if (previous !== 0) {
      returns.push((points[i].close - previous) / previous);
    }
  }
  if (returns.length < 2) return 0;

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS);
}

export function tickerMetrics(ticker: string, name: string, points: readonly PricePoint[], now: Date): TickerMetrics {
  const since = (days: number): PricePoint[] => {
    const cutoff = now.getTime() - days * DAY_MS;
    return points.filter((point) => point.time >= cutoff);
  };
  const month = since(30);
  const halfYear = since(182);

  return {
    ticker,
    name: name || ticker,
    priceChange1m: priceChange(month),
    priceChange6m: priceChange(halfYear),
    priceChange2y: priceChange(points),
    avgVolume1m: averageVolume(month),
    avgVolume6m: averageVolume(halfYear),
    volatility1m: annualizedVolatility(month),
    volatility6m: annualizedVolatility(halfYear),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVED METRICS (fractional inputs)
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Large caps with low volatility are mature; small caps or volatility above 60%
 * are emerging.
 */
export function marketMaturity(totalMarketCap: number, avgVolatility: number): Maturity {
  if (totalMarketCap > 100_000_000_000 && avgVolatility < 0.3) return 'mature';
  if (avgVolatility > 0.6) return 'emerging';
  if (totalMarketCap > 0 && totalMarketCap < 10_000_000_000) return 'emerging';
  return 'developing';
}

export function investorSentiment(change1m: number, change6m: number): FinanceFields['investor_sentiment'] {
  const weighted = change1m * 0.6 + change6m * 0.4;
  if (weighted > 0.05) return 'positive';
  if (weighted < -0.05) return 'negative';
  return 'neutral';
}

export function investmentMomentum(change1m: number, change6m: number, change2y: number): Momentum {
  if (change1m > change6m && change6m > change2y / 4) return 'accelerating';
  if (change1m < change6m / 2 || (change1m < 0 && change6m > 0)) return 'decelerating';
  return 'steady';
}

export function volumeTrend(avgVolume1m: number, avgVolume6m: number): Trend {
  if (avgVolume6m === 0) return 'stable';
  const change = (avgVolume1m - avgVolume6m) / avgVolume6m;
  if (change > 0.15) return 'increasing';
  if (change < -0.15) return 'decreasing';
  return 'stable';
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLECTOR
// ─────────────────────────────────────────────────────────────────────────────────

export interface FinanceCollectorOptions {
  readonly timeoutMs: number;
  readonly resolver?: TickerResolver;
  readonly fetchFn?: FetchLike;
  readonly now?: () => Date;
}

export class FinanceCollector implements Collector<'finance'> {
  readonly source = 'finance' as const;

  constructor(private readonly options: FinanceCollectorOptions) {}

  async fetch(
    keyword: string,
    _terms: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<CollectorOutcome<'finance'>> {
    const now = this.options.now?.() ?? new Date();
    const errors: string[] = [];

    const tickers = await this.tickersFor(keyword, errors, signal);
    const fetched = await Promise.all(tickers.map((ticker) => this.fetchTicker(ticker, now, errors, signal)));
    const valid = fetched.filter((metrics): metrics is TickerMetrics => metrics !== null);

    if (valid.length === 0) {
      return err({ source: this.source, reason: 'All ticker fetches failed', errors });
    }

    const change1m = mean(valid.map((t) => t.priceChange1m));
    const change6m = mean(valid.map((t) => t.priceChange6m));
    const change2y = mean(valid.map((t) => t.priceChange2y));
    const volume1m = mean(valid.map((t) => t.avgVolume1m));
    const volume6m = mean(valid.map((t) => t.avgVolume6m));
    const volatility1m = mean(valid.map((t) => t.volatility1m));
    const volatility6m = mean(valid.map((t) => t.volatility6m));

    const known: FinanceFields = {
      companies_found: valid.length,
      total_market_cap: 0,
      avg_market_cap: 0,
      avg_price_change_1m: round(change1m * 100),
      avg_price_change_6m: round(change6m * 100),
      avg_price_change_2y: round(change2y * 100),
      avg_volatility_1m: round(volatility1m * 100),
      avg_volatility_6m: round(volatility6m * 100),
      volume_trend: volumeTrend(volume1m, volume6m),
      market_maturity: marketMaturity(0, volatility6m),
      investor_sentiment: investorSentiment(change1m, change6m),
      investment_momentum: investmentMomentum(change1m, change6m, change2y),
    };

    const topCompanies = [...valid]
      .sort((a, b) => b.priceChange6m - a.priceChange6m)
      .slice(0, 5)
      .map((t) => ({
        ticker: t.ticker,
        name: t.name,
        price_change_1m: round(t.priceChange1m * 100),
        price_change_6m: round(t.priceChange6m * 100),
      }));

    return ok({
      source: this.source,
      keyword,
      collectedAt: now.toISOString(),
      expandedTerms: [],
      known,
      extra: {
        tickers: valid.map((t) => t.ticker),
        avg_volume_1m: round(volume1m),
        avg_volume_6m: round(volume6m),
        top_companies: topCompanies,
      },
      errors,
    });
  }

  /**
   * Resolved on every call: a later analysis of the same keyword gets a fresh lookup.
   */
  private async tickersFor(keyword: string, errors: string[], signal?: AbortSignal): Promise<readonly string[]> {
    if (!this.options.resolver) {
      errors.push('Ticker lookup not configured, using fallback ETFs');
      return FALLBACK_TICKERS;
    }

    const resolved = await this.options.resolver.resolveTickers(keyword, signal);
    if (!resolved.ok) {
      errors.push(resolved.error);
      return FALLBACK_TICKERS;
    }

    const { tickers, rejected } = normalizeTickers(resolved.value);
    for (const symbol of rejected) {
      errors.push(`Invalid ticker format: ${symbol}`);
    }
    if (tickers.length === 0) {
      errors.push('No valid tickers after validation');
      return FALLBACK_TICKERS;
    }

    return tickers;
  }

  private async fetchTicker(
    ticker: string,
    now: Date,
    errors: string[],
    signal?: AbortSignal
  ): Promise<TickerMetrics | null> {
    const result = await fetchJson({
      url: `${CHART_URL}${encodeURIComponent(ticker)}`,
      query: { range: '2y', interval: '1d' },
      timeoutMs: this.options.timeoutMs,
      signal,
    }, this.options.fetchFn);

    if (!result.ok) {
      errors.push(`${ticker}: ${result.error}`);
      return null;
    }

    const chart = parseChart(result.value);
    if (!chart) {
      errors.push(`Ticker ${ticker} not found`);
      return null;
    }
    if (chart.points.length === 0) {
      errors.push(`No data for ${ticker}`);
      return null;
    }

    return tickerMetrics(ticker, chart.name, chart.points, now);
  }
}
