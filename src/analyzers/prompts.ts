// ═══════════════════════════════════════════════════════════════════════════════
// PROMPTS — Per-Source, Synthesis, Expansion and Ticker Prompts
// ═══════════════════════════════════════════════════════════════════════════════

import { SOURCE_LABELS, SOURCE_NAMES, type OpinionMap } from '../types/phases.js';
import type {
  FinanceFields,
  NewsFields,
  PapersFields,
  PatentsFields,
  SocialFields,
  SourceMetrics,
} from '../collectors/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PHASE DEFINITIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const PHASE_DEFINITIONS = `
The five Hype Cycle phases:
1. innovation_trigger (Innovation Trigger): a new concept appears; few mentions, papers and patents; early adopters experiment; engagement and citations are low and the focus is narrow.
2. peak (Peak of Inflated Expectations): every metric grows fast; social buzz is very high; publications and patents climb quickly; mainstream media picks it up; sentiment is optimistic and momentum accelerates.
3. trough (Trough of Disillusionment): mentions fall from their high; sentiment turns negative; publication and patent growth stalls or reverses; coverage drops; investors turn cautious as limitations become clear.
4. slope (Slope of Enlightenment): metrics stabilise after the trough; sentiment recovers; growth is steady; research and patents mature; practical applications and institutional adoption appear.
5. plateau (Plateau of Productivity): activity is sustained and moderate; sentiment is neutral because the technology is normal; publication and patent rates are stable; the field is broad and the market mature.
`;

const OPINION_REPLY_FORMAT =
  'Reply with a single JSON object and nothing else, no markdown:\n' +
  '{"phase": "innovation_trigger | peak | trough | slope | plateau", "confidence": <number between 0 and 1>, "reasoning": "<one or two sentences>"}';

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTING
// ─────────────────────────────────────────────────────────────────────────────────

function fixed(value: number, digits: number): string {
  return value.toFixed(digits);
}

function dollars(value: number): string {
  return `$${value.toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

function sourcePrompt(intro: string, lines: readonly string[], guidance: readonly string[], closing: string): string {
  return [
    intro,
    '',
    'Metrics:',
    ...lines.map((line) => `- ${line}`),
    PHASE_DEFINITIONS,
    'How to read these metrics:',
    ...guidance.map((line) => `- ${line}`),
    '',
    closing,
    '',
    OPINION_REPLY_FORMAT,
  ].join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────────
// PER-SOURCE PROMPTS
// ─────────────────────────────────────────────────────────────────────────────────

function socialPrompt(keyword: string, m: SocialFields): string {
  return sourcePrompt(
    `Classify the hype cycle phase of "${keyword}" from Hacker News discussion signals.`,
    [
      `Mentions: 30d=${m.mentions_30d}, 6m=${m.mentions_6m}, 1y=${m.mentions_1y}, total=${m.mentions_total}`,
      `Engagement: avg_points_30d=${fixed(m.avg_points_30d, 1)}, avg_comments_30d=${fixed(m.avg_comments_30d, 1)}`,
      `Sentiment: ${fixed(m.sentiment, 2)} (from -1.0 to 1.0)`,
      `Trends: growth=${m.growth_trend}, momentum=${m.momentum}`,
      `Recency: ${m.recency}`,
    ],
    [
      'innovation_trigger: under 50 mentions in total, little engagement, first buzz',
      'peak: more than 200 mentions in 30 days, sentiment above 0.5, accelerating momentum',
      'trough: mentions falling from an earlier high, sentiment turning negative',
      'slope: mentions stabilising, sentiment improving, steady growth',
      'plateau: steady moderate volume, neutral sentiment (0.0 to 0.3), stable trend',
    ],
    'Decide the phase these social signals point to.'
  );
}

function papersPrompt(keyword: string, m: PapersFields): string {
  return sourcePrompt(
    `Classify the hype cycle phase of "${keyword}" from Semantic Scholar research signals.`,
    [
      `Publications: 2y=${m.publications_2y}, 5y=${m.publications_5y}, total=${m.publications_total}`,
      `Citations: avg_2y=${fixed(m.avg_citations_2y, 1)}, avg_5y=${fixed(m.avg_citations_5y, 1)}`,
      `Citation velocity: ${fixed(m.citation_velocity, 2)} (positive means citations are accelerating)`,
      `Research maturity: ${m.research_maturity}`,
      `Research momentum: ${m.research_momentum}`,
      `Research breadth: ${m.research_breadth}`,
      `Author diversity: ${m.author_diversity}`,
      `Venue diversity: ${m.venue_diversity}`,
    ],
    [
      'innovation_trigger: fewer than 10 papers in 2 years, under 5 citations on average, narrow breadth',
      'peak: publications growing fast, accelerating momentum, broad research with many authors',
      'trough: publications declining, negative citation velocity, focus narrowing',
      'slope: steady publications, mature field, moderate citations, velocity improving',
      'plateau: stable publication rate, high citations, broad established field',
    ],
    'Decide the phase these research signals point to.'
  );
}

function patentsPrompt(keyword: string, m: PatentsFields): string {
  return sourcePrompt(
    `Classify the hype cycle phase of "${keyword}" from PatentsView filing signals.`,
    [
      `Patents: 2y=${m.patents_2y}, 5y=${m.patents_5y}, 10y=${m.patents_10y}, total=${m.patents_total}`,
      `Citations: avg_2y=${fixed(m.avg_citations_2y, 1)}, avg_5y=${fixed(m.avg_citations_5y, 1)}`,
      `Filing velocity: ${fixed(m.filing_velocity, 2)} (positive means filings are accelerating)`,
      `Unique assignees: ${m.unique_assignees}`,
      `Assignee concentration: ${m.assignee_concentration}`,
      `Geographic diversity: ${m.geographic_diversity} countries`,
      `Geographic reach: ${m.geographic_reach}`,
      `Patent maturity: ${m.patent_maturity}`,
      `Patent momentum: ${m.patent_momentum}`,
    ],
    [
      'innovation_trigger: fewer than 10 patents in 2 years, one to three assignees, domestic only',
      'peak: filings growing fast, more than 20 assignees, global reach, accelerating momentum',
      'trough: filings falling from a high, assignees consolidating, velocity slowing',
      'slope: steady filings, maturing portfolio, diverse assignees, moderate citations',
      'plateau: stable filing rate, established field, high citations, global coverage',
    ],
    'Decide the phase these patent signals point to.'
  );
}

function newsPrompt(keyword: string, m: NewsFields): string {
  return sourcePrompt(
    `Classify the hype cycle phase of "${keyword}" from GDELT news coverage signals.`,
    [
      `Articles: 30d=${m.articles_30d}, 3m=${m.articles_3m}, 1y=${m.articles_1y}, total=${m.articles_total}`,
      `Unique domains: ${m.unique_domains}`,
      `Geographic diversity: ${m.geographic_diversity} countries`,
      `Average tone: ${fixed(m.avg_tone, 2)} (from -1.0 to 1.0)`,
      `Media attention: ${m.media_attention}`,
      `Coverage trend: ${m.coverage_trend}`,
      `Sentiment trend: ${m.sentiment_trend}`,
      `Mainstream adoption: ${m.mainstream_adoption}`,
    ],
    [
      'innovation_trigger: under 50 articles, niche outlets, few domains and countries',
      'peak: more than 500 articles, mainstream outlets, many domains, positive tone, rising coverage',
      'trough: coverage falling from a high, tone turning negative, decreasing trend',
      'slope: coverage stabilising, tone improving, steady trend, wider range of outlets',
      'plateau: sustained moderate coverage, neutral tone, stable trend, mainstream domains',
    ],
    'Decide the phase this news coverage points to.'
  );
}

function financePrompt(keyword: string, m: FinanceFields): string {
  return sourcePrompt(
    `Classify the hype cycle phase of "${keyword}" from Yahoo Finance market signals of related companies.`,
    [
      `Companies found: ${m.companies_found}`,
      `Total market cap: ${dollars(m.total_market_cap)}`,
      `Average market cap: ${dollars(m.avg_market_cap)}`,
      `Price change: 1m=${fixed(m.avg_price_change_1m, 1)}%, 6m=${fixed(m.avg_price_change_6m, 1)}%, 2y=${fixed(m.avg_price_change_2y, 1)}%`,
      `Volatility: 1m=${fixed(m.avg_volatility_1m, 1)}%, 6m=${fixed(m.avg_volatility_6m, 1)}%`,
      `Volume trend: ${m.volume_trend}`,
      `Market maturity: ${m.market_maturity}`,
      `Investor sentiment: ${m.investor_sentiment}`,
      `Investment momentum: ${m.investment_momentum}`,
    ],
    [
      'A market cap of $0 means capitalisation was unavailable, not that the companies are worthless',
      'innovation_trigger: fewer than 3 companies, small total market cap, volatility above 30%',
      'peak: more than 10 companies, strong positive returns, high volatility, accelerating momentum, positive sentiment',
      'trough: returns falling from a high, negative price changes, very high volatility, negative sentiment',
      'slope: returns stabilising, sentiment improving, moderate volatility, steady momentum',
      'plateau: stable moderate returns, neutral sentiment, volatility under 15%, mature market',
    ],
    'Decide the phase these market signals point to.'
  );
}

/**
 * Source-specific classification prompt embedding the source's known metrics.
 */
export function buildSourcePrompt(keyword: string, metrics: SourceMetrics): string {
  switch (metrics.source) {
    case 'social':
      return socialPrompt(keyword, metrics.known);
    case 'papers':
      return papersPrompt(keyword, metrics.known);
    case 'patents':
      return patentsPrompt(keyword, metrics.known);
    case 'news':
      return newsPrompt(keyword, metrics.known);
    case 'finance':
      return financePrompt(keyword, metrics.known);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SYNTHESIS
// ─────────────────────────────────────────────────────────────────────────────────

export function buildSynthesisPrompt(keyword: string, opinions: OpinionMap): string {
  const summaries: string[] = [];
  SOURCE_NAMES.forEach((source, index) => {
    const opinion = opinions[source];
    if (!opinion) return;
    summaries.push([
      `${index + 1}. ${SOURCE_LABELS[source]}:`,
      `   Phase: ${opinion.phase}`,
      `   Confidence: ${fixed(opinion.confidence, 2)}`,
      `   Reasoning: ${opinion.reasoning}`,
    ].join('\n'));
  });

  return [
    `You are a technology analyst combining several independent assessments into one hype cycle position for "${keyword}".`,
    '',
    `${summaries.length} sources were assessed independently:`,
    '',
    summaries.join('\n\n'),
    PHASE_DEFINITIONS,
    'Combine these assessments into ONE final classification. Keep in mind:',
    '- Disagreement between sources can indicate a transition between phases',
    '- Give more weight to higher-confidence assessments',
    '- Social media moves ahead of academic validation',
    '- Patents and markets lag the hype but show real investment',
    '- News coverage tracks mainstream adoption',
    '- Fast signals (social, news) differ from slow ones (papers, patents)',
    '',
    'Reply with a single JSON object and nothing else, no markdown:',
    '{"phase": "innovation_trigger | peak | trough | slope | plateau", "confidence": <number between 0 and 1>, "reasoning": "<two or three sentences citing the key evidence>"}',
  ].join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXPANSION AND TICKERS
// ─────────────────────────────────────────────────────────────────────────────────

export function buildExpansionPrompt(keyword: string): string {
  return [
    `"${keyword}" is a niche technology with little direct discussion online.`,
    'List 3 to 5 closely related search terms that would find more material about the same technology:',
    '- synonyms, alternative names or common abbreviations',
    '- the broader field it belongs to, or its main techniques',
    '- no generic words such as "technology", "system" or "innovation"',
    '- each term at most a few words',
    '',
    'Reply with a single JSON object and nothing else, no markdown:',
    '{"terms": ["term one", "term two", "term three"]}',
  ].join('\n');
}

export function buildTickerPrompt(keyword: string): string {
  return [
    `List 5 to 10 US stock ticker symbols of public companies most invested in or building "${keyword}" technology.`,
    '- only valid US-listed symbols',
    '- companies for which this technology is a significant business',
    '- include large and emerging players where they exist',
    '',
    'Reply with a JSON array of symbols and nothing else, for example: ["IBM", "GOOGL", "NVDA"]',
  ].join('\n');
}
