// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFIER CLIENT — LLM Phase Classification over an OpenAI-Compatible API
// ═══════════════════════════════════════════════════════════════════════════════
//
// Three operations share one transport: per-source classification, synthesis
// and query expansion. Every call runs at a low fixed temperature under its own
// timeout and is attempted once. Failures come back as a ClassifierError:
//
//   rate_limited        HTTP 429
//   unauthenticated     HTTP 401 / 403
//   timed_out           per-call timeout or connection timeout
//   malformed_response  reply could not be parsed or failed validation
//   unavailable         anything else (5xx, network, missing credentials)
//
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';
import { ok, err, errorMessage, mapErr, type Result } from '../types/result.js';
import type { OpinionMap, PhaseOpinion, SourceName } from '../types/phases.js';
import type { ClassifierConfig } from '../config/schema.js';
import type { SourceMetrics } from '../collectors/types.js';
import type { TickerResolver } from '../collectors/finance.js';
import { getLogger } from '../logging/index.js';
import { parseOpinion, parseTerms, parseTickers, type ParseError } from './response-parser.js';
import { buildExpansionPrompt, buildSourcePrompt, buildSynthesisPrompt, buildTickerPrompt } from './prompts.js';

const logger = getLogger({ component: 'classifier' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ClassifierErrorKind =
  | 'rate_limited'
  | 'unauthenticated'
  | 'timed_out'
  | 'malformed_response'
  | 'unavailable';

export interface ClassifierError {
  readonly kind: ClassifierErrorKind;
  readonly message: string;
  readonly cause?: unknown;
}

export interface ClassifierClient {
  classifyOne(source: SourceName, metrics: SourceMetrics, keyword: string): Promise<Result<PhaseOpinion, ClassifierError>>;
  synthesize(keyword: string, opinions: OpinionMap): Promise<Result<PhaseOpinion, ClassifierError>>;
  /** Raw suggested terms; callers validate them */
  expandQuery(keyword: string): Promise<Result<string[], ClassifierError>>;
}

/**
 * Sends one prompt and resolves with the reply text.
 */
export type CompletionFn = (prompt: string, signal: AbortSignal) => Promise<string>;

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSPORT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Chat completion over the OpenAI SDK. SDK retries are disabled.
 */
export function createOpenAICompletion(config: ClassifierConfig): CompletionFn {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    maxRetries: 0,
    timeout: config.timeoutMs,
  });

  return async (prompt, signal) => {
    const response = await client.chat.completions.create(
      {
        model: config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: config.temperature,
        max_tokens: config.maxTokens,
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? '';
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

export function classifyError(error: unknown, timedOut: boolean, timeoutMs: number): ClassifierError {
  if (timedOut || error instanceof OpenAI.APIConnectionTimeoutError) {
    return { kind: 'timed_out', message: `Classifier request timed out after ${timeoutMs}ms`, cause: error };
  }

  if (error instanceof OpenAI.APIError) {
    if (error.status === 429) {
      return { kind: 'rate_limited', message: 'Classifier rate limited', cause: error };
    }
    if (error.status === 401 || error.status === 403) {
      return { kind: 'unauthenticated', message: 'Classifier authentication failed', cause: error };
    }
    if (error.status !== undefined) {
      return { kind: 'unavailable', message: `Classifier HTTP ${error.status}`, cause: error };
    }
  }

  return { kind: 'unavailable', message: `Classifier unavailable: ${errorMessage(error)}`, cause: error };
}

export function fromParseError(error: ParseError): ClassifierError {
  return { kind: 'malformed_response', message: `Malformed classifier response: ${error.message}`, cause: error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

export interface OpenAIClassifierClientOptions {
  readonly config: ClassifierConfig;
  /** Transport override; defaults to the OpenAI SDK */
  readonly complete?: CompletionFn;
}

export class OpenAIClassifierClient implements ClassifierClient, TickerResolver {
  private readonly complete: CompletionFn | null;
  private readonly timeoutMs: number;

  constructor(options: OpenAIClassifierClientOptions) {
    this.timeoutMs = options.config.timeoutMs;
    if (options.complete) {
      this.complete = options.complete;
    } else if (options.config.apiKey) {
      this.complete = createOpenAICompletion(options.config);
    } else {
      this.complete = null;
    }
  }

  async classifyOne(
    source: SourceName,
    metrics: SourceMetrics,
    keyword: string
  ): Promise<Result<PhaseOpinion, ClassifierError>> {
    const reply = await this.send(buildSourcePrompt(keyword, metrics));
    if (!reply.ok) return reply;

    const parsed = parseOpinion(reply.value);
    if (!parsed.ok) {
      logger.warn('Unparseable per-source reply', { source, kind: parsed.error.kind });
      return err(fromParseError(parsed.error));
    }
    return parsed;
  }

  async synthesize(keyword: string, opinions: OpinionMap): Promise<Result<PhaseOpinion, ClassifierError>> {
    const reply = await this.send(buildSynthesisPrompt(keyword, opinions));
    if (!reply.ok) return reply;

    return mapErr(parseOpinion(reply.value), fromParseError);
  }

  async expandQuery(keyword: string): Promise<Result<string[], ClassifierError>> {
    const reply = await this.send(buildExpansionPrompt(keyword));
    if (!reply.ok) return reply;

    return mapErr(parseTerms(reply.value), fromParseError);
  }

  async resolveTickers(keyword: string, signal?: AbortSignal): Promise<Result<readonly string[], string>> {
    const reply = await this.send(buildTickerPrompt(keyword), signal);
    if (!reply.ok) {
      return err(`Ticker lookup failed: ${reply.error.message}`);
    }

    return mapErr(parseTickers(reply.value), () => 'Failed to parse ticker lookup response');
  }

  /**
   * One attempt under the per-call timeout; an outer signal also cancels.
   */
  private async send(prompt: string, outer?: AbortSignal): Promise<Result<string, ClassifierError>> {
    if (!this.complete) {
      return err({ kind: 'unavailable', message: 'Classifier API key not configured' });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onOuterAbort = (): void => controller.abort();
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    const startTime = Date.now();
    try {
      const content = await this.complete(prompt, controller.signal);
      logger.time('Classifier call completed', startTime, { chars: content.length });
      return ok(content);
    } catch (error) {
      const classified = classifyError(error, timedOut, this.timeoutMs);
      logger.warn('Classifier call failed', { kind: classified.kind, reason: classified.message });
      return err(classified);
    } finally {
      clearTimeout(timeoutId);
      outer?.removeEventListener('abort', onOuterAbort);
    }
  }
}
