// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Validation for Application Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);

export type Environment = z.infer<typeof EnvironmentSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

const ServerSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8000),
  host: z.string().min(1).default('0.0.0.0'),
  corsOrigins: z.array(z.string().min(1)).default(['*']),
}).default({});

const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  json: z.boolean().default(false),
  redact: z.boolean().default(true),
}).default({});

const ClassifierSchema = z.object({
  /** Bearer credential for the OpenAI-compatible endpoint */
  apiKey: z.string().optional(),
  baseUrl: z.string().url().default('https://api.deepseek.com/v1'),
  model: z.string().min(1).default('deepseek-chat'),
  temperature: z.number().min(0).max(2).default(0.3),
  timeoutMs: z.number().int().positive().default(60_000),
  maxTokens: z.number().int().positive().default(800),
}).default({});

const CollectorsSchema = z.object({
  /** One envelope around the whole fan-out, not per collector */
  envelopeTimeoutMs: z.number().int().positive().default(120_000),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  semanticScholarApiKey: z.string().optional(),
  patentsViewApiKey: z.string().optional(),
}).default({});

const OrchestratorSchema = z.object({
  minimumSources: z.number().int().min(1).max(5).default(3),
  nicheMentions30d: z.number().int().nonnegative().default(50),
  nicheMentionsTotal: z.number().int().nonnegative().default(100),
  minExpansionTerms: z.number().int().min(3).max(5).default(3),
  maxExpansionTerms: z.number().int().min(3).max(5).default(5),
}).default({}).refine(
  (value) => value.minExpansionTerms <= value.maxExpansionTerms,
  { message: 'minExpansionTerms must not exceed maxExpansionTerms', path: ['minExpansionTerms'] }
);

const CacheSchema = z.object({
  ttlHours: z.number().positive().default(24),
  historyLimit: z.number().int().min(1).default(10),
  keyPrefix: z.string().default('hype:'),
}).default({});

const StorageSchema = z.object({
  redisUrl: z.string().url().optional(),
}).default({});

// ─────────────────────────────────────────────────────────────────────────────────
// APP CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  version: z.string().min(1).default('1.0.0'),
  server: ServerSchema,
  logging: LoggingSchema,
  classifier: ClassifierSchema,
  collectors: CollectorsSchema,
  orchestrator: OrchestratorSchema,
  cache: CacheSchema,
  storage: StorageSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

export type ClassifierConfig = AppConfig['classifier'];
export type CollectorsConfig = AppConfig['collectors'];
export type OrchestratorConfig = AppConfig['orchestrator'];
export type CacheConfig = AppConfig['cache'];
export type LoggingConfig = AppConfig['logging'];

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Render zod issues as `path: message` lines.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw config input; throws ConfigError listing every invalid path.
 */
export function validateConfig(input: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatConfigErrors(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function safeValidateConfig(input: unknown): z.SafeParseReturnType<AppConfigInput, AppConfig> {
  return AppConfigSchema.safeParse(input);
}

export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
