// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Loading
// ═══════════════════════════════════════════════════════════════════════════════
//
// loadConfig() reads the environment once and returns a validated value.
// Nothing here is cached: the composition root loads configuration and hands
// it to every factory explicitly.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  ConfigError,
  validateConfig,
  type AppConfig,
  type Environment,
} from './schema.js';

export {
  AppConfigSchema,
  ConfigError,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
  type AppConfig,
  type AppConfigInput,
  type Environment,
  type ClassifierConfig,
  type CollectorsConfig,
  type OrchestratorConfig,
  type CacheConfig,
  type LoggingConfig,
} from './schema.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(env: EnvSource, key: string): boolean | undefined {
  const value = env[key]?.trim().toLowerCase();
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

/**
 * Unparseable numbers pass through as NaN so validation reports them.
 */
function envNumber(env: EnvSource, key: string): number | undefined {
  const value = env[key]?.trim();
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

function envString(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function envList(env: EnvSource, key: string): string[] | undefined {
  const value = env[key];
  if (!value) return undefined;
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

export function isProductionLike(environment: Environment): boolean {
  return environment === 'production' || environment === 'staging';
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map environment variables onto the config input shape.
 * Unset variables stay undefined so schema defaults apply; the schema
 * decides whether the rest are valid.
 */
export function readEnvironment(env: EnvSource = process.env): Record<string, unknown> {
  const environment = envString(env, 'NODE_ENV');
  const productionLike = environment === 'production' || environment === 'staging';
  const debug = envBool(env, 'DEBUG');

  return {
    environment,
    version: envString(env, 'APP_VERSION'),
    server: {
      port: envNumber(env, 'PORT'),
      host: envString(env, 'HOST'),
      corsOrigins: envList(env, 'CORS_ORIGINS'),
    },
    logging: {
      level: debug ? 'debug' : envString(env, 'LOG_LEVEL'),
      json: envBool(env, 'LOG_JSON') ?? productionLike,
      redact: envBool(env, 'REDACT_SECRETS'),
    },
    classifier: {
      apiKey: envString(env, 'DEEPSEEK_API_KEY'),
      baseUrl: envString(env, 'DEEPSEEK_BASE_URL'),
      model: envString(env, 'DEEPSEEK_MODEL'),
      timeoutMs: envNumber(env, 'CLASSIFIER_TIMEOUT_MS'),
    },
    collectors: {
      envelopeTimeoutMs: envNumber(env, 'COLLECTOR_TIMEOUT_MS'),
      requestTimeoutMs: envNumber(env, 'COLLECTOR_REQUEST_TIMEOUT_MS'),
      semanticScholarApiKey: envString(env, 'SEMANTIC_SCHOLAR_API_KEY'),
      patentsViewApiKey: envString(env, 'PATENTSVIEW_API_KEY'),
    },
    cache: {
      ttlHours: envNumber(env, 'CACHE_TTL_HOURS'),
    },
    storage: {
      redisUrl: envString(env, 'REDIS_URL'),
    },
  };
}

/**
 * Load and validate configuration from the environment.
 *
 * Throws ConfigError when any value is invalid, and when the classifier
 * API key is missing in a production-like environment.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const config = validateConfig(readEnvironment(env));

  if (isProductionLike(config.environment) && !config.classifier.apiKey) {
    const issue = 'classifier.apiKey: DEEPSEEK_API_KEY is required in staging and production';
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }

  return config;
}
