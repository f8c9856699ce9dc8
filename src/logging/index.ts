// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Request Correlation
// ═══════════════════════════════════════════════════════════════════════════════

import type { LoggingConfig } from '../config/schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  component?: string;
  keyword?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  requestId?: string;
  component?: string;
  keyword?: string;
}

export type LogSettings = LoggingConfig;

// ─────────────────────────────────────────────────────────────────────────────────
// SECRET REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const SECRET_PATTERNS = [
  { pattern: /Bearer\s+[A-Za-z0-9._~+/-]+=*/g, replacement: 'Bearer [REDACTED]' },
  { pattern: /\bsk-[A-Za-z0-9]{8,}\b/g, replacement: '[API_KEY]' },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

export function redactSecrets(text: string): string {
  let result = text;
  for (const { pattern, replacement } of SECRET_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

export function redactObject(obj: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (typeof obj === 'string') {
    return redactSecrets(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redactObject(item, depth + 1));
  }

  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = redactObject(value, depth + 1);
      }
    }
    return result;
  }

  return obj;
}

function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    const lowerKey = key.toLowerCase();
    redacted[key] = SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))
      ? '[REDACTED]'
      : redactObject(value, 1);
  }
  return redacted;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

// Shared by every logger so configureLogging() reaches existing children.
const settings: LogSettings = {
  level: 'info',
  json: false,
  redact: true,
};

/**
 * Apply logging settings to the root logger and all children.
 */
export function configureLogging(next: Partial<LogSettings>): void {
  Object.assign(settings, next);
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  private formatEntry(level: LogLevel, message: string, extra?: Partial<LogEntry>): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: settings.redact ? redactSecrets(message) : message,
      ...this.context,
      ...extra,
    };

    if (settings.redact && entry.metadata) {
      entry.metadata = redactMetadata(entry.metadata);
    }

    if (settings.redact && entry.error) {
      entry.error = {
        ...entry.error,
        message: redactSecrets(entry.error.message),
      };
    }

    return entry;
  }

  private output(entry: LogEntry): void {
    if (settings.json) {
      console.log(JSON.stringify(entry));
      return;
    }

    const prefix = entry.requestId ? `[${entry.requestId.slice(0, 8)}]` : '';
    const component = entry.component ? `[${entry.component}]` : '';
    const keyword = entry.keyword ? ` "${entry.keyword}"` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';

    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
      fatal: '\x1b[35m', // magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    console.log(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} ${prefix}${component} ${entry.message}${keyword}${duration}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      console.log('  ', JSON.stringify(entry.metadata));
    }

    if (entry.error) {
      console.log(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        console.log('  ', entry.error.stack.split('\n').slice(1, 4).join('\n  '));
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, settings.level)) return;
    this.output(this.formatEntry(level, message, extra));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('error', message, { metadata, error: describeError(error) });
  }

  fatal(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, { metadata, error: describeError(error) });
  }

  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    const duration = Date.now() - startTime;
    this.log('info', message, { duration, metadata });
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context });
  }
}

function describeError(error: unknown): LogEntry['error'] {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST LOGGER (for HTTP requests)
// ─────────────────────────────────────────────────────────────────────────────────

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  requestId: string;
  userAgent?: string;
  error?: Error;
}

export function logRequest(data: RequestLogData): void {
  const logger = getLogger({ requestId: data.requestId, component: 'http' });

  const message = `${data.method} ${data.path} ${data.statusCode}`;
  const metadata = { userAgent: data.userAgent };

  if (data.statusCode >= 500) {
    logger.error(message, data.error, { ...metadata, duration: data.duration });
  } else if (data.statusCode >= 400) {
    logger.warn(message, { ...metadata, duration: data.duration });
  } else {
    logger.time(message, Date.now() - data.duration, metadata);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

const rootLogger = new Logger();

export function getLogger(context?: LogContext): Logger {
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}
