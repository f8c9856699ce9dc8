// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Classes and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════
//
// Status mapping:
//   ApiError subclasses      their own status
//   ZodError                 422 VALIDATION_ERROR
//   body-parser SyntaxError  400 INVALID_JSON
//   InsufficientDataError    503 INSUFFICIENT_DATA
//   anything else            500 INTERNAL_ERROR ("Analysis failed: ...")
//
// With `sanitizeInternalErrors` set (production-like environments), 500
// responses carry a generic message and no detail.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { InsufficientDataError } from '../../analyzers/orchestrator.js';
import { errorMessage } from '../../types/result.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'error-handler' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly isOperational: boolean = true;

  constructor(
    message: string,
    public readonly statusCode: number = 400,
    public readonly code: string = 'BAD_REQUEST',
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 422, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 503, 'INSUFFICIENT_DATA', details);
    this.name = 'ServiceUnavailableError';
  }
}

export class InternalError extends ApiError {
  override readonly isOperational = false;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details);
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE BODY
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponseBody {
  error: string;
  code: string;
  detail?: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

const GENERIC_MESSAGE = 'An unexpected error occurred';

/**
 * express.json() failures: a SyntaxError carrying the raw `body`.
 */
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Convert any thrown value into an ApiError plus optional `detail` text.
 */
export function toApiError(error: unknown): { apiError: ApiError; detail?: string } {
  if (error instanceof ApiError) {
    return { apiError: error };
  }

  if (error instanceof ZodError) {
    const fields: Record<string, string[]> = {};
    for (const issue of error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      (fields[path] ??= []).push(issue.message);
    }
    return { apiError: new ValidationError('Invalid request', { fields }) };
  }

  if (isBodyParseError(error)) {
    return { apiError: new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON') };
  }

  if (error instanceof InsufficientDataError) {
    return {
      apiError: new ServiceUnavailableError('Insufficient data', {
        succeeded: error.succeeded,
        required: error.required,
        reasons: error.reasons,
      }),
      detail: error.message,
    };
  }

  const message = errorMessage(error);
  return {
    apiError: new InternalError('Analysis failed'),
    detail: `Analysis failed: ${message}`,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorHandlerOptions {
  /** Hide message and detail of 500 responses */
  readonly sanitizeInternalErrors?: boolean;
}

export function errorHandler(options: ErrorHandlerOptions = {}): ErrorRequestHandler {
  const sanitizeInternalErrors = options.sanitizeInternalErrors ?? false;

  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const { apiError, detail } = toApiError(error);
    const serverError = apiError.statusCode >= 500;

    if (serverError) {
      logger.error('Request failed', error, { requestId: req.requestId, path: req.path });
    } else {
      logger.warn('Request rejected', { requestId: req.requestId, path: req.path, code: apiError.code });
    }

    const sanitize = apiError.statusCode === 500 && sanitizeInternalErrors;
    const body: ErrorResponseBody = {
      error: sanitize ? GENERIC_MESSAGE : apiError.message,
      code: apiError.code,
      timestamp: new Date().toISOString(),
    };

    if (detail && !sanitize) {
      body.detail = detail;
    }
    if (apiError.details && !sanitize) {
      body.details = apiError.details;
    }
    if (req.requestId) {
      body.requestId = req.requestId;
    }

    res.status(apiError.statusCode).json(body);
  };
}

/**
 * Wrap an async handler so rejections reach the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    return fn(req, res, next).catch(next);
  };
}
