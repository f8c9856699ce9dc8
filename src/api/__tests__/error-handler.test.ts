// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER TESTS — Middleware Unit Tests
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  errorHandler,
  toApiError,
  ApiError,
  NotFoundError,
  ValidationError,
  ServiceUnavailableError,
  InternalError,
  asyncHandler,
  type ErrorResponseBody,
} from '../middleware/error-handler.js';
import { InsufficientDataError } from '../../analyzers/orchestrator.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MOCKS
// ─────────────────────────────────────────────────────────────────────────────────

function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    path: '/api/analyze',
    method: 'POST',
    headers: {},
    ...overrides,
  } as Request;
}

function createMockResponse(): Response & {
  _status: number;
  _json: unknown;
} {
  const res = {
    _status: 200,
    _json: null,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(this: { _json: unknown }, data: unknown) {
      this._json = data;
      return this;
    },
  };
  return res as any;
}

function body(res: { _json: unknown }): ErrorResponseBody {
  return res._json as ErrorResponseBody;
}

const mockNext: NextFunction = vi.fn<unknown[], void>();

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

describe('Error Classes', () => {
  describe('ApiError', () => {
    it('should create error with defaults', () => {
      const error = new ApiError('Something went wrong');
      expect(error.message).toBe('Something went wrong');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('BAD_REQUEST');
      expect(error.isOperational).toBe(true);
    });

    it('should create error with custom values', () => {
      const error = new ApiError('Custom error', 409, 'CONFLICT', { field: 'keyword' });
      expect(error.statusCode).toBe(409);
      expect(error.code).toBe('CONFLICT');
      expect(error.details).toEqual({ field: 'keyword' });
    });
  });

  it('NotFoundError should name the resource', () => {
    const error = new NotFoundError('Analysis');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('NOT_FOUND');
    expect(error.message).toBe('Analysis not found');
  });

  it('ValidationError should be 422', () => {
    const error = new ValidationError('Invalid input', { field: 'keyword' });
    expect(error.statusCode).toBe(422);
    expect(error.code).toBe('VALIDATION_ERROR');
  });

  it('ServiceUnavailableError should be 503 INSUFFICIENT_DATA', () => {
    const error = new ServiceUnavailableError('Insufficient data');
    expect(error.statusCode).toBe(503);
    expect(error.code).toBe('INSUFFICIENT_DATA');
  });

  it('InternalError should not be operational', () => {
    const error = new InternalError('Boom');
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.isOperational).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

describe('toApiError', () => {
  it('should map ZodError to 422 with field messages', () => {
    const result = z.object({ keyword: z.string().min(1, 'too short') }).safeParse({ keyword: '' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const { apiError } = toApiError(result.error);
    expect(apiError.statusCode).toBe(422);
    expect(apiError.details).toEqual({ fields: { keyword: ['too short'] } });
  });

  it('should map body-parser SyntaxError to 400 INVALID_JSON', () => {
    const error = Object.assign(new SyntaxError('Unexpected token'), { body: '{bad' });
    const { apiError } = toApiError(error);
    expect(apiError.statusCode).toBe(400);
    expect(apiError.code).toBe('INVALID_JSON');
  });

  it('should treat a plain SyntaxError as internal', () => {
    const { apiError, detail } = toApiError(new SyntaxError('Unexpected token'));
    expect(apiError.statusCode).toBe(500);
    expect(detail).toBe('Analysis failed: Unexpected token');
  });

  it('should map InsufficientDataError to 503 with reasons', () => {
    const error = new InsufficientDataError(2, 3, { news: 'All API requests failed' }, ['news collector failed']);
    const { apiError, detail } = toApiError(error);
    expect(apiError.statusCode).toBe(503);
    expect(apiError.details).toEqual({
      succeeded: 2,
      required: 3,
      reasons: { news: 'All API requests failed' },
    });
    expect(detail).toBe(
      'Insufficient data: only 2/5 collectors succeeded. Minimum 3 required. Errors: ["news collector failed"]'
    );
  });

  it('should pass ApiError through unchanged', () => {
    const error = new NotFoundError('Route GET /nope');
    expect(toApiError(error).apiError).toBe(error);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

describe('errorHandler', () => {
  it('should respond with status, code and request id', () => {
    const req = createMockRequest({ requestId: 'req-1' });
    const res = createMockResponse();

    errorHandler()(new ValidationError('Invalid request'), req, res, mockNext);

    expect(res._status).toBe(422);
    expect(body(res).error).toBe('Invalid request');
    expect(body(res).code).toBe('VALIDATION_ERROR');
    expect(body(res).requestId).toBe('req-1');
    expect(typeof body(res).timestamp).toBe('string');
  });

  it('should include detail for unexpected errors by default', () => {
    const res = createMockResponse();

    errorHandler()(new Error('disk full'), createMockRequest(), res, mockNext);

    expect(res._status).toBe(500);
    expect(body(res).error).toBe('Analysis failed');
    expect(body(res).detail).toBe('Analysis failed: disk full');
    expect(body(res).requestId).toBeUndefined();
  });

  it('should sanitize 500 responses when configured to', () => {
    const res = createMockResponse();

    errorHandler({ sanitizeInternalErrors: true })(new Error('disk full'), createMockRequest(), res, mockNext);

    expect(res._status).toBe(500);
    expect(body(res).error).toBe('An unexpected error occurred');
    expect(body(res).detail).toBeUndefined();
  });

  it('should keep insufficient-data detail when sanitizing', () => {
    const res = createMockResponse();
    const error = new InsufficientDataError(1, 3, { social: 'Timeout after 120s' }, []);

    errorHandler({ sanitizeInternalErrors: true })(error, createMockRequest(), res, mockNext);

    expect(res._status).toBe(503);
    expect(body(res).detail).toBe(
      'Insufficient data: only 1/5 collectors succeeded. Minimum 3 required. Errors: []'
    );
    expect(body(res).details).toEqual({ succeeded: 1, required: 3, reasons: { social: 'Timeout after 120s' } });
  });
});

describe('asyncHandler', () => {
  let next: NextFunction;

  beforeEach(() => {
    next = vi.fn<unknown[], void>();
  });

  it('should forward rejections to next', async () => {
    const failure = new Error('rejected');
    const handler = asyncHandler(async () => {
      throw failure;
    });

    await handler(createMockRequest(), createMockResponse(), next);

    expect(next).toHaveBeenCalledWith(failure);
  });

  it('should not call next when the handler resolves', async () => {
    const res = createMockResponse();
    const handler = asyncHandler(async (_req, response) => {
      response.json({ ok: true });
    });

    await handler(createMockRequest(), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res._json).toEqual({ ok: true });
  });
});
