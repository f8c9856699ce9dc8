// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST MIDDLEWARE — Request IDs, Access Logging and CORS
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logRequest } from '../../logging/index.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Reuse the caller's x-request-id or mint a uuid, and echo it back.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const id = incoming && incoming.length <= 128 ? incoming : uuidv4();
    req.requestId = id;
    res.setHeader('X-Request-Id', id);
    next();
  };
}

/**
 * Log every request once the response has been sent.
 */
export function requestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logRequest({
        method: req.method,
        path: req.originalUrl || req.path,
        statusCode: res.statusCode,
        duration: Date.now() - start,
        requestId: req.requestId ?? 'unknown',
        userAgent: req.get('user-agent'),
      });
    });
    next();
  };
}

/**
 * CORS for the configured origins. `*` allows any origin.
 */
export function cors(origins: readonly string[]): RequestHandler {
  const allowAny = origins.includes('*');

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.get('origin');
    if (allowAny) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else if (origin && origins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Request-Id');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  };
}
