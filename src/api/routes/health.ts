// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health endpoint
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { KeyValueStore } from '../../storage/types.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { errorMessage } from '../../types/result.js';
import { getLogger } from '../../logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  database: 'connected' | 'disconnected';
  version: string;
}

export interface HealthRouterOptions {
  readonly store: KeyValueStore;
  readonly version: string;
}

const logger = getLogger({ component: 'health' });

async function checkStorage(store: KeyValueStore): Promise<boolean> {
  try {
    await store.ping();
    return true;
  } catch (error) {
    logger.warn('Storage ping failed', { error: errorMessage(error) });
    return false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

// Always 200: a degraded store still lets cache misses be classified.
export function healthHandler(options: HealthRouterOptions): RequestHandler {
  return asyncHandler(async (_req: Request, res: Response) => {
    const connected = await checkStorage(options.store);

    const health: HealthStatus = {
      status: connected ? 'healthy' : 'degraded',
      database: connected ? 'connected' : 'disconnected',
      version: options.version,
    };

    res.json(health);
  });
}

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router();
  router.get('/health', healthHandler(options));
  return router;
}
