// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   app.use('/api', createApiRouter({ orchestrator, store, version }));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import type { Orchestrator } from '../../analyzers/orchestrator.js';
import type { KeyValueStore } from '../../storage/types.js';
import { createAnalysisRouter } from './analysis.js';
import { createHealthRouter } from './health.js';

export { createAnalysisRouter } from './analysis.js';
export { createHealthRouter, type HealthStatus } from './health.js';

export interface ApiRouterOptions {
  readonly orchestrator: Orchestrator;
  readonly store: KeyValueStore;
  readonly version: string;
}

export function createApiRouter(options: ApiRouterOptions): Router {
  const router = Router();

  router.use(createHealthRouter({ store: options.store, version: options.version }));
  router.use(createAnalysisRouter(options.orchestrator));

  return router;
}
