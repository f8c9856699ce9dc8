// ═══════════════════════════════════════════════════════════════════════════════
// APP — Express Application Assembly
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Application } from 'express';
import type { Orchestrator } from './analyzers/orchestrator.js';
import type { KeyValueStore } from './storage/types.js';
import { isProductionLike, type Environment } from './config/index.js';
import { createApiRouter } from './api/routes/index.js';
import { cors, requestId, requestLogger } from './api/middleware/request-logger.js';
import { errorHandler, NotFoundError } from './api/middleware/error-handler.js';

export interface AppDeps {
  readonly orchestrator: Orchestrator;
  readonly store: KeyValueStore;
  readonly version: string;
  readonly corsOrigins: readonly string[];
  readonly environment: Environment;
}

export function createApp(deps: AppDeps): Application {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestId());
  app.use(requestLogger());
  app.use(cors(deps.corsOrigins));
  app.use(express.json({ limit: '10kb' }));

  app.use('/api', createApiRouter({
    orchestrator: deps.orchestrator,
    store: deps.store,
    version: deps.version,
  }));

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });
  app.use(errorHandler({ sanitizeInternalErrors: isProductionLike(deps.environment) }));

  return app;
}
