// ═══════════════════════════════════════════════════════════════════════════════
// ANALYSIS ROUTES — Hype Cycle Classification Endpoint
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { Orchestrator } from '../../analyzers/orchestrator.js';
import { AnalyzeRequestSchema } from '../schemas/analyze.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'analysis-routes' });

/**
 * POST /analyze. ZodError and orchestrator failures are mapped by errorHandler.
 */
export function analyzeHandler(orchestrator: Orchestrator): RequestHandler {
  return asyncHandler(async (req: Request, res: Response) => {
    const { keyword } = AnalyzeRequestSchema.parse(req.body);

    logger.info('Analysis requested', { keyword, requestId: req.requestId });
    const result = await orchestrator.classify(keyword);

    res.json(result);
  });
}

export function createAnalysisRouter(orchestrator: Orchestrator): Router {
  const router = Router();
  router.post('/analyze', analyzeHandler(orchestrator));
  return router;
}
