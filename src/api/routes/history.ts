// ═══════════════════════════════════════════════════════════════════════════════
// HISTORY ROUTES — Recent Verifications
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /history?limit=   Most recent verifications, newest first
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { HistoryStore } from '../../history/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { HistoryQuerySchema } from '../schemas/index.js';

export interface HistoryRouteDependencies {
  history: Pick<HistoryStore, 'recent'>;
  /** Largest page served; also the default */
  maxLimit: number;
}

export function createHistoryHandler(deps: HistoryRouteDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const { limit } = HistoryQuerySchema.parse(req.query);
    const records = await deps.history.recent(Math.min(limit ?? deps.maxLimit, deps.maxLimit));
    res.json(records);
  };
}

export function createHistoryRouter(deps: HistoryRouteDependencies): Router {
  const router = Router();
  router.get('/history', asyncHandler(createHistoryHandler(deps)));
  return router;
}
