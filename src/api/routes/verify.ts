// ═══════════════════════════════════════════════════════════════════════════════
// VERIFY ROUTES — Claim Verification Endpoint
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   POST   /verify     Verify a claim against retrieved evidence
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { HistoryStore } from '../../history/index.js';
import { getLogger } from '../../logging/index.js';
import type { Verdict } from '../../verification/types.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { VerifyRequestSchema } from '../schemas/index.js';

const logger = getLogger({ component: 'verify-routes' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ClaimVerifier {
  verify(text: string): Promise<Verdict>;
}

export interface VerifyRouteDependencies {
  verifier: ClaimVerifier;
  history: Pick<HistoryStore, 'record'>;
}

export interface VerifyResponseBody {
  label: Verdict['label'];
  confidence: number;
  evidence: string;
  claim: string;
}

export function roundConfidence(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * POST /verify
 *
 * An `Error` verdict is answered with HTTP 500 but keeps the usual body, so
 * clients always get the explanation.
 */
export function createVerifyHandler(deps: VerifyRouteDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const { claim } = VerifyRequestSchema.parse(req.body ?? {});

    const verdict = await deps.verifier.verify(claim);

    try {
      await deps.history.record(claim, verdict);
    } catch (error) {
      logger.error('Failed to record verification history', error);
    }

    const body: VerifyResponseBody = {
      label: verdict.label,
      confidence: roundConfidence(verdict.confidence),
      evidence: verdict.explanation,
      claim,
    };

    res.status(verdict.label === 'Error' ? 500 : 200).json(body);
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createVerifyRouter(deps: VerifyRouteDependencies): Router {
  const router = Router();
  router.post('/verify', asyncHandler(createVerifyHandler(deps)));
  return router;
}
