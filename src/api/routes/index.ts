// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   app.use(createHealthRouter(deps));
//   app.use('/api', createApiRouter(deps));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';

import { createHistoryRouter, type HistoryRouteDependencies } from './history.js';
import { createVerifyRouter, type VerifyRouteDependencies } from './verify.js';

export { createVerifyRouter, createVerifyHandler, roundConfidence } from './verify.js';
export type { ClaimVerifier, VerifyRouteDependencies, VerifyResponseBody } from './verify.js';
export { createHistoryRouter, createHistoryHandler } from './history.js';
export type { HistoryRouteDependencies } from './history.js';
export { createHealthRouter, buildHealthCheck, checkStorage, checkClassifier } from './health.js';
export type { HealthCheck, ComponentHealth, ClassifierStatus, HealthRouteDependencies } from './health.js';

export type ApiRouterDependencies = VerifyRouteDependencies & HistoryRouteDependencies;

/**
 * Everything mounted under /api.
 */
export function createApiRouter(deps: ApiRouterDependencies): Router {
  const router = Router();
  router.use(createVerifyRouter(deps));
  router.use(createHistoryRouter(deps));
  return router;
}
