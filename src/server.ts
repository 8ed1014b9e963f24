// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Express Application Factory
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';

import { errorHandler, NotFoundError } from './api/middleware/error-handler.js';
import { requestContext } from './api/middleware/request-context.js';
import { createApiRouter, createHealthRouter } from './api/routes/index.js';
import type { Container } from './container.js';

export const JSON_BODY_LIMIT = '100kb';

export function createApp(container: Container): Express {
  const { history, classifier, orchestrator, store, config } = container;
  const app = express();

  app.disable('x-powered-by');
  app.use(requestContext);
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use(createHealthRouter({ store, classifier }));
  app.use(
    '/api',
    createApiRouter({ verifier: orchestrator, history, maxLimit: config.storage.historyLimit })
  );

  app.use((req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
