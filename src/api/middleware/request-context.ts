// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST CONTEXT — Request IDs and Access Logging
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

import { logRequest } from '../../logging/index.js';
import { runWithContext } from '../../logging/context.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Assigns a request ID (reusing an inbound `X-Request-Id`), echoes it in the
 * response, runs the rest of the chain inside its logging context and logs
 * the request once the response is finished.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.get(REQUEST_ID_HEADER);
  const requestId = inbound && inbound.length <= 128 ? inbound : uuidv4();
  const start = performance.now();

  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.on('finish', () => {
    logRequest({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Math.round(performance.now() - start),
      requestId,
    });
  });

  runWithContext({ requestId, path: req.path }, next);
}
