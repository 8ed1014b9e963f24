// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Hierarchy and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';

import { isConfigLoaded, isProduction } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';
import { getRequestId } from '../../logging/context.js';

const logger = getLogger({ component: 'error-handler' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  /** Expected failures (bad input, missing resource) as opposed to bugs */
  readonly isOperational: boolean = true;

  constructor(
    message: string,
    readonly statusCode: number = 400,
    readonly code: string = 'BAD_REQUEST',
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class InternalError extends ApiError {
  override readonly isOperational = false;

  constructor(message = 'Internal server error', details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details);
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SHAPE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponseBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

const GENERIC_MESSAGE = 'An unexpected error occurred';

function zodDetails(error: ZodError): Record<string, unknown> {
  const { formErrors, fieldErrors } = error.flatten();
  return formErrors.length > 0 ? { fields: fieldErrors, form: formErrors } : { fields: fieldErrors };
}

/** body-parser marks malformed JSON as a SyntaxError carrying the raw body */
function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;
  if (error instanceof ZodError) {
    return new ValidationError('Request validation failed', zodDetails(error));
  }
  if (isJsonSyntaxError(error)) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }
  return new InternalError(error instanceof Error ? error.message : String(error));
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Final Express middleware. Renders every error as `{error, code, details?}`;
 * 5xx messages are hidden in production.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const apiError = toApiError(error);
  const serverSide = apiError.statusCode >= 500;

  if (serverSide) {
    logger.error('Request failed', error, { method: req.method, path: req.path });
  } else {
    logger.debug('Request rejected', { method: req.method, path: req.path, code: apiError.code });
  }

  const hide = serverSide && isConfigLoaded() && isProduction();
  const body: ErrorResponseBody = {
    error: hide ? GENERIC_MESSAGE : apiError.message,
    code: apiError.code,
    timestamp: new Date().toISOString(),
  };
  if (apiError.details && !hide) body.details = apiError.details;

  const requestId = getRequestId();
  if (requestId) body.requestId = requestId;

  res.status(apiError.statusCode).json(body);
}

/**
 * Wrap an async route so rejections reach `errorHandler`.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
