// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health endpoint
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import { getLogger } from '../../logging/index.js';
import type { KeyValueStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  latency?: number;
  message?: string;
}

export interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message: string;
  uptime: number;
  timestamp: string;
  checks: {
    storage: ComponentHealth;
    classifier: ComponentHealth;
  };
}

export interface ClassifierStatus {
  isReady(): boolean;
  readonly availableBackends: readonly string[];
}

export interface HealthRouteDependencies {
  store: Pick<KeyValueStore, 'ping'>;
  classifier: ClassifierStatus;
  uptime?: () => number;
}

const MESSAGES = {
  healthy: 'Veracity is running.',
  degraded: 'Veracity is running with reduced capability.',
  unhealthy: 'Veracity is unavailable.',
} as const;

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH CHECK FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export async function checkStorage(store: Pick<KeyValueStore, 'ping'>): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    await store.ping();
    const latency = Date.now() - start;

    if (latency > 1000) {
      return { status: 'degraded', latency, message: 'High latency' };
    }
    return { status: 'up', latency };
  } catch (error) {
    return {
      status: 'down',
      message: error instanceof Error ? error.message : 'Storage check failed',
    };
  }
}

/**
 * Without any loaded stance backend every item is scored NEUTRAL, so the
 * service still answers but can only say Low Confidence.
 */
export function checkClassifier(classifier: ClassifierStatus): ComponentHealth {
  if (classifier.isReady()) {
    return { status: 'up', message: classifier.availableBackends.join(', ') };
  }
  return { status: 'degraded', message: 'No stance backend loaded' };
}

export async function buildHealthCheck(deps: HealthRouteDependencies): Promise<HealthCheck> {
  const storage = await checkStorage(deps.store);
  const classifier = checkClassifier(deps.classifier);

  const status: HealthCheck['status'] =
    storage.status === 'down'
      ? 'unhealthy'
      : storage.status === 'up' && classifier.status === 'up'
        ? 'healthy'
        : 'degraded';

  return {
    status,
    message: MESSAGES[status],
    uptime: (deps.uptime ?? process.uptime)(),
    timestamp: new Date().toISOString(),
    checks: { storage, classifier },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(deps: HealthRouteDependencies): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── HEALTH CHECK (liveness) ───
  router.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const health = await buildHealthCheck(deps);

      if (health.status !== 'healthy') {
        logger.warn('Health check degraded', {
          status: health.status,
          storage: health.checks.storage.status,
          classifier: health.checks.classifier.status,
        });
      }

      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    })
  );

  return router;
}
