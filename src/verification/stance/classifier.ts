// ═══════════════════════════════════════════════════════════════════════════════
// STANCE CLASSIFIER — Backend Ensemble Behind One Interface
// ═══════════════════════════════════════════════════════════════════════════════
//
// - Backends are loaded once per process; a failed load removes the backend.
// - Each call fans out to every loaded backend through its circuit breaker.
// - A backend that throws, times out or is short-circuited just doesn't vote.
// - No votes at all yields NEUTRAL with 0.5 confidence.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { CircuitBreaker } from '../../infrastructure/circuit-breaker/index.js';
import { getLogger } from '../../logging/index.js';
import type { EvidenceItem, StanceLabel, StanceResult } from '../types.js';
import { combineVotes, type Vote } from './ensemble.js';
import { mapLabel } from './label-map.js';
import type { StanceBackend } from './types.js';

const logger = getLogger({ component: 'stance' });

export interface StanceClassifierOptions {
  /** Relative ensemble weight per backend name; unlisted backends weigh 1 */
  weights?: Partial<Record<string, number>>;
  /** Per-backend call timeout */
  timeoutMs?: number;
  /** Consecutive-failure threshold for each backend's breaker */
  failureThreshold?: number;
  resetTimeoutMs?: number;
}

interface ActiveBackend {
  readonly backend: StanceBackend;
  readonly weight: number;
  readonly breaker: CircuitBreaker;
}

export class StanceClassifier {
  private readonly backends: readonly StanceBackend[];
  private readonly options: StanceClassifierOptions;
  private readonly timeoutMs: number;

  private active: ActiveBackend[] = [];
  private initPromise: Promise<void> | null = null;

  constructor(backends: readonly StanceBackend[], options: StanceClassifierOptions = {}) {
    this.backends = backends;
    this.options = options;
    this.timeoutMs = options.timeoutMs ?? 8000;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Initialization
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Load every backend exactly once. Concurrent and repeated callers share
   * the same promise, which never rejects.
   */
  initialize(): Promise<void> {
    this.initPromise ??= this.loadBackends();
    return this.initPromise;
  }

  private async loadBackends(): Promise<void> {
    const outcomes = await Promise.allSettled(
      this.backends.map(async (backend) => {
        await backend.load?.();
        return backend;
      })
    );

    const loaded: ActiveBackend[] = [];
    outcomes.forEach((outcome, index) => {
      const backend = this.backends[index];
      if (!backend) return;
      if (outcome.status === 'rejected') {
        logger.warn('Stance backend failed to load; excluded', {
          backend: backend.name,
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        });
        return;
      }
      loaded.push({
        backend,
        weight: this.options.weights?.[backend.name] ?? 1,
        breaker: new CircuitBreaker({
          name: `stance-${backend.name}`,
          failureThreshold: this.options.failureThreshold ?? 5,
          resetTimeoutMs: this.options.resetTimeoutMs ?? 30000,
        }),
      });
    });

    this.active = loaded;
    logger.info('Stance classifier ready', { backends: loaded.map(b => b.backend.name) });
  }

  /** Names of backends that loaded successfully. */
  get availableBackends(): string[] {
    return this.active.map(b => b.backend.name);
  }

  /** True once initialized with at least one backend. */
  isReady(): boolean {
    return this.active.length > 0;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Classification
  // ─────────────────────────────────────────────────────────────────────────────

  async classify(claim: string, evidence: EvidenceItem): Promise<StanceResult> {
    await this.initialize();

    const answers = await Promise.all(
      this.active.map(active => this.ask(active, evidence.content, claim))
    );
    const votes = answers.filter((vote): vote is Vote => vote !== null);

    const { label, confidence } = combineVotes(votes);
    const modelVotes: Record<string, StanceLabel> = {};
    for (const vote of votes) {
      modelVotes[vote.backend] = vote.label;
    }

    return Object.freeze({
      label,
      confidence,
      sourceEvidence: evidence,
      modelVotes: Object.freeze(modelVotes),
    });
  }

  private async ask(active: ActiveBackend, premise: string, hypothesis: string): Promise<Vote | null> {
    const { backend, breaker, weight } = active;
    try {
      const answer = await breaker.execute(() =>
        backend.classify(premise, hypothesis, AbortSignal.timeout(this.timeoutMs))
      );
      return { backend: backend.name, label: mapLabel(answer.label), score: answer.score, weight };
    } catch (error) {
      logger.warn('Stance backend call failed; excluded from vote', {
        backend: backend.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
