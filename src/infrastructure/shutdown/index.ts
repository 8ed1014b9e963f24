// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN — Prioritized Hooks and Signal-Driven Graceful Shutdown
// ═══════════════════════════════════════════════════════════════════════════════
//
// - Hooks run highest priority first; hooks sharing a priority run in parallel.
// - Each hook has its own timeout; a failing hook never stops the others.
// - Repeated signals while shutting down are ignored.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ShutdownPriority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITY_ORDER: readonly ShutdownPriority[] = ['critical', 'high', 'normal', 'low'];

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
  readonly priority: ShutdownPriority;
  /** 0 = use the coordinator default */
  readonly timeoutMs: number;
}

export interface HookResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly timedOut: boolean;
  readonly error?: Error;
}

export interface ShutdownResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly hooks: HookResult[];
  readonly failed: string[];
}

export interface ShutdownOptions {
  hookTimeoutMs?: number;
  signals?: NodeJS.Signals[];
  /** Call process.exit() once hooks finish */
  exitProcess?: boolean;
}

class HookTimeoutError extends Error {
  constructor(name: string, timeoutMs: number) {
    super(`Shutdown hook "${name}" timed out after ${timeoutMs}ms`);
    this.name = 'HookTimeoutError';
  }
}

const logger = getLogger({ component: 'shutdown' });

// ─────────────────────────────────────────────────────────────────────────────────
// COORDINATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class ShutdownCoordinator {
  private readonly hooks = new Map<string, ShutdownHook>();
  private readonly hookTimeoutMs: number;
  private readonly signals: NodeJS.Signals[];
  private readonly exitProcess: boolean;

  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(options: ShutdownOptions = {}) {
    this.hookTimeoutMs = options.hookTimeoutMs ?? 5000;
    this.signals = options.signals ?? ['SIGTERM', 'SIGINT'];
    this.exitProcess = options.exitProcess ?? true;
  }

  register(
    name: string,
    fn: ShutdownHookFn,
    options: { priority?: ShutdownPriority; timeoutMs?: number } = {}
  ): void {
    if (this.hooks.has(name)) {
      logger.warn('Overwriting existing shutdown hook', { name });
    }
    this.hooks.set(name, {
      name,
      fn,
      priority: options.priority ?? 'normal',
      timeoutMs: options.timeoutMs ?? 0,
    });
  }

  get isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Install handlers for the configured signals. Returns a function that
   * removes them again.
   */
  installSignalHandlers(): () => void {
    const listener = (signal: NodeJS.Signals): void => {
      if (this.isShuttingDown) {
        logger.warn('Received signal during shutdown, ignoring', { signal });
        return;
      }
      logger.info('Received shutdown signal', { signal });
      this.shutdown(signal).catch((error: unknown) => {
        logger.fatal('Shutdown failed', error);
        process.exit(1);
      });
    };

    for (const signal of this.signals) {
      process.on(signal, listener);
    }
    return () => {
      for (const signal of this.signals) {
        process.off(signal, listener);
      }
    };
  }

  /** Run every hook once; concurrent callers share the result. */
  shutdown(reason = 'manual'): Promise<ShutdownResult> {
    this.shutdownPromise ??= this.perform(reason);
    return this.shutdownPromise;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Execution
  // ─────────────────────────────────────────────────────────────────────────────

  private async perform(reason: string): Promise<ShutdownResult> {
    const start = Date.now();
    logger.info('Starting graceful shutdown', { reason, hooks: this.hooks.size });

    const results: HookResult[] = [];
    for (const priority of PRIORITY_ORDER) {
      const group = [...this.hooks.values()].filter(h => h.priority === priority);
      if (group.length === 0) continue;
      results.push(...(await Promise.all(group.map(hook => this.runHook(hook)))));
    }

    const failed = results.filter(r => !r.success).map(r => r.name);
    const result: ShutdownResult = {
      success: failed.length === 0,
      totalDurationMs: Date.now() - start,
      hooks: results,
      failed,
    };

    if (result.success) {
      logger.info('Graceful shutdown completed', { totalDurationMs: result.totalDurationMs });
    } else {
      logger.warn('Shutdown completed with failures', { failed });
    }

    if (this.exitProcess) {
      process.exit(result.success ? 0 : 1);
    }
    return result;
  }

  private async runHook(hook: ShutdownHook): Promise<HookResult> {
    const start = Date.now();
    const timeoutMs = hook.timeoutMs > 0 ? hook.timeoutMs : this.hookTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        Promise.resolve().then(hook.fn),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new HookTimeoutError(hook.name, timeoutMs)), timeoutMs);
        }),
      ]);
      return { name: hook.name, success: true, durationMs: Date.now() - start, timedOut: false };
    } catch (error) {
      logger.error('Shutdown hook failed', error, { name: hook.name });
      return {
        name: hook.name,
        success: false,
        durationMs: Date.now() - start,
        timedOut: error instanceof HookTimeoutError,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

export function createServerCloseHook(server: {
  close: (callback?: (err?: Error) => void) => unknown;
}): ShutdownHookFn {
  return () =>
    new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
}
