// ═══════════════════════════════════════════════════════════════════════════════
// STANCE BACKEND CONTRACT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A backend's raw answer. `label` is in the backend's own vocabulary and is
 * mapped through the label table by the adapter.
 */
export interface BackendAnswer {
  readonly label: string;
  readonly score: number;
}

/**
 * An NLI-style classifier. The premise is the evidence text, the
 * hypothesis is the claim.
 */
export interface StanceBackend {
  readonly name: string;

  /** One-time warm-up; a rejection excludes the backend for the process lifetime. */
  load?(): Promise<void>;

  classify(premise: string, hypothesis: string, signal?: AbortSignal): Promise<BackendAnswer>;
}
