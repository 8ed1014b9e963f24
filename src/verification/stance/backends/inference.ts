// ═══════════════════════════════════════════════════════════════════════════════
// INFERENCE BACKEND — Hosted Text-Classification Endpoint
// ═══════════════════════════════════════════════════════════════════════════════
//
// Talks to an HTTP endpoint serving an MNLI-style model (Hugging Face
// Inference API format). Request: {inputs: {text, text_pair}}. Response: the
// label distribution, either flat or nested one level.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { err, ok, type Result } from '../../../types/result.js';
import type { BackendAnswer, StanceBackend } from '../types.js';

const PredictionSchema = z.object({
  label: z.string(),
  score: z.number(),
});

const ResponseSchema = z.union([
  z.array(PredictionSchema),
  z.array(z.array(PredictionSchema)),
]);

/**
 * Pick the highest-scoring label from an endpoint response.
 */
export function parseInferenceResponse(body: unknown): Result<BackendAnswer, Error> {
  const parsed = ResponseSchema.safeParse(body);
  if (!parsed.success) {
    return err(new Error(`Unexpected inference response: ${parsed.error.message}`));
  }

  const predictions: Array<z.infer<typeof PredictionSchema>> = [];
  for (const entry of parsed.data) {
    if (Array.isArray(entry)) {
      predictions.push(...entry);
    } else {
      predictions.push(entry);
    }
  }

  let best: BackendAnswer | undefined;
  for (const prediction of predictions) {
    if (!best || prediction.score > best.score) {
      best = { label: prediction.label, score: prediction.score };
    }
  }

  return best ? ok(best) : err(new Error('Inference response contained no predictions'));
}

export interface InferenceBackendOptions {
  endpoint?: string;
  apiToken?: string;
  fetchImpl?: typeof fetch;
}

export class InferenceStanceBackend implements StanceBackend {
  readonly name = 'inference';

  private readonly endpoint: string | undefined;
  private readonly apiToken: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(options: InferenceBackendOptions = {}) {
    this.endpoint = options.endpoint;
    this.apiToken = options.apiToken;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async load(): Promise<void> {
    if (!this.endpoint) {
      throw new Error('Inference endpoint not configured');
    }
  }

  async classify(premise: string, hypothesis: string, signal?: AbortSignal): Promise<BackendAnswer> {
    if (!this.endpoint) {
      throw new Error('Inference endpoint not configured');
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiToken) {
      headers.Authorization = `Bearer ${this.apiToken}`;
    }

    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({ inputs: { text: premise, text_pair: hypothesis } }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Inference endpoint returned HTTP ${response.status}`);
    }

    const answer = parseInferenceResponse(await response.json());
    if (!answer.ok) throw answer.error;
    return answer.value;
  }
}
