// ═══════════════════════════════════════════════════════════════════════════════
// OPENAI BACKEND — Chat-Completion NLI Judge
// ═══════════════════════════════════════════════════════════════════════════════
//
// Asks a chat model whether the evidence entails, contradicts or is neutral
// toward the claim. The JSON answer is validated; anything unparseable is a
// backend failure, which the adapter excludes from the ensemble.
//
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';
import { z } from 'zod';

import { err, ok, tryCatch, type Result } from '../../../types/result.js';
import type { BackendAnswer, StanceBackend } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PROMPT
// ─────────────────────────────────────────────────────────────────────────────────

const STANCE_PROMPT = `You are a natural language inference judge for a fact-checking service.

You receive a PREMISE (retrieved evidence) and a HYPOTHESIS (a factual claim).
Decide whether the premise, taken as true, entails the hypothesis, contradicts
it, or neither.

Return JSON only, no markdown, no code blocks:

{"label": "entailment|contradiction|neutral", "confidence": 0.0-1.0}

Rules:
1. Judge only from the premise. Do not use outside knowledge.
2. "neutral" when the premise is about something else or is not specific enough.
3. "contradiction" only when both cannot be true at the same time.
4. confidence is your probability that the label is correct.`;

// ─────────────────────────────────────────────────────────────────────────────────
// ANSWER PARSING
// ─────────────────────────────────────────────────────────────────────────────────

const StanceAnswerSchema = z.object({
  label: z.string().min(1),
  confidence: z.number(),
});

/**
 * Parse the model's reply, tolerating a fenced code block around the JSON.
 */
export function parseStanceAnswer(content: string): Result<BackendAnswer, Error> {
  let jsonStr = content.trim();
  if (jsonStr.includes('```')) {
    const match = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
    jsonStr = match?.[1]?.trim() ?? jsonStr;
  }

  const json = tryCatch((): unknown => JSON.parse(jsonStr));
  if (!json.ok) {
    return err(new Error(`Stance answer is not JSON: ${content.slice(0, 80)}`));
  }

  const parsed = StanceAnswerSchema.safeParse(json.value);
  if (!parsed.success) {
    return err(new Error(`Stance answer has the wrong shape: ${parsed.error.message}`));
  }

  return ok({ label: parsed.data.label, score: normalizeConfidence(parsed.data.confidence) });
}

function normalizeConfidence(confidence: number): number {
  if (!Number.isFinite(confidence)) return 0.5;
  return Math.max(0, Math.min(1, confidence));
}

// ─────────────────────────────────────────────────────────────────────────────────
// BACKEND
// ─────────────────────────────────────────────────────────────────────────────────

/** Sends one system + user message and returns the reply text. */
export type ChatCompleter = (system: string, user: string, signal?: AbortSignal) => Promise<string>;

export interface OpenAIBackendOptions {
  apiKey?: string;
  model?: string;
  /** Replaces the OpenAI client, e.g. in tests */
  complete?: ChatCompleter;
}

export class OpenAIStanceBackend implements StanceBackend {
  readonly name = 'openai';

  private readonly complete: ChatCompleter | null;

  constructor(options: OpenAIBackendOptions = {}) {
    this.complete = options.complete ?? createCompleter(options.apiKey, options.model ?? 'gpt-4o-mini');
  }

  async load(): Promise<void> {
    if (!this.complete) {
      throw new Error('OpenAI API key not configured');
    }
  }

  async classify(premise: string, hypothesis: string, signal?: AbortSignal): Promise<BackendAnswer> {
    if (!this.complete) {
      throw new Error('OpenAI API key not configured');
    }

    const content = await this.complete(
      STANCE_PROMPT,
      `PREMISE:\n${premise}\n\nHYPOTHESIS:\n${hypothesis}`,
      signal
    );

    const answer = parseStanceAnswer(content);
    if (!answer.ok) throw answer.error;
    return answer.value;
  }
}

function createCompleter(apiKey: string | undefined, model: string): ChatCompleter | null {
  if (!apiKey) return null;
  const client = new OpenAI({ apiKey });

  return async (system, user, signal) => {
    const response = await client.chat.completions.create(
      {
        model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        max_tokens: 60,
        temperature: 0,
      },
      { signal }
    );
    return response.choices[0]?.message?.content?.trim() ?? '';
  };
}
