// ═══════════════════════════════════════════════════════════════════════════════
// STANCE TESTS — Label Mapping, Ensemble, Backends, Classifier Adapter
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, type Mock } from 'vitest';

import {
  combineVotes,
  InferenceStanceBackend,
  LexicalStanceBackend,
  mapLabel,
  OpenAIStanceBackend,
  parseInferenceResponse,
  parseStanceAnswer,
  StanceClassifier,
  type BackendAnswer,
  type EvidenceItem,
  type StanceBackend,
} from '../verification/index.js';

const evidence: EvidenceItem = {
  content: 'The Eiffel Tower is a landmark located in Paris, France.',
  source: 'Wikipedia - Eiffel Tower',
  url: 'https://en.wikipedia.org/wiki/Eiffel_Tower',
  credibilityScore: 0.95,
  sourceType: 'wikipedia',
};

const CLAIM = 'The Eiffel Tower is located in Paris.';

function fakeBackend(
  name: string,
  answer: BackendAnswer | (() => Promise<BackendAnswer>),
  load?: () => Promise<void>
): StanceBackend & { classify: Mock<StanceBackend['classify']> } {
  const classify = vi.fn<StanceBackend['classify']>(async () =>
    typeof answer === 'function' ? answer() : answer
  );
  return load ? { name, classify, load } : { name, classify };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LABEL MAP
// ─────────────────────────────────────────────────────────────────────────────────

describe('mapLabel', () => {
  it('should accept canonical labels in any case', () => {
    expect(mapLabel('ENTAILMENT')).toBe('ENTAILMENT');
    expect(mapLabel('Contradiction')).toBe('CONTRADICTION');
    expect(mapLabel(' neutral ')).toBe('NEUTRAL');
  });

  it('should map MNLI positional codes', () => {
    expect(mapLabel('LABEL_0')).toBe('CONTRADICTION');
    expect(mapLabel('LABEL_1')).toBe('NEUTRAL');
    expect(mapLabel('LABEL_2')).toBe('ENTAILMENT');
  });

  it('should map fact-check vocabulary', () => {
    expect(mapLabel('SUPPORTS')).toBe('ENTAILMENT');
    expect(mapLabel('REFUTES')).toBe('CONTRADICTION');
    expect(mapLabel('NOT ENOUGH INFO')).toBe('NEUTRAL');
    expect(mapLabel('false')).toBe('CONTRADICTION');
  });

  it('should default unknown labels to NEUTRAL', () => {
    expect(mapLabel('maybe')).toBe('NEUTRAL');
    expect(mapLabel('')).toBe('NEUTRAL');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENSEMBLE
// ─────────────────────────────────────────────────────────────────────────────────

describe('combineVotes', () => {
  it('should return NEUTRAL 0.5 without votes', () => {
    expect(combineVotes([])).toEqual({ label: 'NEUTRAL', confidence: 0.5 });
  });

  it('should pass a single vote through', () => {
    expect(combineVotes([{ backend: 'a', label: 'CONTRADICTION', score: 0.7, weight: 1 }])).toEqual({
      label: 'CONTRADICTION',
      confidence: 0.7,
    });
  });

  it('should spread unclaimed mass over the other labels', () => {
    const result = combineVotes([
      { backend: 'a', label: 'ENTAILMENT', score: 0.9, weight: 1 },
      { backend: 'b', label: 'CONTRADICTION', score: 0.6, weight: 1 },
    ]);
    expect(result.label).toBe('ENTAILMENT');
    expect(result.confidence).toBeCloseTo(0.55, 10);
  });

  it('should let heavier backends win', () => {
    const result = combineVotes([
      { backend: 'a', label: 'ENTAILMENT', score: 0.9, weight: 1 },
      { backend: 'b', label: 'CONTRADICTION', score: 0.9, weight: 3 },
    ]);
    expect(result.label).toBe('CONTRADICTION');
    expect(result.confidence).toBeCloseTo(0.6875, 10);
  });

  it('should break ties toward ENTAILMENT over CONTRADICTION', () => {
    const result = combineVotes([
      { backend: 'a', label: 'ENTAILMENT', score: 0.8, weight: 1 },
      { backend: 'b', label: 'CONTRADICTION', score: 0.8, weight: 1 },
    ]);
    expect(result.label).toBe('ENTAILMENT');
    expect(result.confidence).toBeCloseTo(0.45, 10);
  });

  it('should ignore votes without positive weight', () => {
    expect(
      combineVotes([
        { backend: 'a', label: 'ENTAILMENT', score: 0.9, weight: 0 },
        { backend: 'b', label: 'NEUTRAL', score: 0.65, weight: 1 },
      ])
    ).toEqual({ label: 'NEUTRAL', confidence: 0.65 });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LEXICAL BACKEND
// ─────────────────────────────────────────────────────────────────────────────────

describe('LexicalStanceBackend', () => {
  const backend = new LexicalStanceBackend();

  it('should support when the evidence mentions every claim term', async () => {
    expect(await backend.classify(evidence.content, CLAIM)).toEqual({ label: 'supports', score: 0.9 });
  });

  it('should refute when the evidence negates the claim terms', async () => {
    const answer = await backend.classify('The Eiffel Tower is not located in Paris.', CLAIM);
    expect(answer.label).toBe('refutes');
    expect(answer.score).toBeCloseTo(0.9, 10);
  });

  it('should support a negated claim backed by negated evidence', async () => {
    const answer = await backend.classify(
      'The Eiffel Tower is not located in Paris.',
      'The Eiffel Tower is not located in Paris.'
    );
    expect(answer.label).toBe('supports');
  });

  it('should match whole words rather than fragments', async () => {
    expect(await backend.classify('The environment ministry published reports.', 'Iron rusts.')).toEqual({
      label: 'not enough info',
      score: 0.6,
    });
  });

  it('should abstain on unrelated evidence', async () => {
    expect(await backend.classify('Bananas are a yellow fruit.', CLAIM)).toEqual({
      label: 'not enough info',
      score: 0.6,
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// OPENAI BACKEND
// ─────────────────────────────────────────────────────────────────────────────────

describe('parseStanceAnswer', () => {
  it('should parse a bare JSON answer', () => {
    const result = parseStanceAnswer('{"label": "entailment", "confidence": 0.82}');
    expect(result).toEqual({ ok: true, value: { label: 'entailment', score: 0.82 } });
  });

  it('should unwrap fenced JSON and clamp confidence', () => {
    const result = parseStanceAnswer('```json\n{"label": "contradiction", "confidence": 1.4}\n```');
    expect(result).toEqual({ ok: true, value: { label: 'contradiction', score: 1 } });
  });

  it('should reject prose', () => {
    const result = parseStanceAnswer('I think it is true');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Stance answer is not JSON: I think it is true');
    }
  });

  it('should reject answers without a confidence', () => {
    const result = parseStanceAnswer('{"label": "neutral"}');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Stance answer has the wrong shape/);
    }
  });
});

describe('OpenAIStanceBackend', () => {
  it('should send premise and hypothesis and parse the reply', async () => {
    const complete = vi.fn(async (_system: string, _user: string, _signal?: AbortSignal) =>
      '{"label": "entailment", "confidence": 0.9}'
    );
    const backend = new OpenAIStanceBackend({ complete });

    const answer = await backend.classify('premise text', 'hypothesis text');

    expect(answer).toEqual({ label: 'entailment', score: 0.9 });
    expect(complete.mock.calls[0]?.[1]).toBe('PREMISE:\npremise text\n\nHYPOTHESIS:\nhypothesis text');
  });

  it('should throw on an unparseable reply', async () => {
    const backend = new OpenAIStanceBackend({ complete: async () => 'no idea' });
    await expect(backend.classify('p', 'h')).rejects.toThrow('Stance answer is not JSON: no idea');
  });

  it('should refuse to load without an API key', async () => {
    const backend = new OpenAIStanceBackend({});
    await expect(backend.load()).rejects.toThrow('OpenAI API key not configured');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// INFERENCE BACKEND
// ─────────────────────────────────────────────────────────────────────────────────

describe('parseInferenceResponse', () => {
  it('should pick the top label from a nested distribution', () => {
    const result = parseInferenceResponse([
      [
        { label: 'ENTAILMENT', score: 0.1 },
        { label: 'CONTRADICTION', score: 0.85 },
        { label: 'NEUTRAL', score: 0.05 },
      ],
    ]);
    expect(result).toEqual({ ok: true, value: { label: 'CONTRADICTION', score: 0.85 } });
  });

  it('should accept a flat distribution', () => {
    const result = parseInferenceResponse([
      { label: 'LABEL_2', score: 0.7 },
      { label: 'LABEL_1', score: 0.3 },
    ]);
    expect(result).toEqual({ ok: true, value: { label: 'LABEL_2', score: 0.7 } });
  });

  it('should reject empty and malformed bodies', () => {
    const empty = parseInferenceResponse([]);
    expect(empty.ok).toBe(false);
    if (!empty.ok) {
      expect(empty.error.message).toBe('Inference response contained no predictions');
    }
    expect(parseInferenceResponse({ error: 'model loading' }).ok).toBe(false);
  });
});

describe('InferenceStanceBackend', () => {
  it('should post the pair with a bearer token', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      new Response(JSON.stringify([{ label: 'ENTAILMENT', score: 0.93 }]), { status: 200 })
    );
    const backend = new InferenceStanceBackend({
      endpoint: 'https://inference.test/models/nli',
      apiToken: 'test-token',
      fetchImpl: fetchMock,
    });

    const answer = await backend.classify('premise text', 'hypothesis text');

    expect(answer).toEqual({ label: 'ENTAILMENT', score: 0.93 });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://inference.test/models/nli');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: { text: 'premise text', text_pair: 'hypothesis text' },
    });
  });

  it('should throw on HTTP errors', async () => {
    const backend = new InferenceStanceBackend({
      endpoint: 'https://inference.test/models/nli',
      fetchImpl: async () => new Response('busy', { status: 503 }),
    });
    await expect(backend.classify('p', 'h')).rejects.toThrow('Inference endpoint returned HTTP 503');
  });

  it('should refuse to load without an endpoint', async () => {
    await expect(new InferenceStanceBackend().load()).rejects.toThrow('Inference endpoint not configured');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFIER ADAPTER
// ─────────────────────────────────────────────────────────────────────────────────

describe('StanceClassifier', () => {
  it('should classify with evidence as premise and claim as hypothesis', async () => {
    const backend = fakeBackend('nli', { label: 'LABEL_2', score: 0.8 });
    const classifier = new StanceClassifier([backend]);

    const result = await classifier.classify(CLAIM, evidence);

    expect(result.label).toBe('ENTAILMENT');
    expect(result.confidence).toBe(0.8);
    expect(result.modelVotes).toEqual({ nli: 'ENTAILMENT' });
    expect(result.sourceEvidence).toBe(evidence);
    expect(Object.isFrozen(result)).toBe(true);
    expect(backend.classify.mock.calls[0]?.slice(0, 2)).toEqual([evidence.content, CLAIM]);
  });

  it('should load backends once for concurrent callers', async () => {
    const load = vi.fn(async () => undefined);
    const classifier = new StanceClassifier([fakeBackend('nli', { label: 'neutral', score: 0.6 }, load)]);

    await Promise.all([classifier.initialize(), classifier.initialize(), classifier.classify(CLAIM, evidence)]);

    expect(load).toHaveBeenCalledTimes(1);
    expect(classifier.isReady()).toBe(true);
  });

  it('should exclude backends that fail to load', async () => {
    const classifier = new StanceClassifier([
      fakeBackend('broken', { label: 'true', score: 1 }, async () => {
        throw new Error('weights missing');
      }),
      fakeBackend('good', { label: 'refutes', score: 0.75 }),
    ]);

    const result = await classifier.classify(CLAIM, evidence);

    expect(classifier.availableBackends).toEqual(['good']);
    expect(result).toMatchObject({ label: 'CONTRADICTION', confidence: 0.75, modelVotes: { good: 'CONTRADICTION' } });
  });

  it('should leave failing backends out of the vote', async () => {
    const classifier = new StanceClassifier([
      fakeBackend('flaky', async () => {
        throw new Error('timeout');
      }),
      fakeBackend('steady', { label: 'supports', score: 0.7 }),
    ]);

    const result = await classifier.classify(CLAIM, evidence);

    expect(result.label).toBe('ENTAILMENT');
    expect(result.modelVotes).toEqual({ steady: 'ENTAILMENT' });
  });

  it('should answer NEUTRAL 0.5 when nothing votes', async () => {
    const classifier = new StanceClassifier([]);

    const result = await classifier.classify(CLAIM, evidence);

    expect(classifier.isReady()).toBe(false);
    expect(result.label).toBe('NEUTRAL');
    expect(result.confidence).toBe(0.5);
    expect(result.modelVotes).toEqual({});
  });

  it('should stop calling a backend once its circuit opens', async () => {
    const flaky = fakeBackend('flaky', async () => {
      throw new Error('down');
    });
    const classifier = new StanceClassifier([flaky], { failureThreshold: 1 });

    await classifier.classify(CLAIM, evidence);
    await classifier.classify(CLAIM, evidence);

    expect(flaky.classify).toHaveBeenCalledTimes(1);
  });

  it('should apply configured weights', async () => {
    const classifier = new StanceClassifier(
      [
        fakeBackend('a', { label: 'entailment', score: 0.9 }),
        fakeBackend('b', { label: 'contradiction', score: 0.9 }),
      ],
      { weights: { b: 3 } }
    );

    const result = await classifier.classify(CLAIM, evidence);

    expect(result.label).toBe('CONTRADICTION');
    expect(result.modelVotes).toEqual({ a: 'ENTAILMENT', b: 'CONTRADICTION' });
  });
});
