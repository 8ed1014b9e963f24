// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR TESTS — Pipeline Flow, Early Exits, Error Boundary, Caching
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

import {
  EvidenceRanker,
  MESSAGES,
  RelevanceFilter,
  VerdictCache,
  VerificationOrchestrator,
  type EvidenceItem,
  type EvidenceRetriever,
  type OrchestratorOptions,
  type StanceClassifierPort,
  type StanceLabel,
} from '../verification/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

function evidenceItem(source: string, credibilityScore: number): EvidenceItem {
  return {
    content: `${source} says the tower is in Paris`,
    source,
    url: `https://example.com/${source}`,
    credibilityScore,
    sourceType: 'web',
  };
}

interface Harness {
  orchestrator: VerificationOrchestrator;
  extract: Mock<(text: string) => string[]>;
  keywords: Mock<(claim: string) => string[]>;
  retrieve: Mock<EvidenceRetriever['retrieve']>;
  classify: Mock<StanceClassifierPort['classify']>;
}

function createHarness(options: {
  claims?: string[];
  evidence?: EvidenceItem[];
  similarity?: number;
  stances?: Record<string, StanceLabel>;
  topK?: number;
  orchestratorOptions?: OrchestratorOptions;
} = {}): Harness {
  const extract = vi.fn((_text: string) => options.claims ?? ['The Eiffel Tower is in Paris.']);
  const keywords = vi.fn((_claim: string) => ['Eiffel Tower', 'Paris']);
  const retrieve = vi.fn<EvidenceRetriever['retrieve']>(async () => options.evidence ?? [
    evidenceItem('alpha', 0.95),
    evidenceItem('beta', 0.85),
  ]);
  const classify = vi.fn<StanceClassifierPort['classify']>(async (_claim, item) => ({
    label: options.stances?.[item.source] ?? 'ENTAILMENT',
    confidence: 0.9,
    sourceEvidence: item,
    modelVotes: {},
  }));

  const orchestrator = new VerificationOrchestrator(
    {
      claimExtractor: { extract },
      keywordExtractor: { extract: keywords },
      retriever: { retrieve },
      relevanceFilter: new RelevanceFilter({ similarity: () => options.similarity ?? 0.9 }),
      ranker: new EvidenceRanker({ topK: options.topK ?? 4 }),
      classifier: { classify },
      cache: new VerdictCache(),
    },
    options.orchestratorOptions
  );

  return { orchestrator, extract, keywords, retrieve, classify };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PIPELINE
// ─────────────────────────────────────────────────────────────────────────────────

describe('VerificationOrchestrator', () => {
  describe('aggregated verdicts', () => {
    it('should return True when every source entails the claim', async () => {
      const { orchestrator, retrieve } = createHarness();

      const verdict = await orchestrator.verify('The Eiffel Tower is in Paris.');

      expect(verdict.label).toBe('True');
      expect(verdict.confidence).toBe(1);
      expect(verdict.outcome).toBe('AGGREGATED');
      expect(verdict.explanation.split('\n')[0]).toBe('**Analyzed 2 sources:**');
      expect(retrieve).toHaveBeenCalledWith(['Eiffel Tower', 'Paris']);
    });

    it('should return False when credible sources contradict', async () => {
      const { orchestrator } = createHarness({
        stances: { alpha: 'CONTRADICTION', beta: 'CONTRADICTION' },
      });

      const verdict = await orchestrator.verify('The Eiffel Tower is in Rome.');

      expect(verdict.label).toBe('False');
      expect(verdict.confidence).toBe(1);
    });

    it('should return Low Confidence on a split vote', async () => {
      const { orchestrator } = createHarness({
        evidence: [evidenceItem('alpha', 0.9), evidenceItem('beta', 0.9)],
        stances: { alpha: 'ENTAILMENT', beta: 'CONTRADICTION' },
      });

      const verdict = await orchestrator.verify('A contested statement about towers.');

      expect(verdict.label).toBe('Low Confidence');
      expect(verdict.confidence).toBeCloseTo(0.5, 10);
      expect(verdict.outcome).toBe('AGGREGATED');
    });

    it('should verify only the first extracted claim', async () => {
      const { orchestrator, keywords, classify } = createHarness({
        claims: ['First claim here.', 'Second claim here.'],
      });

      await orchestrator.verify('First claim here. Second claim here.');

      expect(keywords).toHaveBeenCalledWith('First claim here.');
      expect(classify.mock.calls.every(([claim]) => claim === 'First claim here.')).toBe(true);
    });

    it('should classify only the top K ranked items', async () => {
      const { orchestrator, classify } = createHarness({
        evidence: [
          evidenceItem('low', 0.6),
          evidenceItem('top', 0.95),
          evidenceItem('mid', 0.85),
          evidenceItem('lower', 0.6),
        ],
        topK: 2,
      });

      await orchestrator.verify('The Eiffel Tower is in Paris.');

      expect(classify.mock.calls.map(([, item]) => item.source)).toEqual(['top', 'mid']);
    });

    it('should clamp out-of-range credibility scores from retrievers', async () => {
      const { orchestrator, classify } = createHarness({
        evidence: [evidenceItem('overrated', 1.5), evidenceItem('negative', -0.2)],
      });

      const verdict = await orchestrator.verify('The Eiffel Tower is in Paris.');

      expect(classify.mock.calls.map(([, item]) => item.credibilityScore)).toEqual([1, 0]);
      expect(verdict.explanation).toContain('Credibility Score: 1.00');
      expect(verdict.confidence).toBe(1);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Early exits
  // ───────────────────────────────────────────────────────────────────────────

  describe('early exits', () => {
    it('should stop when no claim is found', async () => {
      const { orchestrator, retrieve } = createHarness({ claims: [] });

      expect(await orchestrator.verify('hi')).toEqual({
        label: 'Low Confidence',
        confidence: 0.3,
        explanation: MESSAGES.NO_CLAIM,
        outcome: 'NO_CLAIM',
      });
      expect(retrieve).not.toHaveBeenCalled();
    });

    it('should stop when no evidence is retrieved', async () => {
      const { orchestrator, classify } = createHarness({ evidence: [] });

      expect(await orchestrator.verify('An obscure statement nobody wrote about.')).toEqual({
        label: 'Low Confidence',
        confidence: 0.3,
        explanation: 'Not enough reliable evidence found.',
        outcome: 'NO_EVIDENCE',
      });
      expect(classify).not.toHaveBeenCalled();
    });

    it('should stop when nothing is relevant', async () => {
      const { orchestrator, classify } = createHarness({ similarity: 0.5 });

      expect(await orchestrator.verify('The Eiffel Tower is in Paris.')).toEqual({
        label: 'Low Confidence',
        confidence: 0.4,
        explanation: 'No semantically relevant evidence found.',
        outcome: 'NO_RELEVANT_EVIDENCE',
      });
      expect(classify).not.toHaveBeenCalled();
    });

    it('should use configured early-exit confidences', async () => {
      const { orchestrator } = createHarness({
        evidence: [],
        orchestratorOptions: { noEvidenceConfidence: 0.25 },
      });

      expect((await orchestrator.verify('Some statement with no sources.')).confidence).toBe(0.25);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Errors and caching
  // ───────────────────────────────────────────────────────────────────────────

  describe('errors', () => {
    let harness: Harness;

    beforeEach(() => {
      harness = createHarness();
      harness.retrieve.mockRejectedValue(new Error('search backend unavailable'));
    });

    it('should convert unexpected failures into an Error verdict', async () => {
      expect(await harness.orchestrator.verify('The Eiffel Tower is in Paris.')).toEqual({
        label: 'Error',
        confidence: 0,
        explanation: 'An internal error occurred: search backend unavailable',
        outcome: 'ERROR',
      });
    });

    it('should not cache Error verdicts', async () => {
      await harness.orchestrator.verify('The Eiffel Tower is in Paris.');
      await harness.orchestrator.verify('The Eiffel Tower is in Paris.');

      expect(harness.retrieve).toHaveBeenCalledTimes(2);
    });
  });

  describe('caching', () => {
    it('should answer repeated text from the cache', async () => {
      const { orchestrator, retrieve, classify } = createHarness();

      const first = await orchestrator.verify('The Eiffel Tower is in Paris.');
      const second = await orchestrator.verify('The Eiffel Tower is in Paris.');

      expect(second).toEqual(first);
      expect(retrieve).toHaveBeenCalledTimes(1);
      expect(classify).toHaveBeenCalledTimes(2);
    });

    it('should cache early-exit verdicts too', async () => {
      const { orchestrator, extract } = createHarness({ claims: [] });

      await orchestrator.verify('hi');
      await orchestrator.verify('hi');

      expect(extract).toHaveBeenCalledTimes(1);
    });
  });
});
