// ═══════════════════════════════════════════════════════════════════════════════
// CONTAINER — Wires Configuration into Collaborators and the Orchestrator
// ═══════════════════════════════════════════════════════════════════════════════

import {
  CompositeRetriever,
  EmbeddingSimilarityScorer,
  FrequencyKeywordExtractor,
  HeuristicClaimExtractor,
  LexicalSimilarityScorer,
  WebSearchRetriever,
  WikipediaRetriever,
} from './collaborators/index.js';
import type { AppConfig, StanceBackendName } from './config/index.js';
import { HistoryStore } from './history/index.js';
import { getLogger } from './logging/index.js';
import { createStore, type KeyValueStore } from './storage/index.js';
import {
  EvidenceRanker,
  InferenceStanceBackend,
  LexicalStanceBackend,
  OpenAIStanceBackend,
  RelevanceFilter,
  StanceClassifier,
  VerdictCache,
  VerificationOrchestrator,
  type EvidenceRetriever,
  type SimilarityScorer,
  type StanceBackend,
} from './verification/index.js';

const logger = getLogger({ component: 'container' });

export interface Container {
  readonly config: Readonly<AppConfig>;
  readonly store: KeyValueStore;
  readonly history: HistoryStore;
  readonly classifier: StanceClassifier;
  readonly orchestrator: VerificationOrchestrator;
}

/** Pieces tests (or alternative deployments) may swap out */
export interface ContainerOverrides {
  store?: KeyValueStore;
  retriever?: EvidenceRetriever;
  scorer?: SimilarityScorer;
  backends?: StanceBackend[];
}

export function createStanceBackend(name: StanceBackendName, config: AppConfig['classifier']): StanceBackend {
  switch (name) {
    case 'openai':
      return new OpenAIStanceBackend({ apiKey: config.openaiApiKey, model: config.openaiModel });
    case 'inference':
      return new InferenceStanceBackend({
        endpoint: config.inferenceEndpoint,
        apiToken: config.inferenceApiToken,
      });
    case 'lexical':
      return new LexicalStanceBackend();
  }
}

function createScorer(config: Readonly<AppConfig>): SimilarityScorer {
  const { openaiApiKey, embeddingModel, timeoutMs } = config.classifier;
  if (openaiApiKey) {
    return new EmbeddingSimilarityScorer({ apiKey: openaiApiKey, model: embeddingModel, timeoutMs });
  }
  return new LexicalSimilarityScorer();
}

/** Wikipedia always; web search when an API key is configured. */
export function createEvidenceSources(config: Readonly<AppConfig>): EvidenceRetriever[] {
  const { wikipediaBaseUrl, webSearchApiKey, webSearchUrl, timeoutMs } = config.retrieval;
  const sources: EvidenceRetriever[] = [new WikipediaRetriever({ baseUrl: wikipediaBaseUrl, timeoutMs })];

  if (webSearchApiKey) {
    sources.push(new WebSearchRetriever({ apiKey: webSearchApiKey, endpoint: webSearchUrl, timeoutMs }));
  }
  return sources;
}

function createRetriever(config: Readonly<AppConfig>): EvidenceRetriever {
  return new CompositeRetriever(createEvidenceSources(config), { maxEvidence: config.retrieval.maxEvidence });
}

/**
 * Build the object graph. Nothing here touches the network; stance backends
 * load on `classifier.initialize()` or the first classification.
 */
export function createContainer(config: Readonly<AppConfig>, overrides: ContainerOverrides = {}): Container {
  const { pipeline, cache, classifier: classifierConfig, storage } = config;

  const store = overrides.store ?? createStore(storage.redisUrl);
  const history = new HistoryStore(store, storage.historyLimit);

  const classifier = new StanceClassifier(
    overrides.backends ?? classifierConfig.backends.map(name => createStanceBackend(name, classifierConfig)),
    { weights: classifierConfig.weights, timeoutMs: classifierConfig.timeoutMs }
  );

  const orchestrator = new VerificationOrchestrator(
    {
      claimExtractor: new HeuristicClaimExtractor(),
      keywordExtractor: new FrequencyKeywordExtractor(),
      retriever: overrides.retriever ?? createRetriever(config),
      relevanceFilter: new RelevanceFilter(overrides.scorer ?? createScorer(config), {
        threshold: pipeline.similarityThreshold,
      }),
      ranker: new EvidenceRanker({
        credibilityWeight: pipeline.credibilityWeight,
        similarityWeight: pipeline.similarityWeight,
        topK: pipeline.topK,
      }),
      classifier,
      cache: new VerdictCache({ maxEntries: cache.maxEntries, ttlSeconds: cache.ttlSeconds }),
    },
    {
      consensusThreshold: pipeline.consensusThreshold,
      noClaimConfidence: pipeline.noClaimConfidence,
      noEvidenceConfidence: pipeline.noEvidenceConfidence,
      noRelevantEvidenceConfidence: pipeline.noRelevantEvidenceConfidence,
    }
  );

  logger.debug('Container built', { backends: classifierConfig.backends });
  return { config, store, history, classifier, orchestrator };
}
