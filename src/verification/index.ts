// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION MODULE
// ═══════════════════════════════════════════════════════════════════════════════

export * from './types.js';
export { scoreCredibility, inferSourceType, DOMAIN_RULES, SOURCE_TYPE_DEFAULTS } from './credibility.js';
export { RelevanceFilter, DEFAULT_SIMILARITY_THRESHOLD, type RelevanceFilterOptions } from './relevance.js';
export { EvidenceRanker, DEFAULT_RANKER_OPTIONS, type RankerOptions } from './ranker.js';
export { aggregateConsensus, DEFAULT_CONSENSUS_THRESHOLD, type ConsensusResult, type ConsensusScores } from './consensus.js';
export { VerdictCache, hashText, type VerdictCacheOptions } from './cache.js';
export { formatExplanation, EXCERPT_LENGTH } from './explanation.js';
export {
  VerificationOrchestrator,
  MESSAGES,
  type OrchestratorDependencies,
  type OrchestratorOptions,
  type PipelineState,
  type StanceClassifierPort,
} from './orchestrator.js';
export * from './stance/index.js';
