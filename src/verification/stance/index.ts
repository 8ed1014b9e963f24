// ═══════════════════════════════════════════════════════════════════════════════
// STANCE MODULE
// ═══════════════════════════════════════════════════════════════════════════════

export { StanceClassifier, type StanceClassifierOptions } from './classifier.js';
export { combineVotes, type Vote, type EnsembleResult } from './ensemble.js';
export { mapLabel } from './label-map.js';
export type { StanceBackend, BackendAnswer } from './types.js';
export { LexicalStanceBackend } from './backends/lexical.js';
export { OpenAIStanceBackend, parseStanceAnswer, type ChatCompleter } from './backends/openai.js';
export { InferenceStanceBackend, parseInferenceResponse } from './backends/inference.js';
