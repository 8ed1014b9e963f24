// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TESTS — Environment Loading and Schema Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  formatConfigErrors,
  getConfig,
  getDefaultConfig,
  isConfigLoaded,
  isProduction,
  loadConfig,
  loadTestConfig,
  reloadConfig,
  safeValidateConfig,
} from '../config/index.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('getDefaultConfig', () => {
  it('should carry the pipeline defaults', () => {
    const config = getDefaultConfig();
    expect(config.pipeline).toEqual({
      similarityThreshold: 0.5,
      credibilityWeight: 0.6,
      similarityWeight: 0.4,
      topK: 4,
      consensusThreshold: 0.6,
      noClaimConfidence: 0.3,
      noEvidenceConfidence: 0.3,
      noRelevantEvidenceConfidence: 0.4,
    });
    expect(config.cache).toEqual({ maxEntries: 1000, ttlSeconds: 0 });
    expect(config.classifier.backends).toEqual(['lexical']);
    expect(config.storage.historyLimit).toBe(50);
  });
});

describe('loadConfig', () => {
  it('should read pipeline settings from the environment', () => {
    vi.stubEnv('TOP_K', '6');
    vi.stubEnv('CREDIBILITY_WEIGHT', '0.7');
    vi.stubEnv('SIMILARITY_WEIGHT', '0.3');
    vi.stubEnv('VERDICT_CACHE_TTL_SECONDS', '120');

    const config = loadConfig();
    expect(config.pipeline.topK).toBe(6);
    expect(config.pipeline.credibilityWeight).toBe(0.7);
    expect(config.pipeline.similarityWeight).toBe(0.3);
    expect(config.cache.ttlSeconds).toBe(120);
  });

  it('should parse backend lists and weights', () => {
    vi.stubEnv('STANCE_BACKENDS', 'openai, lexical');
    vi.stubEnv('STANCE_BACKEND_WEIGHTS', 'openai:2,lexical');

    const config = loadConfig();
    expect(config.classifier.backends).toEqual(['openai', 'lexical']);
    expect(config.classifier.weights).toEqual({ openai: 2, lexical: 1 });
  });

  it('should fail fast when ranker weights do not sum to 1', () => {
    vi.stubEnv('CREDIBILITY_WEIGHT', '0.6');
    vi.stubEnv('SIMILARITY_WEIGHT', '0.5');

    expect(() => loadConfig()).toThrow(
      'pipeline.similarityWeight: credibilityWeight and similarityWeight must sum to 1'
    );
    expect(isConfigLoaded()).toBe(false);
  });

  it('should reject unknown stance backends', () => {
    vi.stubEnv('STANCE_BACKENDS', 'oracle');
    expect(() => loadConfig()).toThrow(/classifier\.backends\.0/);
  });

  it('should cache until reloaded', () => {
    const first = loadConfig();
    expect(loadConfig()).toBe(first);
    expect(reloadConfig()).not.toBe(first);
  });

  it('should freeze the result', () => {
    const config = loadConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.pipeline)).toBe(true);
  });
});

describe('getConfig', () => {
  it('should throw before loading', () => {
    expect(() => getConfig()).toThrow('Configuration not loaded. Call loadConfig() first.');
  });

  it('should return the test config once set', () => {
    loadTestConfig({ pipeline: { topK: 2 } });
    expect(getConfig().environment).toBe('test');
    expect(getConfig().pipeline.topK).toBe(2);
    expect(getConfig().pipeline.similarityThreshold).toBe(0.5);
    expect(isProduction()).toBe(false);
  });
});

describe('formatConfigErrors', () => {
  it('should label issues without a path as root', () => {
    const result = safeValidateConfig('nope');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigErrors(result.error)).toBe('(root): Expected object, received string');
    }
  });

  it('should join nested paths with dots', () => {
    const result = safeValidateConfig({ cache: { maxEntries: 0 } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigErrors(result.error)).toBe(
        'cache.maxEntries: Number must be greater than or equal to 1'
      );
    }
  });
});
