// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADER — Environment Variables → Validated, Frozen AppConfig
// ═══════════════════════════════════════════════════════════════════════════════

import {
  AppConfigSchema,
  EnvironmentSchema,
  formatConfigErrors,
  type AppConfig,
  type AppConfigInput,
  type Environment,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string): boolean | undefined {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value === '') return undefined;
  return parseInt(value, 10);
}

function envFloat(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value === '') return undefined;
  return parseFloat(value);
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function envList(key: string): string[] | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Parses `name:weight` pairs, e.g. `openai:2,lexical:1`.
 * A pair without a colon gets weight 1.
 */
function envWeights(key: string): Record<string, number> | undefined {
  const entries = envList(key);
  if (!entries) return undefined;

  const weights: Record<string, number> = {};
  for (const entry of entries) {
    const [name, raw] = entry.split(':').map(s => s.trim());
    if (!name) continue;
    weights[name] = raw === undefined ? 1 : parseFloat(raw);
  }
  return weights;
}

/** Drop undefined leaves so schema defaults apply. */
function compact(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

function resolveEnvironment(): Environment {
  const parsed = EnvironmentSchema.safeParse(process.env.NODE_ENV);
  return parsed.success ? parsed.data : 'development';
}

// ─────────────────────────────────────────────────────────────────────────────────
// RAW INPUT
// ─────────────────────────────────────────────────────────────────────────────────

function readEnvironment(): Record<string, unknown> {
  const environment = resolveEnvironment();
  const production = environment === 'production' || environment === 'staging';

  return {
    environment,
    server: compact({
      port: envNumber('PORT'),
      host: envString('HOST'),
    }),
    logging: compact({
      level: envString('LOG_LEVEL') ?? (envBool('DEBUG') ? 'debug' : undefined),
      pretty: envBool('LOG_PRETTY') ?? !production,
      redactSecrets: envBool('LOG_REDACT'),
    }),
    storage: compact({
      redisUrl: envString('REDIS_URL'),
      historyLimit: envNumber('HISTORY_LIMIT'),
    }),
    pipeline: compact({
      similarityThreshold: envFloat('SIMILARITY_THRESHOLD'),
      credibilityWeight: envFloat('CREDIBILITY_WEIGHT'),
      similarityWeight: envFloat('SIMILARITY_WEIGHT'),
      topK: envNumber('TOP_K'),
      consensusThreshold: envFloat('CONSENSUS_THRESHOLD'),
      noClaimConfidence: envFloat('NO_CLAIM_CONFIDENCE'),
      noEvidenceConfidence: envFloat('NO_EVIDENCE_CONFIDENCE'),
      noRelevantEvidenceConfidence: envFloat('NO_RELEVANT_EVIDENCE_CONFIDENCE'),
    }),
    cache: compact({
      maxEntries: envNumber('VERDICT_CACHE_MAX_ENTRIES'),
      ttlSeconds: envNumber('VERDICT_CACHE_TTL_SECONDS'),
    }),
    classifier: compact({
      backends: envList('STANCE_BACKENDS'),
      weights: envWeights('STANCE_BACKEND_WEIGHTS'),
      timeoutMs: envNumber('STANCE_TIMEOUT_MS'),
      openaiApiKey: envString('OPENAI_API_KEY'),
      openaiModel: envString('OPENAI_STANCE_MODEL'),
      embeddingModel: envString('OPENAI_EMBEDDING_MODEL'),
      inferenceEndpoint: envString('INFERENCE_ENDPOINT'),
      inferenceApiToken: envString('INFERENCE_API_TOKEN'),
    }),
    retrieval: compact({
      timeoutMs: envNumber('RETRIEVAL_TIMEOUT_MS'),
      maxEvidence: envNumber('MAX_EVIDENCE'),
      wikipediaBaseUrl: envString('WIKIPEDIA_BASE_URL'),
      webSearchApiKey: envString('BRAVE_API_KEY'),
      webSearchUrl: envString('WEB_SEARCH_URL'),
    }),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// FREEZE
// ─────────────────────────────────────────────────────────────────────────────────

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CACHED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

let cachedConfig: Readonly<AppConfig> | null = null;

/**
 * Load, validate and freeze configuration from the environment.
 * Subsequent calls return the same object until resetConfig().
 */
export function loadConfig(): Readonly<AppConfig> {
  if (cachedConfig) return cachedConfig;

  const result = AppConfigSchema.safeParse(readEnvironment());
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatConfigErrors(result.error)}`);
  }

  cachedConfig = deepFreeze(result.data);
  return cachedConfig;
}

export function getConfig(): Readonly<AppConfig> {
  if (!cachedConfig) {
    throw new Error('Configuration not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

export function resetConfig(): void {
  cachedConfig = null;
}

export function reloadConfig(): Readonly<AppConfig> {
  resetConfig();
  return loadConfig();
}

/**
 * Build a config from explicit values, bypassing the environment.
 * Replaces the cached config so getConfig() sees it.
 */
export function loadTestConfig(overrides: AppConfigInput = {}): Readonly<AppConfig> {
  cachedConfig = deepFreeze(AppConfigSchema.parse({ environment: 'test', ...overrides }));
  return cachedConfig;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVENIENCE
// ─────────────────────────────────────────────────────────────────────────────────

export function getEnvironment(): Environment {
  return getConfig().environment;
}

export function isProduction(): boolean {
  return getEnvironment() === 'production';
}
