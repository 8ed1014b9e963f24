// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Validation for Application Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// PRIMITIVES
// ─────────────────────────────────────────────────────────────────────────────────

const unitInterval = z.number().min(0).max(1);

export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const StanceBackendNameSchema = z.enum(['openai', 'inference', 'lexical']);
export type StanceBackendName = z.infer<typeof StanceBackendNameSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(3000),
  host: z.string().default('0.0.0.0'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  pretty: z.boolean().default(true),
  redactSecrets: z.boolean().default(true),
});

export const StorageConfigSchema = z.object({
  redisUrl: z.string().url().optional(),
  historyLimit: z.number().int().min(1).max(500).default(50),
});

/**
 * Pipeline tunables. The early-exit confidences and thresholds vary between
 * deployments, so every one of them is configuration rather than a constant.
 */
export const PipelineConfigSchema = z
  .object({
    similarityThreshold: unitInterval.default(0.5),
    credibilityWeight: z.number().gt(0).lt(1).default(0.6),
    similarityWeight: z.number().gt(0).lt(1).default(0.4),
    topK: z.number().int().min(1).max(50).default(4),
    consensusThreshold: unitInterval.default(0.6),
    noClaimConfidence: unitInterval.default(0.3),
    noEvidenceConfidence: unitInterval.default(0.3),
    noRelevantEvidenceConfidence: unitInterval.default(0.4),
  })
  .refine(
    (p) => Math.abs(p.credibilityWeight + p.similarityWeight - 1) < 1e-9,
    { message: 'credibilityWeight and similarityWeight must sum to 1', path: ['similarityWeight'] }
  );

export const CacheConfigSchema = z.object({
  maxEntries: z.number().int().min(1).default(1000),
  /** 0 keeps entries for the life of the process */
  ttlSeconds: z.number().int().min(0).default(0),
});

export const ClassifierConfigSchema = z.object({
  backends: z.array(StanceBackendNameSchema).min(1).default(['lexical']),
  /** Per-backend ensemble weights; missing backends get equal shares */
  weights: z.record(StanceBackendNameSchema, z.number().positive()).default({}),
  timeoutMs: z.number().int().positive().default(8000),
  openaiApiKey: z.string().min(1).optional(),
  openaiModel: z.string().default('gpt-4o-mini'),
  embeddingModel: z.string().default('text-embedding-3-small'),
  inferenceEndpoint: z.string().url().optional(),
  inferenceApiToken: z.string().min(1).optional(),
});

export const RetrievalConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(10000),
  maxEvidence: z.number().int().min(1).max(50).default(10),
  wikipediaBaseUrl: z.string().url().default('https://en.wikipedia.org'),
  /** Web search runs only when a key is set */
  webSearchApiKey: z.string().min(1).optional(),
  webSearchUrl: z.string().url().default('https://api.search.brave.com/res/v1/web/search'),
});

// ─────────────────────────────────────────────────────────────────────────────────
// APP CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  classifier: ClassifierConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type PipelineConfig = AppConfig['pipeline'];
export type CacheConfig = AppConfig['cache'];
export type ClassifierConfig = AppConfig['classifier'];
export type RetrievalConfig = AppConfig['retrieval'];

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export function safeValidateConfig(input: unknown): z.SafeParseReturnType<AppConfigInput, AppConfig> {
  return AppConfigSchema.safeParse(input);
}

/**
 * Render zod issues as `path: message` lines for startup errors.
 */
export function formatConfigErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
