// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with Request Correlation & Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// JSON lines in production, coloured single lines in development.
//
// Usage:
//   const logger = getLogger({ component: 'orchestrator' });
//   logger.info('Verdict computed', { label, confidence });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLoggingContext } from './context.js';

export { runWithContext, getLoggingContext, getRequestId, type LoggingContext } from './context.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  /** Mask values under secret-looking keys (apiKey, token, authorization) */
  redactSecrets: boolean;
  serviceName: string;
  environment: string;
}

export interface LoggerOptions {
  component?: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;
  child(options: LoggerOptions): Logger;
  isLevelEnabled(level: LogLevel): boolean;
}

interface LogEntry {
  level: LogLevel;
  time: string;
  msg: string;
  service: string;
  env: string;
  component?: string;
  requestId?: string;
  fields: Record<string, unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redactSecrets: true,
  serviceName: 'veracity',
  environment: process.env.NODE_ENV ?? 'development',
};

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const SECRET_KEY = /(api[-_]?key|token|secret|password|authorization)/i;
const MAX_DEPTH = 6;

function redact(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) return '[DEPTH]';
  if (Array.isArray(value)) return value.map(v => redact(v, depth + 1));
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = SECRET_KEY.test(key) ? '[REDACTED]' : redact(child, depth + 1);
    }
    return out;
  }
  return value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }
  return { errorMessage: String(error) };
}

function toJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    levelNum: LOG_LEVELS[entry.level],
    time: entry.time,
    msg: entry.msg,
    service: entry.service,
    env: entry.env,
    ...(entry.component && { component: entry.component }),
    ...(entry.requestId && { requestId: entry.requestId }),
    ...entry.fields,
  });
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function prettyPrint(entry: LogEntry): string {
  const timeStr = entry.time.split('T')[1]?.replace('Z', '') ?? '';
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const componentStr = entry.component ? `[${entry.component}]` : '';
  const requestIdStr = entry.requestId ? `[${entry.requestId.slice(0, 8)}]` : '';
  const contextStr = Object.keys(entry.fields).length > 0
    ? ` ${DIM}${JSON.stringify(entry.fields)}${RESET}`
    : '';

  return `${DIM}${timeStr}${RESET} ${COLORS[entry.level]}${levelStr}${RESET} ${requestIdStr}${componentStr} ${entry.msg}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(entry: LogEntry): void {
  const line = globalConfig.pretty ? prettyPrint(entry) : toJson(entry);

  if (entry.level === 'error' || entry.level === 'fatal') {
    console.error(line);
  } else if (entry.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): Logger {
  const { component, context: baseContext = {} } = options;

  // Level is read per call so configureLogger() applies to existing loggers.
  const enabled = (level: LogLevel): boolean =>
    LOG_LEVELS[level] >= LOG_LEVELS[globalConfig.level];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (!enabled(level)) return;

    const { requestId, ...requestFields } = getLoggingContext();
    const merged = { ...requestFields, ...baseContext, ...context };
    const redacted = globalConfig.redactSecrets ? redact(merged) : merged;

    writeLog({
      level,
      time: new Date().toISOString(),
      msg: message,
      service: globalConfig.serviceName,
      env: globalConfig.environment,
      component,
      requestId,
      fields: isRecord(redacted) ? redacted : {},
    });
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) =>
      log('error', message, { ...context, ...(error !== undefined ? formatError(error) : {}) }),
    fatal: (message, error, context) =>
      log('fatal', message, { ...context, ...(error !== undefined ? formatError(error) : {}) }),
    child: (childOptions) =>
      createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      }),
    isLevelEnabled: enabled,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

const loggers = new Map<string, Logger>();

/**
 * Get a component logger. Loggers without extra context are memoized per component.
 */
export function getLogger(options: LoggerOptions = {}): Logger {
  if (options.context) {
    return createLoggerImpl(options);
  }
  const key = options.component ?? '';
  let logger = loggers.get(key);
  if (!logger) {
    logger = createLoggerImpl(options);
    loggers.set(key, logger);
  }
  return logger;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  requestId?: string;
}

export function logRequest(data: RequestLogData): void {
  const logger = getLogger({ component: 'http' });
  const line = `${data.method} ${data.path} ${data.statusCode}`;
  const context: Record<string, unknown> = { durationMs: data.durationMs };
  if (data.requestId) context.requestId = data.requestId;

  if (data.statusCode >= 500) {
    logger.error(line, undefined, context);
  } else if (data.statusCode >= 400) {
    logger.warn(line, context);
  } else {
    logger.info(line, context);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// TIMING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Run `fn` and log its duration at debug, or at error if it throws.
 */
export async function withTiming<T>(name: string, fn: () => Promise<T>, logger?: Logger): Promise<T> {
  const log = logger ?? getLogger({ component: 'perf' });
  const start = performance.now();

  try {
    const result = await fn();
    log.debug(`${name} completed`, { durationMs: (performance.now() - start).toFixed(2) });
    return result;
  } catch (error) {
    log.error(`${name} failed`, error, { durationMs: (performance.now() - start).toFixed(2) });
    throw error;
  }
}
