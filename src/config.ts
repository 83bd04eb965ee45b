/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the dispatcher requires.
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional string env var restricted to a fixed set of values. */
function optionalEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = process.env[key];
  const match = allowed.find(value => value === raw);
  return match ?? defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional float env var with a default. */
function optionalFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseFloat(raw) : defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

export const MATCHER_STRATEGIES = ['tags', 'classifier'] as const;
export const UNREACHABLE_POLICIES = ['last-resort', 'exclude'] as const;
export const SESSION_PROVIDERS = ['memory', 'sqlite'] as const;
export const SESSION_CONCURRENCY_POLICIES = ['queue', 'reject'] as const;

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  anthropicApiKey: process.env.ANTHROPIC_API_KEY,

  /** Dispatch Router policy */
  dispatch: {
    attemptTimeoutMs: optionalInt('DISPATCH_ATTEMPT_TIMEOUT_MS', 30000),
    minConfidence: optionalFloat('DISPATCH_MIN_CONFIDENCE', 0),
    unreachablePolicy: optionalEnum('DISPATCH_UNREACHABLE_POLICY', UNREACHABLE_POLICIES, 'last-resort'),
  },

  /** Capability matcher selection */
  matcher: {
    strategy: optionalEnum('MATCHER_STRATEGY', MATCHER_STRATEGIES, 'tags'),
    classifierModel: optional('CLASSIFIER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
  },

  /** Conversation session storage */
  session: {
    provider: optionalEnum('SESSION_STORE_PROVIDER', SESSION_PROVIDERS, 'memory'),
    sqlitePath: dbPath('SESSION_SQLITE_PATH', '/app/data/sessions.db', './data/sessions.db'),
    idleTtlMs: optionalInt('SESSION_IDLE_TTL_MS', 30 * 60 * 1000),
    evictionIntervalMs: optionalInt('SESSION_EVICTION_INTERVAL_MS', 60000),
    concurrency: optionalEnum('SESSION_CONCURRENCY', SESSION_CONCURRENCY_POLICIES, 'queue'),
  },

  /** Optional background health checks (0 disables) */
  healthCheck: {
    intervalMs: optionalInt('HEALTH_CHECK_INTERVAL_MS', 0),
    timeoutMs: optionalInt('HEALTH_CHECK_TIMEOUT_MS', 5000),
  },

  /** JSON file of agents registered at start-up */
  agentsFile: process.env.AGENTS_FILE,
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
// Largest delay setTimeout/setInterval accept; larger values fire after 1ms.
const MAX_TIMER_MS = 2_147_483_647;

export function validateConfig(cfg: AppConfig = config): void {
  const errors: string[] = [];

  if (cfg.matcher.strategy === 'classifier' && !cfg.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required when MATCHER_STRATEGY=classifier');
  }

  // Numeric bounds
  if (!Number.isInteger(cfg.port) || cfg.port < 1 || cfg.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${cfg.port}`);
  }
  if (!(cfg.dispatch.attemptTimeoutMs >= 1 && cfg.dispatch.attemptTimeoutMs <= MAX_TIMER_MS)) {
    errors.push(`DISPATCH_ATTEMPT_TIMEOUT_MS must be 1-${MAX_TIMER_MS}, got ${cfg.dispatch.attemptTimeoutMs}`);
  }
  if (!(cfg.dispatch.minConfidence >= 0 && cfg.dispatch.minConfidence <= 1)) {
    errors.push(`DISPATCH_MIN_CONFIDENCE must be 0-1, got ${cfg.dispatch.minConfidence}`);
  }
  if (!(cfg.session.idleTtlMs >= 1000)) {
    errors.push(`SESSION_IDLE_TTL_MS must be >= 1000, got ${cfg.session.idleTtlMs}`);
  }
  if (!(cfg.session.evictionIntervalMs >= 1000 && cfg.session.evictionIntervalMs <= MAX_TIMER_MS)) {
    errors.push(`SESSION_EVICTION_INTERVAL_MS must be 1000-${MAX_TIMER_MS}, got ${cfg.session.evictionIntervalMs}`);
  }
  if (!(cfg.healthCheck.intervalMs === 0 || (cfg.healthCheck.intervalMs >= 1000 && cfg.healthCheck.intervalMs <= MAX_TIMER_MS))) {
    errors.push(`HEALTH_CHECK_INTERVAL_MS must be 0 or 1000-${MAX_TIMER_MS}, got ${cfg.healthCheck.intervalMs}`);
  }
  if (!(cfg.healthCheck.timeoutMs >= 1 && cfg.healthCheck.timeoutMs <= MAX_TIMER_MS)) {
    errors.push(`HEALTH_CHECK_TIMEOUT_MS must be 1-${MAX_TIMER_MS}, got ${cfg.healthCheck.timeoutMs}`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
