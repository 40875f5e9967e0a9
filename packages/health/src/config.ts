/**
 * Insight pipeline configuration, read from environment variables
 */

export interface InsightConfig {
  /** Lifetime of a ready cache entry and of a persisted insight */
  cacheTtlMs: number;
  /** Ready entries kept before the least recently used is evicted */
  cacheMaxEntries: number;
  /** Bound on a single model call */
  modelTimeoutMs: number;
  /** How long a caller waits on another caller's generation */
  waitTimeoutMs: number;
  /** Maximum prompt length in characters */
  maxPromptLength: number;
  /** Bump to invalidate fingerprints when aggregation logic changes */
  aggregationVersion: string;
  /** Bump to invalidate fingerprints when the prompt template changes */
  promptTemplateVersion: string;
  /** IANA timezone that defines the user's calendar day */
  timezone: string;
}

export const DEFAULT_INSIGHT_CONFIG: InsightConfig = {
  cacheTtlMs: 24 * 60 * 60 * 1000,
  cacheMaxEntries: 500,
  modelTimeoutMs: 30_000,
  waitTimeoutMs: 35_000,
  maxPromptLength: 6000,
  aggregationVersion: "agg-v1",
  promptTemplateVersion: "prompt-v1",
  timezone: "UTC",
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readTimezone(env: Env, name: string, fallback: string): string {
  const timezone = readString(env, name, fallback);
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: timezone });
  } catch (error) {
    throw new Error(`${name} is not a valid IANA timezone: "${timezone}"`, { cause: error });
  }
  return timezone;
}

/**
 * Load configuration from the environment, falling back to defaults
 */
export function loadInsightConfig(env: Env = process.env): InsightConfig {
  const modelTimeoutMs = readPositiveInt(env, "MODEL_TIMEOUT_MS", DEFAULT_INSIGHT_CONFIG.modelTimeoutMs);

  return {
    cacheTtlMs: readPositiveInt(env, "INSIGHT_CACHE_TTL_MS", DEFAULT_INSIGHT_CONFIG.cacheTtlMs),
    cacheMaxEntries: readPositiveInt(
      env,
      "INSIGHT_CACHE_MAX_ENTRIES",
      DEFAULT_INSIGHT_CONFIG.cacheMaxEntries
    ),
    modelTimeoutMs,
    // Waiters default to slightly longer than the generation they wait on
    waitTimeoutMs: readPositiveInt(env, "INSIGHT_WAIT_TIMEOUT_MS", modelTimeoutMs + 5000),
    maxPromptLength: readPositiveInt(env, "MAX_PROMPT_LENGTH", DEFAULT_INSIGHT_CONFIG.maxPromptLength),
    aggregationVersion: readString(env, "AGGREGATION_VERSION", DEFAULT_INSIGHT_CONFIG.aggregationVersion),
    promptTemplateVersion: readString(
      env,
      "PROMPT_TEMPLATE_VERSION",
      DEFAULT_INSIGHT_CONFIG.promptTemplateVersion
    ),
    timezone: readTimezone(env, "DATA_TIMEZONE", DEFAULT_INSIGHT_CONFIG.timezone),
  };
}
