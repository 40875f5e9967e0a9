/**
 * Runtime wiring shared by the health Lambdas.
 *
 * One runtime per warm container: the insight cache lives as long as the
 * container does, so repeated requests within it reuse generated insights.
 */

import {
  DynamoInsightRepository,
  DynamoMetricStore,
  InsightCache,
  InsightService,
  createDocClient,
  loadInsightConfig,
  type InsightConfig,
  type MetricStore,
} from "@health/core";
import { BedrockModelClient, createBedrockClient } from "./invoke-model.js";

const DEFAULT_USER_ID = "default";
const DEFAULT_REGION = "us-east-1";

type Env = Record<string, string | undefined>;

export interface RuntimeEnv {
  tableName: string;
  modelId: string;
  /** Whose data this deployment serves */
  userId: string;
  /** Region of the table and the model endpoint */
  region: string;
}

export interface HealthRuntime {
  config: InsightConfig;
  store: MetricStore;
  cache: InsightCache;
  service: InsightService;
}

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`${name} environment variable must be set`);
  }
  return value;
}

export function loadRuntimeEnv(env: Env = process.env): RuntimeEnv {
  return {
    tableName: required(env, "TABLE_NAME"),
    modelId: required(env, "MODEL_ID"),
    userId: env.HEALTH_USER_ID?.trim() || DEFAULT_USER_ID,
    region: env.AWS_REGION?.trim() || DEFAULT_REGION,
  };
}

/**
 * Build the DynamoDB + Bedrock backed runtime from the environment
 */
export function createHealthRuntime(env: Env = process.env): HealthRuntime {
  const config = loadInsightConfig(env);
  const { tableName, modelId, userId, region } = loadRuntimeEnv(env);

  const docClient = createDocClient(region);
  const store = new DynamoMetricStore(docClient, tableName, userId);
  const cache = new InsightCache({ ttlMs: config.cacheTtlMs, maxEntries: config.cacheMaxEntries });
  const service = new InsightService({
    store,
    model: new BedrockModelClient(modelId, createBedrockClient(region)),
    cache,
    config,
    repository: new DynamoInsightRepository(docClient, tableName, userId, config.cacheTtlMs),
    scope: userId,
  });

  return { config, store, cache, service };
}

let runtime: HealthRuntime | undefined;

/**
 * Lazily created runtime for this container
 */
export function getHealthRuntime(): HealthRuntime {
  runtime ??= createHealthRuntime();
  return runtime;
}

/**
 * Drop the container runtime and its cached insights
 */
export function resetHealthRuntime(): void {
  runtime?.cache.clear();
  runtime = undefined;
}
