/**
 * @health/core
 *
 * Health metric model, storage, aggregation, and cached AI insights
 *
 * @example
 * ```typescript
 * import {
 *   InMemoryMetricStore,
 *   InsightCache,
 *   InsightService,
 *   loadInsightConfig,
 * } from "@health/core";
 *
 * const config = loadInsightConfig();
 * const service = new InsightService({
 *   store: new InMemoryMetricStore(),
 *   model,
 *   cache: new InsightCache({ ttlMs: config.cacheTtlMs, maxEntries: config.cacheMaxEntries }),
 *   config,
 * });
 * const insight = await service.recentInsight(7);
 * ```
 */

// Configuration and typed failures
export * from "./config.js";
export * from "./errors.js";

// Models - Type definitions
export * from "./models/index.js";

// Storage - DynamoDB operations
export * from "./storage/index.js";

// Parsers - Record validation and model response parsing
export * from "./parsers/index.js";

// Analysis - Statistics and correlations
export * from "./analysis/index.js";

// Aggregations - Daily summaries
export * from "./aggregations/index.js";

// Prompt - Deterministic prompt rendering
export * from "./prompt/index.js";

// Cache - Fingerprints and reservations
export * from "./cache/index.js";

// Model - Text generation boundary
export * from "./model/index.js";

// Service - Insight entry points
export * from "./service/index.js";
