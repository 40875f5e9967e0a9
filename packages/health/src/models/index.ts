/**
 * @health/core - Models
 *
 * Type definitions for metric records, summaries, and insights
 */

// Base types
export type { BaseRecord } from "./base.js";

// Metric records
export type {
  SleepPhases,
  SleepRecord,
  HeartRateRecord,
  BodyComposition,
  WeightRecord,
  MetricRecord,
  MetricType,
} from "./metrics.js";
export { METRIC_TYPES, isMetricType } from "./metrics.js";

// Daily summaries
export type {
  SleepSummaryExtra,
  HeartRateSummaryExtra,
  WeightSummaryExtra,
  SleepDailySummary,
  HeartRateDailySummary,
  WeightDailySummary,
  DailySummary,
} from "./summaries.js";

// Insights
export type { InsightKind, InsightTimeRange, Insight, StoredInsight } from "./insights.js";
