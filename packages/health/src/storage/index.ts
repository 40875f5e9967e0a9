/**
 * @health/core - Storage
 *
 * DynamoDB storage layer for metric records and insights
 */

// Client
export { createDocClient } from "./client.js";

// Calendar days and key generation
export {
  DAY_MS,
  formatDateInTimezone,
  isValidDateString,
  addDays,
  getStartOfDayInTimezone,
  enumerateDates,
  padTimestamp,
  generateRecordHash,
  generateRecordKeys,
  generateInsightKeys,
  metricPartitionKey,
  type RecordKeys,
} from "./keys.js";

// Metric records
export {
  DynamoMetricStore,
  type MetricStore,
  type WriteResult,
  type RecordItem,
} from "./metric-store.js";
export { InMemoryMetricStore } from "./memory-store.js";

// Insights
export {
  DynamoInsightRepository,
  toStoredInsight,
  type InsightRepository,
} from "./insights.js";
