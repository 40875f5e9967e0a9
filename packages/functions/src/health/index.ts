/**
 * Health Lambdas
 */

export { recentHandler, dailyHandler, getRecentInsight, getDailyInsight } from "./insights-api.js";
export {
  ingestHandler,
  recordsHandler,
  dailySummaryHandler,
  ingestRecord,
  listRecords,
  getDailySummaries,
} from "./metrics-api.js";
export { handler as dailyAnalysisHandler, runDailyAnalysis } from "./daily.js";
export { BedrockModelClient, createBedrockClient, extractText } from "./invoke-model.js";
export {
  createHealthRuntime,
  getHealthRuntime,
  loadRuntimeEnv,
  resetHealthRuntime,
  type HealthRuntime,
  type RuntimeEnv,
} from "./runtime.js";
export { errorResponse, jsonResponse, parseDays, DEFAULT_DAYS, MAX_DAYS } from "./responses.js";
