/**
 * @health/core - Aggregations
 *
 * Per-day summaries of raw metric records
 */

export {
  minutesAsleep,
  dayAnchor,
  summarizeSleepDay,
  summarizeHeartRateDay,
  summarizeWeightDay,
  summarizeDay,
  computeDailySummaries,
} from "./daily.js";
export { Aggregator, datesInRange } from "./aggregator.js";
