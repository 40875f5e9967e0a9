/**
 * @health/core - Analysis
 *
 * Statistics and cross-metric correlation
 */

export { describeValues, meanOf, sumOf, type BasicStats } from "./stats.js";
export {
  MIN_CORRELATION_PAIRS,
  pearson,
  correlateSleepAndHeartRate,
  type CorrelationFinding,
} from "./correlation.js";
