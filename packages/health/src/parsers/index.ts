/**
 * @health/core - Parsers
 *
 * Input validation and model response parsing
 */

export {
  VALIDATION,
  isValidHeartRate,
  isValidRestingRate,
  isValidQuality,
  isValidPercentage,
} from "./validation.js";
export { parseMetricRecord, type ParseResult } from "./metric-record.js";
export { parseInsightSections, type InsightSections } from "./insight-sections.js";
