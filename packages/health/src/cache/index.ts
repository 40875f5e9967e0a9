/**
 * @health/core - Insight cache
 */

export { computeFingerprint, shortFingerprint, type FingerprintInput } from "./fingerprint.js";
export {
  InsightCache,
  type CacheLookup,
  type InsightCacheOptions,
  type InsightCacheStats,
  type ReservationToken,
} from "./insight-cache.js";
