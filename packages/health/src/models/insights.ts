/**
 * AI-generated insight types
 */

/**
 * Which entry point produced the insight
 */
export type InsightKind = "recent" | "daily";

/**
 * Half-open time range an insight covers
 */
export interface InsightTimeRange {
  /** Inclusive start (Unix ms) */
  start: number;
  /** Exclusive end (Unix ms) */
  end: number;
  /** First calendar day covered (YYYY-MM-DD) */
  startDate: string;
  /** Last calendar day covered (YYYY-MM-DD) */
  endDate: string;
}

/**
 * An AI-generated insight about recent health data
 */
export interface Insight {
  /** Cache key the insight was generated under */
  fingerprint: string;
  kind: InsightKind;
  timeRange: InsightTimeRange;
  /** Full model response text */
  content: string;
  /** Bullet points under "Health Recommendations" */
  recommendations: string[];
  /** Bullet points under "Health Concerns" */
  concerns: string[];
  /** When this insight was generated (Unix ms) */
  generatedAt: number;
  /** Model identifier that produced the text */
  modelVersion: string;
  /** Whether older days were dropped from the prompt */
  promptTruncated: boolean;
}

/**
 * Stored insight with persistence metadata
 */
export interface StoredInsight extends Insight {
  userId: string;
  /** When this insight stops being served from storage (Unix ms) */
  expiresAt: number;
}
