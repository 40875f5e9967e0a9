/**
 * Daily summary types produced by the aggregator
 */

/**
 * Fields every daily summary carries. Aggregates are null on days without samples.
 */
interface SummaryBase {
  /** Calendar day in the data timezone (YYYY-MM-DD) */
  date: string;
  sampleCount: number;
  min: number | null;
  max: number | null;
  mean: number | null;
}

export interface SleepSummaryExtra {
  /** Minutes asleep (deep + light + rem) across all sessions */
  totalSleepMinutes: number | null;
  avgQuality: number | null;
  deepMinutes: number | null;
  lightMinutes: number | null;
  remMinutes: number | null;
  awakeMinutes: number | null;
}

export interface HeartRateSummaryExtra {
  avgRestingRate: number | null;
  /** Samples that carried a resting rate */
  restingSamples: number;
}

export interface WeightSummaryExtra {
  avgBmi: number | null;
  avgBodyFat: number | null;
  /** Latest weigh-in of the day */
  lastValue: number | null;
}

/**
 * Sleep summary - min/max/mean are minutes asleep per session
 */
export interface SleepDailySummary extends SummaryBase {
  metricType: "sleep";
  extra: SleepSummaryExtra;
}

/**
 * Heart rate summary - min/max/mean are bpm
 */
export interface HeartRateDailySummary extends SummaryBase {
  metricType: "heart_rate";
  extra: HeartRateSummaryExtra;
}

/**
 * Weight summary - min/max/mean are kg
 */
export interface WeightDailySummary extends SummaryBase {
  metricType: "weight";
  extra: WeightSummaryExtra;
}

export type DailySummary = SleepDailySummary | HeartRateDailySummary | WeightDailySummary;
