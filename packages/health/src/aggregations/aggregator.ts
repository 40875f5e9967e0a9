/**
 * Aggregator - raw records for a time range into per-day summaries
 */

import type { DailySummary, MetricRecord, MetricType } from "../models/index.js";
import { InvalidRangeError, StoreUnavailableError, errorMessage } from "../errors.js";
import type { MetricStore } from "../storage/metric-store.js";
import { enumerateDates, formatDateInTimezone } from "../storage/keys.js";
import { computeDailySummaries } from "./daily.js";

/**
 * Calendar days (in the timezone) that intersect [start, end)
 */
export function datesInRange(start: number, end: number, timezone: string): string[] {
  if (end <= start) return [];
  return enumerateDates(formatDateInTimezone(start, timezone), formatDateInTimezone(end - 1, timezone));
}

export class Aggregator {
  constructor(
    private readonly store: MetricStore,
    private readonly timezone: string
  ) {}

  /**
   * One summary per calendar day intersecting [start, end), oldest first.
   * Store failures propagate as StoreUnavailableError without retry.
   */
  async aggregate(metricType: MetricType, start: number, end: number): Promise<DailySummary[]> {
    if (!Number.isFinite(start) || !Number.isFinite(end) || start > end) {
      throw new InvalidRangeError(`Invalid range: start (${start}) must not be after end (${end})`);
    }

    const dates = datesInRange(start, end, this.timezone);
    if (dates.length === 0) return [];

    let records: MetricRecord[];
    try {
      records = await this.store.query(metricType, start, end);
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      throw new StoreUnavailableError(`Failed to read ${metricType} records: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return computeDailySummaries(metricType, records, dates, this.timezone);
  }
}
