/**
 * Cross-metric correlations over daily summaries
 */

import type { DailySummary } from "../models/index.js";
import { addDays } from "../storage/keys.js";

/** Fewer paired days than this says nothing useful */
export const MIN_CORRELATION_PAIRS = 3;

export interface CorrelationFinding {
  label: string;
  /** Pearson coefficient in [-1, 1] */
  coefficient: number;
  pairs: number;
}

/**
 * Pearson correlation of two equally long series, or null when undefined
 * (fewer than MIN_CORRELATION_PAIRS points or a constant series)
 */
export function pearson(xs: number[], ys: number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < MIN_CORRELATION_PAIRS) return null;

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += xs[i];
    sumY += ys[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) return null;
  return covariance / Math.sqrt(varianceX * varianceY);
}

type DayValue = (summary: DailySummary) => number | null;

interface Pairing {
  label: string;
  sleep: DayValue;
  heartRate: DayValue;
}

// A night's sleep is attributed to the day it started, so it lines up
// with the heart rate of the following day
const PAIRINGS: Pairing[] = [
  {
    label: "Sleep duration vs next-day resting heart rate",
    sleep: (s) => (s.metricType === "sleep" ? s.extra.totalSleepMinutes : null),
    heartRate: (s) => (s.metricType === "heart_rate" ? s.extra.avgRestingRate : null),
  },
  {
    label: "Sleep quality vs next-day average heart rate",
    sleep: (s) => (s.metricType === "sleep" ? s.extra.avgQuality : null),
    heartRate: (s) => (s.metricType === "heart_rate" ? s.mean : null),
  },
];

/**
 * Correlate sleep with the next day's heart rate across the summaries.
 * Findings are returned in a fixed order; undefined correlations are omitted.
 */
export function correlateSleepAndHeartRate(summaries: DailySummary[]): CorrelationFinding[] {
  const sleepByDate = new Map<string, DailySummary>();
  const heartRateByDate = new Map<string, DailySummary>();
  for (const summary of summaries) {
    if (summary.metricType === "sleep") sleepByDate.set(summary.date, summary);
    if (summary.metricType === "heart_rate") heartRateByDate.set(summary.date, summary);
  }

  const dates = [...sleepByDate.keys()].sort();
  const findings: CorrelationFinding[] = [];

  for (const pairing of PAIRINGS) {
    const xs: number[] = [];
    const ys: number[] = [];

    for (const date of dates) {
      const sleep = sleepByDate.get(date);
      const heartRate = heartRateByDate.get(addDays(date, 1));
      if (!sleep || !heartRate) continue;

      const x = pairing.sleep(sleep);
      const y = pairing.heartRate(heartRate);
      if (x === null || y === null) continue;

      xs.push(x);
      ys.push(y);
    }

    const coefficient = pearson(xs, ys);
    if (coefficient !== null) {
      findings.push({ label: pairing.label, coefficient, pairs: xs.length });
    }
  }

  return findings;
}
