/**
 * Daily summary computation
 */

import type {
  DailySummary,
  HeartRateDailySummary,
  HeartRateRecord,
  MetricRecord,
  MetricType,
  SleepDailySummary,
  SleepRecord,
  WeightDailySummary,
  WeightRecord,
} from "../models/index.js";
import { describeValues, meanOf, sumOf } from "../analysis/index.js";
import { formatDateInTimezone } from "../storage/keys.js";

const isSleep = (record: MetricRecord): record is SleepRecord => record.type === "sleep";
const isHeartRate = (record: MetricRecord): record is HeartRateRecord => record.type === "heart_rate";
const isWeight = (record: MetricRecord): record is WeightRecord => record.type === "weight";

/**
 * Minutes actually asleep in a session (awake time excluded)
 */
export function minutesAsleep(record: SleepRecord): number {
  return record.phases.deep + record.phases.light + record.phases.rem;
}

/**
 * Timestamp that decides which calendar day a record belongs to
 */
export function dayAnchor(record: MetricRecord): number {
  return record.type === "sleep" ? record.startTime : record.timestamp;
}

/**
 * Summarize the sleep sessions that started on one day
 */
export function summarizeSleepDay(date: string, sessions: SleepRecord[]): SleepDailySummary {
  const asleep = describeValues(sessions.map(minutesAsleep));

  return {
    date,
    metricType: "sleep",
    sampleCount: asleep.count,
    min: asleep.min,
    max: asleep.max,
    mean: asleep.mean,
    extra: {
      totalSleepMinutes: asleep.count > 0 ? asleep.sum : null,
      avgQuality: meanOf(sessions.map((s) => s.quality)),
      deepMinutes: sumOf(sessions.map((s) => s.phases.deep)),
      lightMinutes: sumOf(sessions.map((s) => s.phases.light)),
      remMinutes: sumOf(sessions.map((s) => s.phases.rem)),
      awakeMinutes: sumOf(sessions.map((s) => s.phases.awake)),
    },
  };
}

/**
 * Summarize one day of heart rate samples
 */
export function summarizeHeartRateDay(date: string, samples: HeartRateRecord[]): HeartRateDailySummary {
  const bpm = describeValues(samples.map((s) => s.value));
  const resting = samples.flatMap((s) => (s.restingRate === undefined ? [] : [s.restingRate]));

  return {
    date,
    metricType: "heart_rate",
    sampleCount: bpm.count,
    min: bpm.min,
    max: bpm.max,
    mean: bpm.mean,
    extra: {
      avgRestingRate: meanOf(resting),
      restingSamples: resting.length,
    },
  };
}

/**
 * Summarize one day of weigh-ins
 */
export function summarizeWeightDay(date: string, weighIns: WeightRecord[]): WeightDailySummary {
  const kg = describeValues(weighIns.map((w) => w.value));
  const bmi = weighIns.flatMap((w) => (w.bmi === undefined ? [] : [w.bmi]));
  const bodyFat = weighIns.flatMap((w) => (w.bodyComposition ? [w.bodyComposition.bodyFat] : []));
  const latest = weighIns.reduce<WeightRecord | null>(
    (last, w) => (last === null || w.timestamp >= last.timestamp ? w : last),
    null
  );

  return {
    date,
    metricType: "weight",
    sampleCount: kg.count,
    min: kg.min,
    max: kg.max,
    mean: kg.mean,
    extra: {
      avgBmi: meanOf(bmi),
      avgBodyFat: meanOf(bodyFat),
      lastValue: latest ? latest.value : null,
    },
  };
}

/**
 * One summary for one day, from the records already bucketed to it
 */
export function summarizeDay(metricType: MetricType, date: string, records: MetricRecord[]): DailySummary {
  switch (metricType) {
    case "sleep":
      return summarizeSleepDay(date, records.filter(isSleep));
    case "heart_rate":
      return summarizeHeartRateDay(date, records.filter(isHeartRate));
    case "weight":
      return summarizeWeightDay(date, records.filter(isWeight));
  }
}

/**
 * Bucket records by calendar day and summarize every requested day.
 * Days without records are kept with sampleCount 0; records outside
 * the requested days are ignored.
 */
export function computeDailySummaries(
  metricType: MetricType,
  records: MetricRecord[],
  dates: string[],
  timezone: string
): DailySummary[] {
  const buckets = new Map<string, MetricRecord[]>(dates.map((date) => [date, []]));

  for (const record of records) {
    if (record.type !== metricType) continue;
    const bucket = buckets.get(formatDateInTimezone(dayAnchor(record), timezone));
    bucket?.push(record);
  }

  return dates.map((date) => summarizeDay(metricType, date, buckets.get(date) ?? []));
}
