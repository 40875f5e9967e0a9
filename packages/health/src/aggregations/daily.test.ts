import { describe, it, expect } from "vitest";
import { computeDailySummaries, minutesAsleep, summarizeWeightDay } from "./daily.js";
import type { HeartRateRecord, SleepRecord, WeightRecord } from "../models/index.js";

const hour = 60 * 60 * 1000;
const march20 = Date.UTC(2024, 2, 20);

function heartRate(timestamp: number, value: number, restingRate?: number): HeartRateRecord {
  return {
    type: "heart_rate",
    timestamp,
    value,
    ...(restingRate !== undefined && { restingRate }),
    source: "watch",
  };
}

function weighIn(timestamp: number, value: number, bmi?: number): WeightRecord {
  return { type: "weight", timestamp, value, ...(bmi !== undefined && { bmi }), source: "scale" };
}

describe("minutesAsleep", () => {
  it("excludes awake time", () => {
    const night: SleepRecord = {
      type: "sleep",
      timestamp: march20,
      startTime: march20,
      endTime: march20 + 8 * hour,
      quality: 80,
      phases: { deep: 120, light: 240, rem: 90, awake: 30 },
      source: "ring",
    };
    expect(minutesAsleep(night)).toBe(450);
  });
});

describe("computeDailySummaries", () => {
  it("buckets heart rate by calendar day and keeps empty days", () => {
    const records = [
      heartRate(march20 + 8 * hour, 60, 55),
      heartRate(march20 + 12 * hour, 80),
      heartRate(march20 + 20 * hour, 70, 57),
    ];

    const summaries = computeDailySummaries("heart_rate", records, ["2024-03-20", "2024-03-21"], "UTC");

    expect(summaries).toEqual([
      {
        date: "2024-03-20",
        metricType: "heart_rate",
        sampleCount: 3,
        min: 60,
        max: 80,
        mean: 70,
        extra: { avgRestingRate: 56, restingSamples: 2 },
      },
      {
        date: "2024-03-21",
        metricType: "heart_rate",
        sampleCount: 0,
        min: null,
        max: null,
        mean: null,
        extra: { avgRestingRate: null, restingSamples: 0 },
      },
    ]);
  });

  it("uses the timezone's calendar day", () => {
    // 03:00 UTC on the 21st is still the 20th in Los Angeles
    const records = [heartRate(Date.UTC(2024, 2, 21, 3), 65)];

    const [day] = computeDailySummaries("heart_rate", records, ["2024-03-20"], "America/Los_Angeles");
    expect(day.sampleCount).toBe(1);
  });

  it("ignores records outside the requested days and of other types", () => {
    const records = [heartRate(march20 - hour, 90), weighIn(march20 + hour, 70)];

    const [day] = computeDailySummaries("heart_rate", records, ["2024-03-20"], "UTC");
    expect(day.sampleCount).toBe(0);
  });
});

describe("summarizeWeightDay", () => {
  it("tracks the latest weigh-in and averages BMI", () => {
    const summary = summarizeWeightDay("2024-03-20", [
      weighIn(march20 + 20 * hour, 71, 23),
      weighIn(march20 + 7 * hour, 70, 22),
    ]);

    expect(summary).toEqual({
      date: "2024-03-20",
      metricType: "weight",
      sampleCount: 2,
      min: 70,
      max: 71,
      mean: 70.5,
      extra: { avgBmi: 22.5, avgBodyFat: null, lastValue: 71 },
    });
  });
});
