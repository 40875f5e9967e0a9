/**
 * Metric record types - sleep sessions, heart rate samples, weigh-ins
 */

import type { BaseRecord } from "./base.js";

/**
 * Minutes spent in each sleep phase
 */
export interface SleepPhases {
  deep: number;
  light: number;
  rem: number;
  awake: number;
}

/**
 * One sleep session. `timestamp` equals `startTime`, so a session that
 * crosses midnight belongs to the day it started.
 */
export interface SleepRecord extends BaseRecord {
  type: "sleep";
  startTime: number;
  endTime: number;
  /** Sleep quality score (0-100) */
  quality: number;
  phases: SleepPhases;
}

/**
 * Heart rate sample in beats per minute
 */
export interface HeartRateRecord extends BaseRecord {
  type: "heart_rate";
  value: number;
  restingRate?: number;
  /** Activity during measurement (e.g., "running", "rest") */
  activityType?: string;
}

/**
 * Body composition percentages from a smart scale
 */
export interface BodyComposition {
  bodyFat: number;
  muscleMass: number;
  waterPercentage: number;
  /** Bone mass in kg */
  boneMass?: number;
}

/**
 * Weigh-in in kilograms
 */
export interface WeightRecord extends BaseRecord {
  type: "weight";
  value: number;
  bmi?: number;
  bodyComposition?: BodyComposition;
}

/**
 * All possible metric records
 */
export type MetricRecord = SleepRecord | HeartRateRecord | WeightRecord;

/**
 * Record type discriminator
 */
export type MetricType = MetricRecord["type"];

/**
 * All metric types in lexical order (the order summaries are rendered in)
 */
export const METRIC_TYPES = ["heart_rate", "sleep", "weight"] as const satisfies readonly MetricType[];

/**
 * Check whether a string names a metric type
 */
export function isMetricType(value: string): value is MetricType {
  return (METRIC_TYPES as readonly string[]).includes(value);
}
