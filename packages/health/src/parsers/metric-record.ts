/**
 * Parse untrusted input (request bodies, stored items) into metric records
 */

import type {
  BodyComposition,
  HeartRateRecord,
  MetricRecord,
  MetricType,
  SleepRecord,
  WeightRecord,
} from "../models/index.js";
import {
  isValidHeartRate,
  isValidPercentage,
  isValidQuality,
  isValidRestingRate,
} from "./validation.js";

export type ParseResult =
  | { ok: true; record: MetricRecord; warnings: string[] }
  | { ok: false; issues: string[] };

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts Unix ms or an ISO-8601 string
 */
function readTime(fields: Fields, key: string, issues: string[]): number | undefined {
  const value = fields[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) return parsed;
  }
  issues.push(`${key} must be a timestamp`);
  return undefined;
}

function readNumber(fields: Fields, key: string, issues: string[]): number | undefined {
  const value = fields[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  issues.push(`${key} must be a number`);
  return undefined;
}

function readOptionalNumber(fields: Fields, key: string, issues: string[]): number | undefined {
  if (fields[key] === undefined || fields[key] === null) return undefined;
  return readNumber(fields, key, issues);
}

function readOptionalString(fields: Fields, key: string, issues: string[]): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  issues.push(`${key} must be a string`);
  return undefined;
}

function readSource(fields: Fields, issues: string[]): string {
  const value = fields.source;
  if (typeof value === "string" && value.trim() !== "") return value;
  issues.push("source is required");
  return "";
}

function parseSleep(fields: Fields, issues: string[], warnings: string[]): SleepRecord | null {
  const startTime = readTime(fields, "startTime", issues);
  const endTime = readTime(fields, "endTime", issues);
  const quality = readNumber(fields, "quality", issues);
  const source = readSource(fields, issues);

  const phasesInput = fields.phases;
  if (!isRecord(phasesInput)) {
    issues.push("phases must be an object");
    return null;
  }
  const deep = readNumber(phasesInput, "deep", issues);
  const light = readNumber(phasesInput, "light", issues);
  const rem = readNumber(phasesInput, "rem", issues);
  const awake = readNumber(phasesInput, "awake", issues);

  if (
    startTime === undefined ||
    endTime === undefined ||
    quality === undefined ||
    deep === undefined ||
    light === undefined ||
    rem === undefined ||
    awake === undefined
  ) {
    return null;
  }

  if (endTime <= startTime) issues.push("endTime must be after startTime");
  if (!isValidQuality(quality)) issues.push("quality must be an integer between 0 and 100");
  for (const [phase, minutes] of Object.entries({ deep, light, rem, awake })) {
    if (minutes < 0) issues.push(`phases.${phase} cannot be negative`);
  }
  if (issues.length > 0) return null;

  // Vendors round phase minutes independently, so an overflow is only flagged
  const sessionMinutes = (endTime - startTime) / 60_000;
  if (deep + light + rem + awake > sessionMinutes) {
    warnings.push(
      `sleep phases total ${deep + light + rem + awake} min but session lasts ${Math.round(sessionMinutes)} min`
    );
  }

  return {
    type: "sleep",
    timestamp: startTime,
    startTime,
    endTime,
    quality,
    phases: { deep, light, rem, awake },
    source,
  };
}

function parseHeartRate(fields: Fields, issues: string[]): HeartRateRecord | null {
  const timestamp = readTime(fields, "timestamp", issues);
  const value = readNumber(fields, "value", issues);
  const restingRate = readOptionalNumber(fields, "restingRate", issues);
  const activityType = readOptionalString(fields, "activityType", issues);
  const source = readSource(fields, issues);

  if (timestamp === undefined || value === undefined) return null;

  if (!isValidHeartRate(value)) issues.push("value must be between 30 and 220 bpm");
  if (restingRate !== undefined && !isValidRestingRate(restingRate)) {
    issues.push("restingRate must be between 30 and 100 bpm");
  }
  if (issues.length > 0) return null;

  return {
    type: "heart_rate",
    timestamp,
    value,
    ...(restingRate !== undefined && { restingRate }),
    ...(activityType !== undefined && { activityType }),
    source,
  };
}

function parseBodyComposition(value: unknown, issues: string[]): BodyComposition | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    issues.push("bodyComposition must be an object");
    return undefined;
  }

  const bodyFat = readNumber(value, "bodyFat", issues);
  const muscleMass = readNumber(value, "muscleMass", issues);
  const waterPercentage = readNumber(value, "waterPercentage", issues);
  const boneMass = readOptionalNumber(value, "boneMass", issues);
  if (bodyFat === undefined || muscleMass === undefined || waterPercentage === undefined) {
    return undefined;
  }

  for (const [key, percent] of Object.entries({ bodyFat, muscleMass, waterPercentage })) {
    if (!isValidPercentage(percent)) issues.push(`bodyComposition.${key} must be between 0 and 100`);
  }
  if (boneMass !== undefined && boneMass < 0) issues.push("bodyComposition.boneMass cannot be negative");

  return { bodyFat, muscleMass, waterPercentage, ...(boneMass !== undefined && { boneMass }) };
}

function parseWeight(fields: Fields, issues: string[]): WeightRecord | null {
  const timestamp = readTime(fields, "timestamp", issues);
  const value = readNumber(fields, "value", issues);
  const bmi = readOptionalNumber(fields, "bmi", issues);
  const bodyComposition = parseBodyComposition(fields.bodyComposition, issues);
  const source = readSource(fields, issues);

  if (timestamp === undefined || value === undefined) return null;

  if (value <= 0) issues.push("value must be greater than 0 kg");
  if (bmi !== undefined && bmi <= 0) issues.push("bmi must be greater than 0");
  if (issues.length > 0) return null;

  return {
    type: "weight",
    timestamp,
    value,
    ...(bmi !== undefined && { bmi }),
    ...(bodyComposition !== undefined && { bodyComposition }),
    source,
  };
}

/**
 * Validate and normalize one metric record of the given type
 */
export function parseMetricRecord(type: MetricType, input: unknown): ParseResult {
  if (!isRecord(input)) {
    return { ok: false, issues: ["record must be a JSON object"] };
  }

  const issues: string[] = [];
  const warnings: string[] = [];
  let record: MetricRecord | null;

  switch (type) {
    case "sleep":
      record = parseSleep(input, issues, warnings);
      break;
    case "heart_rate":
      record = parseHeartRate(input, issues);
      break;
    case "weight":
      record = parseWeight(input, issues);
      break;
  }

  if (!record || issues.length > 0) {
    return { ok: false, issues };
  }

  if (typeof input.importedAt === "number") {
    record.importedAt = input.importedAt;
  }

  return { ok: true, record, warnings };
}
