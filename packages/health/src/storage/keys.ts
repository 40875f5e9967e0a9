/**
 * Calendar-day helpers and DynamoDB key generation
 *
 * Key Design:
 * - Metric records
 *   PK: USR#{userId}#{TYPE}
 *   SK: {timestamp padded to 15 digits}#{hash} - time ordered, hash for deduplication
 * - Insights
 *   PK: USR#{userId}#INSIGHT
 *   SK: {fingerprint}
 */

import { createHash } from "crypto";
import type { MetricRecord, MetricType } from "../models/index.js";

const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function dateFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-CA", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Format a timestamp as YYYY-MM-DD in the given timezone
 */
export function formatDateInTimezone(timestampMs: number, timezone: string): string {
  return dateFormatter(timezone).format(new Date(timestampMs));
}

/**
 * Whether a string is a real calendar date in YYYY-MM-DD form
 */
export function isValidDateString(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  const utc = new Date(Date.UTC(year, month - 1, day));
  return (
    utc.getUTCFullYear() === year && utc.getUTCMonth() === month - 1 && utc.getUTCDate() === day
  );
}

/**
 * Shift a YYYY-MM-DD date by whole calendar days
 */
export function addDays(dateStr: string, days: number): string {
  const [year, month, day] = dateStr.split("-").map(Number);
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}

/**
 * Get the start of day timestamp (midnight) for a date string in the given timezone.
 * new Date("YYYY-MM-DD") would give UTC midnight, not local midnight.
 */
export function getStartOfDayInTimezone(dateStr: string, timezone: string): number {
  const [year, month, day] = dateStr.split("-").map(Number);
  const utcMidnight = Date.UTC(year, month - 1, day);

  // UTC offsets span -12h..+14h, so local midnight lies strictly inside this window
  let lo = utcMidnight - 15 * HOUR_MS;
  let hi = utcMidnight + 13 * HOUR_MS;

  // Binary search for the first millisecond whose local date is not before dateStr
  while (hi - lo > 1) {
    const mid = Math.floor((lo + hi) / 2);
    if (formatDateInTimezone(mid, timezone) >= dateStr) {
      hi = mid;
    } else {
      lo = mid;
    }
  }

  return hi;
}

/**
 * Every calendar day from startDate to endDate inclusive
 */
export function enumerateDates(startDate: string, endDate: string): string[] {
  const dates: string[] = [];
  for (let date = startDate; date <= endDate; date = addDays(date, 1)) {
    dates.push(date);
  }
  return dates;
}

/**
 * Zero-padded timestamp so string order matches numeric order
 */
export function padTimestamp(timestampMs: number): string {
  return timestampMs.toString().padStart(15, "0");
}

/**
 * Generate a unique hash for deduplication
 * Uses key fields that make a record unique
 */
export function generateRecordHash(record: MetricRecord): string {
  let hashInput: string;

  switch (record.type) {
    case "sleep":
      hashInput = `${record.startTime}:${record.endTime}:${record.source}`;
      break;
    case "heart_rate":
      hashInput = `${record.timestamp}:${record.value}:${record.source}`;
      break;
    case "weight":
      hashInput = `${record.timestamp}:${record.value}:${record.source}`;
      break;
  }

  return createHash("sha256").update(hashInput).digest("hex").substring(0, 12);
}

/**
 * DynamoDB key structure
 */
export interface RecordKeys {
  pk: string;
  sk: string;
}

/**
 * Partition key holding every record of one type for a user
 */
export function metricPartitionKey(userId: string, type: MetricType): string {
  return `USR#${userId}#${type.toUpperCase()}`;
}

/**
 * Generate DynamoDB keys for a metric record
 */
export function generateRecordKeys(userId: string, record: MetricRecord): RecordKeys {
  return {
    pk: metricPartitionKey(userId, record.type),
    sk: `${padTimestamp(record.timestamp)}#${generateRecordHash(record)}`,
  };
}

/**
 * Generate keys for an insight stored under its fingerprint
 */
export function generateInsightKeys(userId: string, fingerprint: string): RecordKeys {
  return {
    pk: `USR#${userId}#INSIGHT`,
    sk: fingerprint,
  };
}
