/**
 * Daily Analysis Lambda
 *
 * Triggered at the start of the day to generate yesterday's insight, so the
 * first request for it is served from storage.
 */

import type { ScheduledHandler } from "aws-lambda";
import {
  EmptyInputError,
  addDays,
  formatDateInTimezone,
  shortFingerprint,
  type Insight,
} from "@health/core";
import { getHealthRuntime, type HealthRuntime } from "./runtime.js";

/**
 * Generate the insight for the calendar day before `now`.
 * Returns null when that day has no data.
 */
export async function runDailyAnalysis(
  runtime: HealthRuntime,
  now: number = Date.now()
): Promise<Insight | null> {
  // Calendar day in the data timezone (Lambda runs in UTC)
  const date = addDays(formatDateInTimezone(now, runtime.config.timezone), -1);

  try {
    const insight = await runtime.service.dailyInsight(date);
    console.log(`Daily insight ready for ${date}: ${shortFingerprint(insight.fingerprint)}`);
    return insight;
  } catch (error) {
    if (error instanceof EmptyInputError) {
      console.log(`No health data for ${date}, skipping`);
      return null;
    }
    console.error("Daily analysis error:", error);
    throw error;
  }
}

export const handler: ScheduledHandler = async () => {
  console.log("Daily analysis triggered");
  await runDailyAnalysis(getHealthRuntime());
};
