/**
 * Insight fingerprints - the cache and persistence key for a generated insight
 */

import { createHash } from "crypto";
import type { InsightKind, MetricType } from "../models/index.js";

export interface FingerprintInput {
  /** Recent and daily insights over the same data are distinct entries */
  kind: InsightKind;
  metricTypes: readonly MetricType[];
  /** Inclusive range start (Unix ms) */
  start: number;
  /** Exclusive range end (Unix ms) */
  end: number;
  aggregationVersion: string;
  promptTemplateVersion: string;
  /** Whose data the insight describes */
  scope: string;
  /** Rendered prompt; any change in the underlying data changes it */
  promptText: string;
}

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Hex sha256 over the canonical form of the input.
 * Metric type order does not matter.
 */
export function computeFingerprint(input: FingerprintInput): string {
  const canonical = JSON.stringify([
    input.kind,
    [...new Set(input.metricTypes)].sort(),
    input.start,
    input.end,
    input.aggregationVersion,
    input.promptTemplateVersion,
    input.scope,
    sha256(input.promptText),
  ]);
  return sha256(canonical);
}

/**
 * Short form for log lines
 */
export function shortFingerprint(fingerprint: string): string {
  return fingerprint.slice(0, 12);
}
