/**
 * HTTP response helpers for the health APIs
 */

import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { InvalidRangeError, isInsightError, type InsightErrorCode } from "@health/core";

export const DEFAULT_DAYS = 7;
export const MAX_DAYS = 30;

const STATUS_BY_CODE: Record<InsightErrorCode, number> = {
  INVALID_RANGE: 400,
  EMPTY_INPUT: 404,
  STORE_UNAVAILABLE: 503,
  MODEL_UNAVAILABLE: 502,
  MODEL_ERROR: 502,
  MODEL_TIMEOUT: 502,
  TIMEOUT: 504,
  CACHE_CORRUPTION: 500,
};

export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

/**
 * Map a failure to a response. Typed failures keep their message and code;
 * anything else becomes a generic 500.
 */
export function errorResponse(error: unknown, operation: string): APIGatewayProxyStructuredResultV2 {
  if (isInsightError(error)) {
    if (error.code === "EMPTY_INPUT") {
      return jsonResponse(404, { status: "no_data", message: error.message });
    }

    const statusCode = STATUS_BY_CODE[error.code];
    if (statusCode >= 500) {
      console.error(`${operation} error:`, error.message);
    }
    return jsonResponse(statusCode, {
      error: error.message,
      code: error.code,
      retryable: error.retryable,
    });
  }

  console.error(`${operation} error:`, error);
  return jsonResponse(500, { error: "Internal server error" });
}

/**
 * Parse the `days` query parameter: an integer in 1..MAX_DAYS, DEFAULT_DAYS when absent
 */
export function parseDays(raw: string | undefined): number {
  if (raw === undefined || raw === "") return DEFAULT_DAYS;

  const days = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!(days >= 1 && days <= MAX_DAYS)) {
    throw new InvalidRangeError(`days must be an integer between 1 and ${MAX_DAYS}, got "${raw}"`);
  }
  return days;
}
