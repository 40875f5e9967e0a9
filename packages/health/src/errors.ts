/**
 * Typed failures of the insight pipeline.
 *
 * Each error carries a stable `code` the transport layer maps to a response,
 * and a `retryable` flag telling callers whether trying again can help.
 */

export type InsightErrorCode =
  | "INVALID_RANGE"
  | "STORE_UNAVAILABLE"
  | "EMPTY_INPUT"
  | "MODEL_UNAVAILABLE"
  | "TIMEOUT"
  | "CACHE_CORRUPTION"
  | "MODEL_ERROR"
  | "MODEL_TIMEOUT";

export abstract class InsightError extends Error {
  abstract readonly code: InsightErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller asked for a malformed or inverted range */
export class InvalidRangeError extends InsightError {
  readonly code = "INVALID_RANGE";
  readonly retryable = false;
}

/** Reading raw metrics failed */
export class StoreUnavailableError extends InsightError {
  readonly code = "STORE_UNAVAILABLE";
  readonly retryable = true;
}

/** Nothing to summarize */
export class EmptyInputError extends InsightError {
  readonly code = "EMPTY_INPUT";
  readonly retryable = false;
}

/** The model call failed or timed out; surfaced without retry */
export class ModelUnavailableError extends InsightError {
  readonly code = "MODEL_UNAVAILABLE";
  readonly retryable = true;
}

/** Gave up waiting on another caller's in-flight generation */
export class InsightTimeoutError extends InsightError {
  readonly code = "TIMEOUT";
  readonly retryable = true;
}

/** A cache entry was found in an impossible state and has been dropped */
export class CacheCorruptionError extends InsightError {
  readonly code = "CACHE_CORRUPTION";
  readonly retryable = true;
}

/** Model backend rejected the request or returned something unusable */
export class ModelError extends InsightError {
  readonly code = "MODEL_ERROR";
  readonly retryable = true;
}

/** Model backend did not answer within the timeout */
export class ModelTimeoutError extends InsightError {
  readonly code = "MODEL_TIMEOUT";
  readonly retryable = true;

  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`Model did not respond within ${timeoutMs}ms`, options);
  }
}

export function isInsightError(error: unknown): error is InsightError {
  return error instanceof InsightError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
