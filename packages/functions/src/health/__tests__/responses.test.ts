import { describe, it, expect, vi, afterEach } from "vitest";
import {
  CacheCorruptionError,
  EmptyInputError,
  InsightTimeoutError,
  InvalidRangeError,
  ModelUnavailableError,
  StoreUnavailableError,
} from "@health/core";
import { errorResponse, parseDays } from "../responses.js";

describe("parseDays", () => {
  it("defaults to 7", () => {
    expect(parseDays(undefined)).toBe(7);
    expect(parseDays("")).toBe(7);
  });

  it("accepts whole numbers from 1 to 30", () => {
    expect(parseDays("1")).toBe(1);
    expect(parseDays("30")).toBe(30);
  });

  it("rejects anything else", () => {
    for (const raw of ["0", "31", "-1", "2.5", "7d"]) {
      expect(() => parseDays(raw)).toThrow(InvalidRangeError);
    }
  });
});

describe("errorResponse", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps typed failures to status codes", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});

    expect(errorResponse(new InvalidRangeError("bad"), "Test").statusCode).toBe(400);
    expect(errorResponse(new EmptyInputError("none"), "Test").statusCode).toBe(404);
    expect(errorResponse(new StoreUnavailableError("down"), "Test").statusCode).toBe(503);
    expect(errorResponse(new ModelUnavailableError("down"), "Test").statusCode).toBe(502);
    expect(errorResponse(new InsightTimeoutError("slow"), "Test").statusCode).toBe(504);
    expect(errorResponse(new CacheCorruptionError("odd"), "Test").statusCode).toBe(500);
  });

  it("hides unknown errors behind a generic 500", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const failure = new TypeError("undefined is not a function");

    const result = errorResponse(failure, "Test");

    expect(result.statusCode).toBe(500);
    expect(result.body).toBe(JSON.stringify({ error: "Internal server error" }));
    expect(errorSpy).toHaveBeenCalledWith("Test error:", failure);
  });
});
