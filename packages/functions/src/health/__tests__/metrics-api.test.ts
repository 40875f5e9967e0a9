import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MetricStore } from "@health/core";
import { NOW, apiEvent, createTestRuntime, parseBody } from "./fixtures.js";
import { getDailySummaries, ingestRecord, listRecords } from "../metrics-api.js";

const heartRateBody = JSON.stringify({
  timestamp: "2024-03-21T08:00:00Z",
  value: 64,
  restingRate: 58,
  source: "watch",
});

describe("health data API", () => {
  beforeEach(() => {
    vi.setSystemTime(NOW);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("POST /health-data/{type}", () => {
    it("stores a valid record", async () => {
      const { runtime } = createTestRuntime({ records: [] });

      const result = await ingestRecord(
        apiEvent({ pathParameters: { type: "heart_rate" }, body: heartRateBody }),
        runtime
      );

      expect(result.statusCode).toBe(201);
      expect(parseBody(result)).toEqual({
        status: "created",
        record: {
          type: "heart_rate",
          timestamp: Date.UTC(2024, 2, 21, 8),
          value: 64,
          restingRate: 58,
          source: "watch",
        },
        warnings: [],
      });
      await expect(runtime.store.query("heart_rate", 0, NOW.getTime())).resolves.toHaveLength(1);
    });

    it("accepts a base64 encoded body", async () => {
      const { runtime } = createTestRuntime({ records: [] });

      const result = await ingestRecord(
        apiEvent({
          pathParameters: { type: "heart_rate" },
          body: Buffer.from(heartRateBody).toString("base64"),
          isBase64Encoded: true,
        }),
        runtime
      );

      expect(result.statusCode).toBe(201);
    });

    it("reports a re-sent record as a duplicate", async () => {
      const { runtime } = createTestRuntime({ records: [] });
      const event = apiEvent({ pathParameters: { type: "heart_rate" }, body: heartRateBody });

      await ingestRecord(event, runtime);
      const result = await ingestRecord(event, runtime);

      expect(result.statusCode).toBe(200);
      expect(parseBody(result)).toEqual({ status: "duplicate", warnings: [] });
    });

    it("rejects out-of-range values with the issues found", async () => {
      const { runtime } = createTestRuntime({ records: [] });

      const result = await ingestRecord(
        apiEvent({
          pathParameters: { type: "heart_rate" },
          body: JSON.stringify({ timestamp: 1000, value: 260, source: "watch" }),
        }),
        runtime
      );

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toEqual({
        error: "Invalid record",
        issues: ["value must be between 30 and 220 bpm"],
      });
    });

    it("returns sleep phase warnings with the stored record", async () => {
      const { runtime } = createTestRuntime({ records: [] });

      const result = await ingestRecord(
        apiEvent({
          pathParameters: { type: "sleep" },
          body: JSON.stringify({
            startTime: "2024-03-20T22:00:00Z",
            endTime: "2024-03-20T23:00:00Z",
            quality: 70,
            phases: { deep: 30, light: 30, rem: 10, awake: 0 },
            source: "ring",
          }),
        }),
        runtime
      );

      expect(result.statusCode).toBe(201);
      expect(parseBody(result)).toMatchObject({
        warnings: ["sleep phases total 70 min but session lasts 60 min"],
      });
    });

    it("rejects malformed JSON", async () => {
      const { runtime } = createTestRuntime({ records: [] });

      const result = await ingestRecord(apiEvent({ pathParameters: { type: "weight" }, body: "{oops" }), runtime);

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toEqual({ error: "Request body must be valid JSON" });
    });

    it("rejects unknown metric types", async () => {
      const { runtime } = createTestRuntime();

      const result = await ingestRecord(apiEvent({ pathParameters: { type: "steps" }, body: "{}" }), runtime);

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toEqual({
        error: 'Unknown metric type "steps"',
        supported: ["heart_rate", "sleep", "weight"],
      });
    });

    it("maps a failed write to 503", async () => {
      const store: MetricStore = {
        query: async () => [],
        append: async () => ({ written: 0, duplicates: 0, errors: ["throttled"] }),
      };
      const { runtime } = createTestRuntime({ store });

      const result = await ingestRecord(
        apiEvent({ pathParameters: { type: "heart_rate" }, body: heartRateBody }),
        runtime
      );

      expect(result.statusCode).toBe(503);
      expect(parseBody(result)).toEqual({
        error: "Failed to store heart_rate record: throttled",
        code: "STORE_UNAVAILABLE",
        retryable: true,
      });
    });
  });

  describe("GET /health-data/{type}", () => {
    it("lists raw records of the last N days", async () => {
      const { runtime } = createTestRuntime();

      const result = await listRecords(
        apiEvent({ pathParameters: { type: "heart_rate" }, queryStringParameters: { days: "2" } }),
        runtime
      );

      // Two days back from 2024-03-21T12:00Z reaches 2024-03-19T12:00Z
      expect(result.statusCode).toBe(200);
      expect(parseBody(result)).toEqual({
        type: "heart_rate",
        days: 2,
        count: 1,
        records: [{ type: "heart_rate", timestamp: Date.UTC(2024, 2, 20, 9), value: 70, source: "watch" }],
      });
    });

    it("rejects an invalid day count", async () => {
      const { runtime } = createTestRuntime();

      const result = await listRecords(
        apiEvent({ pathParameters: { type: "sleep" }, queryStringParameters: { days: "0" } }),
        runtime
      );

      expect(result.statusCode).toBe(400);
    });
  });

  describe("GET /health-data/daily/{date}", () => {
    it("returns one summary per metric type", async () => {
      const { runtime } = createTestRuntime();

      const result = await getDailySummaries(apiEvent({ pathParameters: { date: "2024-03-20" } }), runtime);

      expect(result.statusCode).toBe(200);
      expect(parseBody(result)).toMatchObject({
        date: "2024-03-20",
        summaries: [
          { metricType: "heart_rate", sampleCount: 1, mean: 70 },
          { metricType: "sleep", sampleCount: 1, extra: { totalSleepMinutes: 450 } },
          { metricType: "weight", sampleCount: 0, mean: null },
        ],
      });
    });

    it("rejects a malformed date", async () => {
      const { runtime } = createTestRuntime();

      const result = await getDailySummaries(apiEvent({ pathParameters: { date: "2024-3-20" } }), runtime);

      expect(result.statusCode).toBe(400);
    });
  });
});
