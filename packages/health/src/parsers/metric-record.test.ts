import { describe, it, expect } from "vitest";
import { parseMetricRecord } from "./metric-record.js";

describe("parseMetricRecord", () => {
  it("rejects non-object input", () => {
    expect(parseMetricRecord("weight", [1, 2])).toEqual({
      ok: false,
      issues: ["record must be a JSON object"],
    });
    expect(parseMetricRecord("weight", null)).toEqual({
      ok: false,
      issues: ["record must be a JSON object"],
    });
  });

  describe("sleep", () => {
    const night = {
      startTime: "2024-03-20T22:00:00Z",
      endTime: "2024-03-21T06:00:00Z",
      quality: 80,
      phases: { deep: 120, light: 240, rem: 90, awake: 30 },
      source: "ring",
    };

    it("parses ISO timestamps and anchors the record at the start", () => {
      const result = parseMetricRecord("sleep", night);
      expect(result).toEqual({
        ok: true,
        warnings: [],
        record: {
          type: "sleep",
          timestamp: Date.UTC(2024, 2, 20, 22),
          startTime: Date.UTC(2024, 2, 20, 22),
          endTime: Date.UTC(2024, 2, 21, 6),
          quality: 80,
          phases: { deep: 120, light: 240, rem: 90, awake: 30 },
          source: "ring",
        },
      });
    });

    it("rejects a session that ends before it starts", () => {
      const result = parseMetricRecord("sleep", { ...night, endTime: night.startTime });
      expect(result).toEqual({ ok: false, issues: ["endTime must be after startTime"] });
    });

    it("rejects a fractional or out-of-range quality", () => {
      expect(parseMetricRecord("sleep", { ...night, quality: 80.5 })).toEqual({
        ok: false,
        issues: ["quality must be an integer between 0 and 100"],
      });
      expect(parseMetricRecord("sleep", { ...night, quality: 101 })).toEqual({
        ok: false,
        issues: ["quality must be an integer between 0 and 100"],
      });
    });

    it("rejects negative phases", () => {
      const result = parseMetricRecord("sleep", {
        ...night,
        phases: { ...night.phases, rem: -5 },
      });
      expect(result).toEqual({ ok: false, issues: ["phases.rem cannot be negative"] });
    });

    it("requires a phases object", () => {
      const { phases: _phases, ...withoutPhases } = night;
      expect(parseMetricRecord("sleep", withoutPhases)).toEqual({
        ok: false,
        issues: ["phases must be an object"],
      });
    });

    it("warns, without rejecting, when phases outlast the session", () => {
      const result = parseMetricRecord("sleep", {
        ...night,
        phases: { deep: 200, light: 240, rem: 90, awake: 30 },
      });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.warnings).toEqual(["sleep phases total 560 min but session lasts 480 min"]);
      }
    });
  });

  describe("heart_rate", () => {
    it("keeps optional fields only when present", () => {
      expect(parseMetricRecord("heart_rate", { timestamp: 1000, value: 72, source: "watch" })).toEqual({
        ok: true,
        warnings: [],
        record: { type: "heart_rate", timestamp: 1000, value: 72, source: "watch" },
      });

      const withResting = parseMetricRecord("heart_rate", {
        timestamp: 1000,
        value: 72,
        restingRate: 58,
        activityType: "walk",
        source: "watch",
      });
      expect(withResting.ok && withResting.record).toEqual({
        type: "heart_rate",
        timestamp: 1000,
        value: 72,
        restingRate: 58,
        activityType: "walk",
        source: "watch",
      });
    });

    it("rejects values outside physiological limits", () => {
      expect(parseMetricRecord("heart_rate", { timestamp: 1000, value: 250, source: "watch" })).toEqual({
        ok: false,
        issues: ["value must be between 30 and 220 bpm"],
      });
      expect(
        parseMetricRecord("heart_rate", { timestamp: 1000, value: 70, restingRate: 120, source: "watch" })
      ).toEqual({
        ok: false,
        issues: ["restingRate must be between 30 and 100 bpm"],
      });
    });

    it("reports every missing field", () => {
      expect(parseMetricRecord("heart_rate", {})).toEqual({
        ok: false,
        issues: ["timestamp must be a timestamp", "value must be a number", "source is required"],
      });
    });
  });

  describe("weight", () => {
    it("parses body composition", () => {
      const result = parseMetricRecord("weight", {
        timestamp: 5000,
        value: 70.5,
        bmi: 22.1,
        bodyComposition: { bodyFat: 18, muscleMass: 40, waterPercentage: 55 },
        source: "scale",
        importedAt: 6000,
      });
      expect(result).toEqual({
        ok: true,
        warnings: [],
        record: {
          type: "weight",
          timestamp: 5000,
          value: 70.5,
          bmi: 22.1,
          bodyComposition: { bodyFat: 18, muscleMass: 40, waterPercentage: 55 },
          source: "scale",
          importedAt: 6000,
        },
      });
    });

    it("rejects a non-positive weight", () => {
      expect(parseMetricRecord("weight", { timestamp: 5000, value: 0, source: "scale" })).toEqual({
        ok: false,
        issues: ["value must be greater than 0 kg"],
      });
    });

    it("rejects percentages above 100", () => {
      const result = parseMetricRecord("weight", {
        timestamp: 5000,
        value: 70,
        bodyComposition: { bodyFat: 120, muscleMass: 40, waterPercentage: 55 },
        source: "scale",
      });
      expect(result).toEqual({ ok: false, issues: ["bodyComposition.bodyFat must be between 0 and 100"] });
    });
  });
});
