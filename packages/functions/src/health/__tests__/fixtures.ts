/**
 * In-process runtime for handler tests: in-memory store, fake model
 */

import { vi } from "vitest";
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import {
  DEFAULT_INSIGHT_CONFIG,
  InMemoryMetricStore,
  InsightCache,
  InsightService,
  type InsightConfig,
  type MetricRecord,
  type MetricStore,
} from "@health/core";
import type { HealthRuntime } from "../runtime.js";

export const NOW = new Date("2024-03-21T12:00:00Z");

export const RESPONSE = [
  "## Key Insights",
  "- Heart rate stayed in a narrow band",
  "## Health Recommendations",
  "- Keep a regular bedtime",
  "## Health Concerns",
  "- None noted",
].join("\n");

export function sampleRecords(): MetricRecord[] {
  return [
    {
      type: "sleep",
      timestamp: Date.UTC(2024, 2, 20, 22),
      startTime: Date.UTC(2024, 2, 20, 22),
      endTime: Date.UTC(2024, 2, 21, 6),
      quality: 80,
      phases: { deep: 120, light: 240, rem: 90, awake: 30 },
      source: "ring",
    },
    { type: "heart_rate", timestamp: Date.UTC(2024, 2, 19, 9), value: 66, source: "watch" },
    { type: "heart_rate", timestamp: Date.UTC(2024, 2, 20, 9), value: 70, source: "watch" },
  ];
}

export function createTestRuntime(
  options: {
    records?: MetricRecord[];
    store?: MetricStore;
    generate?: (prompt: string) => Promise<string>;
  } = {}
) {
  const config: InsightConfig = { ...DEFAULT_INSIGHT_CONFIG, timezone: "UTC" };
  const store = options.store ?? new InMemoryMetricStore(options.records ?? sampleRecords());
  const respond = options.generate ?? (async () => RESPONSE);
  const model = {
    modelVersion: "test-model",
    generate: vi.fn((prompt: string, _timeoutMs: number) => respond(prompt)),
  };
  const cache = new InsightCache({ ttlMs: config.cacheTtlMs, maxEntries: config.cacheMaxEntries });
  const service = new InsightService({ store, model, cache, config, scope: "test-user" });

  const runtime: HealthRuntime = { config, store, cache, service };
  return { runtime, model };
}

export function apiEvent(fields: Partial<APIGatewayProxyEventV2>): APIGatewayProxyEventV2 {
  return fields as APIGatewayProxyEventV2;
}

export function parseBody(result: { body?: string }): unknown {
  return JSON.parse(result.body ?? "null");
}
