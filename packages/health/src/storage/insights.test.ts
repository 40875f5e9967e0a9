/**
 * Tests for DynamoInsightRepository
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { DynamoInsightRepository, toStoredInsight } from "./insights.js";
import type { Insight } from "../models/index.js";

const FIXED_NOW = 1710892800000; // 2024-03-20 00:00:00 UTC
const TTL_MS = 24 * 60 * 60 * 1000;

const mockSend = vi.fn();

const docClient = { send: mockSend } as unknown as DynamoDBDocumentClient;

const insight: Insight = {
  fingerprint: "f".repeat(64),
  kind: "daily",
  timeRange: {
    start: FIXED_NOW,
    end: FIXED_NOW + TTL_MS,
    startDate: "2024-03-20",
    endDate: "2024-03-20",
  },
  content: "## Health Concerns\n- None",
  recommendations: [],
  concerns: ["None"],
  generatedAt: FIXED_NOW,
  modelVersion: "test-model",
  promptTruncated: false,
};

describe("DynamoInsightRepository", () => {
  let repository: DynamoInsightRepository;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(FIXED_NOW);
    mockSend.mockReset();
    repository = new DynamoInsightRepository(docClient, "TestTable", "u1", TTL_MS);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("saves under the fingerprint with an expiry and ttl", async () => {
    mockSend.mockResolvedValueOnce({});

    await repository.save(insight);

    const { input } = mockSend.mock.calls[0][0];
    expect(input.TableName).toBe("TestTable");
    expect(input.Item).toEqual({
      pk: "USR#u1#INSIGHT",
      sk: insight.fingerprint,
      ...insight,
      userId: "u1",
      expiresAt: FIXED_NOW + TTL_MS,
      ttl: (FIXED_NOW + TTL_MS) / 1000,
    });
  });

  it("reads back an unexpired insight without persistence fields", async () => {
    mockSend.mockResolvedValueOnce({
      Item: { pk: "USR#u1#INSIGHT", sk: insight.fingerprint, ...insight, userId: "u1", expiresAt: FIXED_NOW + 1 },
    });

    const found = await repository.findByFingerprint(insight.fingerprint);

    expect(found).toEqual(insight);
    expect(mockSend.mock.calls[0][0].input.Key).toEqual({ pk: "USR#u1#INSIGHT", sk: insight.fingerprint });
  });

  it("returns null for missing or expired items", async () => {
    mockSend
      .mockResolvedValueOnce({})
      .mockResolvedValueOnce({ Item: { ...insight, userId: "u1", expiresAt: FIXED_NOW } });

    await expect(repository.findByFingerprint(insight.fingerprint)).resolves.toBeNull();
    await expect(repository.findByFingerprint(insight.fingerprint)).resolves.toBeNull();
  });

  it("ignores malformed items", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    mockSend.mockResolvedValueOnce({ Item: { fingerprint: insight.fingerprint, content: 42 } });

    await expect(repository.findByFingerprint(insight.fingerprint)).resolves.toBeNull();
    expect(warnSpy).toHaveBeenCalledWith("Ignoring malformed stored insight ffffffffffff");
  });
});

describe("toStoredInsight", () => {
  it("rejects items with a wrongly typed time range", () => {
    expect(
      toStoredInsight({ ...insight, userId: "u1", expiresAt: 1, timeRange: { start: "0" } })
    ).toBeNull();
  });
});
