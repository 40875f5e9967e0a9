/**
 * DynamoDB storage operations for AI-generated insights
 */

import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
} from "@aws-sdk/lib-dynamodb";
import type { Insight, InsightKind, StoredInsight } from "../models/index.js";
import { generateInsightKeys } from "./keys.js";

/**
 * Durable record of generated insights, keyed by fingerprint
 */
export interface InsightRepository {
  /** The unexpired insight stored under a fingerprint, if any */
  findByFingerprint(fingerprint: string): Promise<Insight | null>;
  save(insight: Insight): Promise<void>;
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isInsightKind(value: unknown): value is InsightKind {
  return value === "recent" || value === "daily";
}

/**
 * Rebuild a stored insight from a DynamoDB item, or null if the item is malformed
 */
export function toStoredInsight(item: Fields): StoredInsight | null {
  const { timeRange } = item;
  if (
    typeof item.fingerprint !== "string" ||
    !isInsightKind(item.kind) ||
    typeof item.content !== "string" ||
    !isStringArray(item.recommendations) ||
    !isStringArray(item.concerns) ||
    typeof item.generatedAt !== "number" ||
    typeof item.modelVersion !== "string" ||
    typeof item.userId !== "string" ||
    typeof item.expiresAt !== "number" ||
    !isRecord(timeRange) ||
    typeof timeRange.start !== "number" ||
    typeof timeRange.end !== "number" ||
    typeof timeRange.startDate !== "string" ||
    typeof timeRange.endDate !== "string"
  ) {
    return null;
  }

  return {
    fingerprint: item.fingerprint,
    kind: item.kind,
    timeRange: {
      start: timeRange.start,
      end: timeRange.end,
      startDate: timeRange.startDate,
      endDate: timeRange.endDate,
    },
    content: item.content,
    recommendations: item.recommendations,
    concerns: item.concerns,
    generatedAt: item.generatedAt,
    modelVersion: item.modelVersion,
    promptTruncated: item.promptTruncated === true,
    userId: item.userId,
    expiresAt: item.expiresAt,
  };
}

/**
 * Strip persistence metadata
 */
function toInsight(stored: StoredInsight): Insight {
  const { userId: _userId, expiresAt: _expiresAt, ...insight } = stored;
  return insight;
}

/**
 * Insight storage in the shared table. Items carry a `ttl` attribute so
 * DynamoDB removes them after expiry; reads also check `expiresAt` since
 * TTL deletion lags.
 */
export class DynamoInsightRepository implements InsightRepository {
  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly userId: string,
    private readonly ttlMs: number
  ) {}

  async findByFingerprint(fingerprint: string): Promise<Insight | null> {
    const keys = generateInsightKeys(this.userId, fingerprint);

    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: keys.pk, sk: keys.sk },
      })
    );

    if (!result.Item) return null;

    const stored = toStoredInsight(result.Item);
    if (!stored) {
      console.warn(`Ignoring malformed stored insight ${fingerprint.slice(0, 12)}`);
      return null;
    }
    if (stored.expiresAt <= Date.now()) return null;

    return toInsight(stored);
  }

  async save(insight: Insight): Promise<void> {
    const keys = generateInsightKeys(this.userId, insight.fingerprint);
    const expiresAt = insight.generatedAt + this.ttlMs;

    const item: StoredInsight = {
      ...insight,
      userId: this.userId,
      expiresAt,
    };

    await this.docClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: {
          ...keys,
          ...item,
          ttl: Math.floor(expiresAt / 1000),
        },
      })
    );
  }
}
