/**
 * Metric record storage - append-only, queried by type and time range
 */

import {
  DynamoDBDocumentClient,
  PutCommand,
  QueryCommand,
} from "@aws-sdk/lib-dynamodb";
import type { MetricRecord, MetricType } from "../models/index.js";
import { StoreUnavailableError, errorMessage } from "../errors.js";
import { parseMetricRecord } from "../parsers/index.js";
import { generateRecordKeys, metricPartitionKey, padTimestamp } from "./keys.js";

/**
 * Maximum concurrent writes per batch
 */
const MAX_BATCH_SIZE = 25;

/**
 * Result of a batch write operation
 */
export interface WriteResult {
  written: number;
  duplicates: number;
  errors: string[];
}

/**
 * Durable, append-only storage of typed metric records
 */
export interface MetricStore {
  /**
   * Records of one type with `start <= timestamp < end`, ascending by timestamp.
   * Rejects with StoreUnavailableError on I/O failure.
   */
  query(type: MetricType, start: number, end: number): Promise<MetricRecord[]>;
  /** Idempotent append; re-sent records count as duplicates */
  append(records: MetricRecord[]): Promise<WriteResult>;
}

/**
 * DynamoDB item for a metric record
 */
export interface RecordItem {
  pk: string;
  sk: string;
  timestamp: number;
  data: MetricRecord;
}

function isConditionalCheckFailure(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "name" in error &&
    error.name === "ConditionalCheckFailedException"
  );
}

/**
 * MetricStore over a single DynamoDB table, scoped to one user
 */
export class DynamoMetricStore implements MetricStore {
  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly userId: string
  ) {}

  async query(type: MetricType, start: number, end: number): Promise<MetricRecord[]> {
    if (end <= start) return [];

    const records: MetricRecord[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    try {
      do {
        const result = await this.docClient.send(
          new QueryCommand({
            TableName: this.tableName,
            KeyConditionExpression: "pk = :pk AND sk BETWEEN :start AND :end",
            ExpressionAttributeValues: {
              ":pk": metricPartitionKey(this.userId, type),
              ":start": padTimestamp(start),
              // "~" sorts after the "#hash" suffix, making the end inclusive of end - 1
              ":end": `${padTimestamp(end - 1)}~`,
            },
            ExclusiveStartKey: exclusiveStartKey,
            ScanIndexForward: true,
          })
        );

        for (const item of result.Items ?? []) {
          const parsed = parseMetricRecord(type, item.data);
          if (parsed.ok) {
            records.push(parsed.record);
          } else {
            console.warn(`Skipping unreadable ${type} item ${String(item.sk)}: ${parsed.issues.join("; ")}`);
          }
        }

        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw new StoreUnavailableError(`Failed to query ${type} records: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return records;
  }

  async append(records: MetricRecord[]): Promise<WriteResult> {
    const now = Date.now();
    const items: RecordItem[] = records.map((record) => ({
      ...generateRecordKeys(this.userId, record),
      timestamp: record.timestamp,
      data: { ...record, importedAt: record.importedAt ?? now },
    }));

    let written = 0;
    let duplicates = 0;
    const errors: string[] = [];

    // Process in batches
    for (let i = 0; i < items.length; i += MAX_BATCH_SIZE) {
      const batch = items.slice(i, i + MAX_BATCH_SIZE);

      const results = await Promise.all(
        batch.map(async (item) => {
          try {
            await this.docClient.send(
              new PutCommand({
                TableName: this.tableName,
                Item: item,
                ConditionExpression: "attribute_not_exists(pk)",
              })
            );
            return { status: "written" as const };
          } catch (error: unknown) {
            if (isConditionalCheckFailure(error)) {
              return { status: "duplicate" as const };
            }
            return { status: "error" as const, error: errorMessage(error) };
          }
        })
      );

      for (const result of results) {
        if (result.status === "written") written++;
        else if (result.status === "duplicate") duplicates++;
        else errors.push(result.error);
      }
    }

    return { written, duplicates, errors };
  }
}
