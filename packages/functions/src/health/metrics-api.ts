/**
 * Health data API
 *
 * POST /health-data/{type}          - ingest one record (201, or 400 with issues)
 * GET  /health-data/{type}?days=N   - raw records of the last N days
 * GET  /health-data/daily/{date}    - daily summary per metric type
 */

import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyHandlerV2,
  APIGatewayProxyStructuredResultV2,
} from "aws-lambda";
import {
  DAY_MS,
  METRIC_TYPES,
  StoreUnavailableError,
  isMetricType,
  parseMetricRecord,
  type MetricType,
} from "@health/core";
import { getHealthRuntime, type HealthRuntime } from "./runtime.js";
import { errorResponse, jsonResponse, parseDays } from "./responses.js";

function unknownType(type: string | undefined): APIGatewayProxyStructuredResultV2 {
  return jsonResponse(400, {
    error: `Unknown metric type "${type ?? ""}"`,
    supported: METRIC_TYPES,
  });
}

function readBody(event: APIGatewayProxyEventV2): string {
  if (!event.body) return "";
  return event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body;
}

function metricTypeOf(event: APIGatewayProxyEventV2): MetricType | undefined {
  const type = event.pathParameters?.type;
  return type !== undefined && isMetricType(type) ? type : undefined;
}

export async function ingestRecord(
  event: APIGatewayProxyEventV2,
  runtime: HealthRuntime
): Promise<APIGatewayProxyStructuredResultV2> {
  const type = metricTypeOf(event);
  if (!type) return unknownType(event.pathParameters?.type);

  let payload: unknown;
  try {
    payload = JSON.parse(readBody(event));
  } catch {
    return jsonResponse(400, { error: "Request body must be valid JSON" });
  }

  const parsed = parseMetricRecord(type, payload);
  if (!parsed.ok) {
    return jsonResponse(400, { error: "Invalid record", issues: parsed.issues });
  }

  try {
    const result = await runtime.store.append([parsed.record]);
    if (result.errors.length > 0) {
      throw new StoreUnavailableError(`Failed to store ${type} record: ${result.errors.join("; ")}`);
    }

    if (result.duplicates > 0) {
      console.log(`Ingest: duplicate ${type} record at ${parsed.record.timestamp}`);
      return jsonResponse(200, { status: "duplicate", warnings: parsed.warnings });
    }

    console.log(`Ingest: stored ${type} record at ${parsed.record.timestamp}`);
    return jsonResponse(201, { status: "created", record: parsed.record, warnings: parsed.warnings });
  } catch (error) {
    return errorResponse(error, "Ingest");
  }
}

export async function listRecords(
  event: APIGatewayProxyEventV2,
  runtime: HealthRuntime
): Promise<APIGatewayProxyStructuredResultV2> {
  const type = metricTypeOf(event);
  if (!type) return unknownType(event.pathParameters?.type);

  try {
    const days = parseDays(event.queryStringParameters?.days);
    const end = Date.now();
    const records = await runtime.store.query(type, end - days * DAY_MS, end);
    return jsonResponse(200, { type, days, count: records.length, records });
  } catch (error) {
    return errorResponse(error, "List records");
  }
}

export async function getDailySummaries(
  event: APIGatewayProxyEventV2,
  runtime: HealthRuntime
): Promise<APIGatewayProxyStructuredResultV2> {
  const date = event.pathParameters?.date ?? "";
  try {
    const summaries = await runtime.service.summarizeDay(date);
    return jsonResponse(200, { date, summaries });
  } catch (error) {
    return errorResponse(error, "Daily summaries");
  }
}

export const ingestHandler: APIGatewayProxyHandlerV2 = async (event) =>
  ingestRecord(event, getHealthRuntime());

export const recordsHandler: APIGatewayProxyHandlerV2 = async (event) =>
  listRecords(event, getHealthRuntime());

export const dailySummaryHandler: APIGatewayProxyHandlerV2 = async (event) =>
  getDailySummaries(event, getHealthRuntime());
