/**
 * Insights API
 *
 * GET /insights/recent?days=N   - insight over the last N days (default 7, max 30)
 * GET /insights/daily/{date}    - insight for one day, compared with the day before
 */

import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyHandlerV2,
  APIGatewayProxyStructuredResultV2,
} from "aws-lambda";
import { getHealthRuntime, type HealthRuntime } from "./runtime.js";
import { errorResponse, jsonResponse, parseDays } from "./responses.js";

export async function getRecentInsight(
  event: APIGatewayProxyEventV2,
  runtime: HealthRuntime
): Promise<APIGatewayProxyStructuredResultV2> {
  try {
    const days = parseDays(event.queryStringParameters?.days);
    const insight = await runtime.service.recentInsight(days);
    return jsonResponse(200, { insight });
  } catch (error) {
    return errorResponse(error, "Recent insight");
  }
}

export async function getDailyInsight(
  event: APIGatewayProxyEventV2,
  runtime: HealthRuntime
): Promise<APIGatewayProxyStructuredResultV2> {
  try {
    const insight = await runtime.service.dailyInsight(event.pathParameters?.date ?? "");
    return jsonResponse(200, { insight });
  } catch (error) {
    return errorResponse(error, "Daily insight");
  }
}

export const recentHandler: APIGatewayProxyHandlerV2 = async (event) =>
  getRecentInsight(event, getHealthRuntime());

export const dailyHandler: APIGatewayProxyHandlerV2 = async (event) =>
  getDailyInsight(event, getHealthRuntime());
