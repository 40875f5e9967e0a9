/**
 * InsightService - turns a calendar range into a cached, model-generated insight
 *
 * Flow per request: aggregate every metric type, build the prompt, fingerprint
 * it, then either serve the cached insight, wait on the caller already
 * generating it, or generate it ourselves under a reservation.
 */

import type {
  DailySummary,
  Insight,
  InsightKind,
  InsightTimeRange,
  MetricType,
} from "../models/index.js";
import { METRIC_TYPES } from "../models/index.js";
import type { InsightConfig } from "../config.js";
import {
  EmptyInputError,
  InvalidRangeError,
  ModelError,
  ModelTimeoutError,
  ModelUnavailableError,
  errorMessage,
} from "../errors.js";
import { Aggregator } from "../aggregations/index.js";
import { PromptBuilder, type Prompt } from "../prompt/index.js";
import {
  InsightCache,
  computeFingerprint,
  shortFingerprint,
  type ReservationToken,
} from "../cache/index.js";
import type { ModelClient } from "../model/client.js";
import { withTimeout } from "../model/timeout.js";
import { parseInsightSections } from "../parsers/index.js";
import type { MetricStore } from "../storage/metric-store.js";
import type { InsightRepository } from "../storage/insights.js";
import {
  addDays,
  formatDateInTimezone,
  getStartOfDayInTimezone,
  isValidDateString,
} from "../storage/keys.js";

export interface InsightServiceDeps {
  store: MetricStore;
  model: ModelClient;
  cache: InsightCache;
  config: InsightConfig;
  /** Durable insight storage consulted before calling the model */
  repository?: InsightRepository;
  /** Whose data this service reads; part of every fingerprint */
  scope?: string;
  /** Metric types included in every insight */
  metricTypes?: readonly MetricType[];
}

interface GenerationRequest {
  kind: InsightKind;
  timeRange: InsightTimeRange;
  prompt: Prompt;
}

export class InsightService {
  private readonly store: MetricStore;
  private readonly model: ModelClient;
  private readonly cache: InsightCache;
  private readonly config: InsightConfig;
  private readonly repository?: InsightRepository;
  private readonly scope: string;
  private readonly metricTypes: readonly MetricType[];
  private readonly aggregator: Aggregator;
  private readonly builder: PromptBuilder;

  constructor(deps: InsightServiceDeps) {
    this.store = deps.store;
    this.model = deps.model;
    this.cache = deps.cache;
    this.config = deps.config;
    this.repository = deps.repository;
    this.scope = deps.scope ?? "default";
    this.metricTypes = deps.metricTypes ?? METRIC_TYPES;
    this.aggregator = new Aggregator(this.store, this.config.timezone);
    this.builder = new PromptBuilder({
      maxLength: this.config.maxPromptLength,
      templateVersion: this.config.promptTemplateVersion,
    });
  }

  /**
   * Insight over the last `days` calendar days, today included
   */
  async recentInsight(days: number): Promise<Insight> {
    if (!Number.isInteger(days) || days <= 0) {
      throw new InvalidRangeError(`days must be a positive integer, got ${days}`);
    }

    const endDate = formatDateInTimezone(Date.now(), this.config.timezone);
    const startDate = addDays(endDate, -(days - 1));
    return this.generate("recent", startDate, endDate);
  }

  /**
   * Insight for one calendar day, compared against the day before
   */
  async dailyInsight(date: string): Promise<Insight> {
    this.assertDate(date);
    return this.generate("daily", date, date, addDays(date, -1));
  }

  /**
   * The day's summary for every metric type, zero-sample types included
   */
  async summarizeDay(date: string): Promise<DailySummary[]> {
    this.assertDate(date);
    const range = this.rangeFor(date, date);
    return this.collect(range.start, range.end);
  }

  private assertDate(date: string): void {
    if (!isValidDateString(date)) {
      throw new InvalidRangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
  }

  private rangeFor(startDate: string, endDate: string): InsightTimeRange {
    const { timezone } = this.config;
    return {
      start: getStartOfDayInTimezone(startDate, timezone),
      end: getStartOfDayInTimezone(addDays(endDate, 1), timezone),
      startDate,
      endDate,
    };
  }

  private async collect(start: number, end: number): Promise<DailySummary[]> {
    const perType = await Promise.all(
      this.metricTypes.map((metricType) => this.aggregator.aggregate(metricType, start, end))
    );
    return perType.flat();
  }

  private async generate(
    kind: InsightKind,
    startDate: string,
    endDate: string,
    priorDate?: string
  ): Promise<Insight> {
    const timeRange = this.rangeFor(startDate, endDate);
    const summaries = await this.collect(timeRange.start, timeRange.end);

    if (summaries.every((summary) => summary.sampleCount === 0)) {
      throw new EmptyInputError(`No health data between ${startDate} and ${endDate}`);
    }

    let priorDay: DailySummary[] = [];
    if (priorDate) {
      const prior = this.rangeFor(priorDate, priorDate);
      priorDay = (await this.collect(prior.start, prior.end)).filter((summary) => summary.sampleCount > 0);
    }

    const prompt = this.builder.build(summaries, priorDay);
    const fingerprint = computeFingerprint({
      kind,
      metricTypes: this.metricTypes,
      start: timeRange.start,
      end: timeRange.end,
      aggregationVersion: this.config.aggregationVersion,
      promptTemplateVersion: this.config.promptTemplateVersion,
      scope: this.scope,
      promptText: prompt.text,
    });

    const lookup = this.cache.reserveOrGet(fingerprint);
    switch (lookup.status) {
      case "ready":
        console.log(`Insight cache hit ${shortFingerprint(fingerprint)}`);
        return lookup.insight;
      case "pending":
        console.log(`Waiting on in-flight insight ${shortFingerprint(fingerprint)}`);
        return lookup.wait(this.config.waitTimeoutMs);
      case "reserved":
        return this.fulfil(lookup.token, { kind, timeRange, prompt });
    }
  }

  /**
   * Produce the insight for a reservation and publish the outcome.
   * Every path completes the token.
   */
  private async fulfil(token: ReservationToken, request: GenerationRequest): Promise<Insight> {
    const { fingerprint } = token;

    const stored = await this.findStored(fingerprint);
    if (stored) {
      console.log(`Insight ${shortFingerprint(fingerprint)} loaded from storage`);
      this.cache.complete(token, stored);
      return stored;
    }

    let insight: Insight;
    try {
      insight = await this.callModel(fingerprint, request);
    } catch (error) {
      const failure = new ModelUnavailableError(
        `Insight generation failed for ${shortFingerprint(fingerprint)}: ${errorMessage(error)}`,
        { cause: error }
      );
      console.error("Insight generation error:", failure.message);
      this.cache.complete(token, failure);
      throw failure;
    }

    this.cache.complete(token, insight);
    await this.persist(insight);
    return insight;
  }

  private async callModel(fingerprint: string, request: GenerationRequest): Promise<Insight> {
    const { modelTimeoutMs } = this.config;
    const { kind, timeRange, prompt } = request;

    console.log(
      `Generating ${kind} insight ${shortFingerprint(fingerprint)} for ${timeRange.startDate} to ${timeRange.endDate}` +
        (prompt.metadata.truncated ? ` (prompt truncated, ${prompt.metadata.droppedDates.length} days dropped)` : "")
    );

    const content = await withTimeout(
      this.model.generate(prompt.text, modelTimeoutMs),
      modelTimeoutMs,
      () => new ModelTimeoutError(modelTimeoutMs)
    );
    if (!content.trim()) {
      throw new ModelError("Model returned an empty response");
    }

    const sections = parseInsightSections(content);
    return {
      fingerprint,
      kind,
      timeRange,
      content,
      recommendations: sections.recommendations,
      concerns: sections.concerns,
      generatedAt: Date.now(),
      modelVersion: this.model.modelVersion,
      promptTruncated: prompt.metadata.truncated,
    };
  }

  private async findStored(fingerprint: string): Promise<Insight | null> {
    if (!this.repository) return null;
    try {
      return await this.repository.findByFingerprint(fingerprint);
    } catch (error) {
      console.warn("Insight storage read failed, generating instead:", errorMessage(error));
      return null;
    }
  }

  private async persist(insight: Insight): Promise<void> {
    if (!this.repository) return;
    try {
      await this.repository.save(insight);
    } catch (error) {
      console.error("Failed to store insight:", errorMessage(error));
    }
  }
}
