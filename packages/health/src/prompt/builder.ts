/**
 * PromptBuilder - renders daily summaries into a bounded, deterministic prompt
 *
 * Identical input always renders byte-identical text: no clock reads,
 * fixed ordering, fixed number formatting.
 */

import type { DailySummary } from "../models/index.js";
import { EmptyInputError } from "../errors.js";
import { correlateSleepAndHeartRate } from "../analysis/index.js";
import { METRIC_LABELS, METRIC_UNITS, PROMPT_HEADER, PROMPT_INSTRUCTIONS } from "./template.js";

export interface PromptBuilderOptions {
  /** Maximum prompt length in characters */
  maxLength: number;
  templateVersion: string;
}

export interface PromptMetadata {
  templateVersion: string;
  maxLength: number;
  /** Whether any input was left out of the text */
  truncated: boolean;
  /** Oldest days dropped to fit, oldest first */
  droppedDates: string[];
  /** Whether the data section was cut off after dropping every day but the latest */
  clipped: boolean;
}

export interface Prompt {
  text: string;
  /** Summaries rendered into the text, sorted */
  summaries: DailySummary[];
  /** Prior-day summaries rendered for comparison, sorted */
  priorDay: DailySummary[];
  metadata: PromptMetadata;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order by (date ascending, metric type lexical)
 */
export function compareSummaries(a: DailySummary, b: DailySummary): number {
  return compareStrings(a.date, b.date) || compareStrings(a.metricType, b.metricType);
}

function fmt(value: number | null, digits = 1): string {
  return value === null ? "n/a" : value.toFixed(digits);
}

function signed(value: number, digits = 1): string {
  const text = value.toFixed(digits);
  if (Number(text) === 0) return (0).toFixed(digits);
  return value > 0 ? `+${text}` : text;
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * One bullet line describing a daily summary
 */
export function renderSummaryLine(summary: DailySummary): string {
  const label = METRIC_LABELS[summary.metricType];
  if (summary.sampleCount === 0) {
    return `- ${label}: no data recorded`;
  }

  switch (summary.metricType) {
    case "sleep": {
      const { extra } = summary;
      return (
        `- ${label}: ${plural(summary.sampleCount, "session")}, ${fmt(extra.totalSleepMinutes, 0)} min asleep ` +
        `(per session min ${fmt(summary.min, 0)}, max ${fmt(summary.max, 0)}, mean ${fmt(summary.mean)}), ` +
        `quality ${fmt(extra.avgQuality)}/100, ` +
        `deep ${fmt(extra.deepMinutes, 0)} / light ${fmt(extra.lightMinutes, 0)} / ` +
        `rem ${fmt(extra.remMinutes, 0)} / awake ${fmt(extra.awakeMinutes, 0)} min`
      );
    }
    case "heart_rate": {
      const resting =
        summary.extra.avgRestingRate === null ? "" : `, resting ${fmt(summary.extra.avgRestingRate)} bpm`;
      return (
        `- ${label}: ${plural(summary.sampleCount, "reading")}, mean ${fmt(summary.mean)} bpm ` +
        `(range ${fmt(summary.min, 0)}-${fmt(summary.max, 0)})${resting}`
      );
    }
    case "weight": {
      const bmi = summary.extra.avgBmi === null ? "" : `, BMI ${fmt(summary.extra.avgBmi)}`;
      const bodyFat = summary.extra.avgBodyFat === null ? "" : `, body fat ${fmt(summary.extra.avgBodyFat)}%`;
      return (
        `- ${label}: ${plural(summary.sampleCount, "weigh-in")}, mean ${fmt(summary.mean)} kg ` +
        `(range ${fmt(summary.min)}-${fmt(summary.max)})${bmi}${bodyFat}`
      );
    }
  }
}

const INSTRUCTIONS_SUFFIX = `\n\n${PROMPT_INSTRUCTIONS}`;

function uniqueDates(summaries: DailySummary[]): string[] {
  return [...new Set(summaries.map((s) => s.date))];
}

function renderComparison(current: DailySummary[], priorDay: DailySummary[]): string[] {
  if (priorDay.length === 0) return [];

  const lines = [`## Previous day (${uniqueDates(priorDay).join(", ")})`];
  for (const prior of priorDay) {
    lines.push(renderSummaryLine(prior));
  }

  for (const prior of priorDay) {
    const latest = current.filter((s) => s.metricType === prior.metricType).pop();
    if (!latest || latest.mean === null || prior.mean === null) continue;
    lines.push(
      `- ${METRIC_LABELS[prior.metricType]} mean change: ${signed(latest.mean - prior.mean)} ${METRIC_UNITS[prior.metricType]}`
    );
  }

  return lines;
}

function renderTrends(summaries: DailySummary[]): string[] {
  const lines: string[] = [];

  const weighed = summaries.filter((s) => s.metricType === "weight" && s.mean !== null);
  const first = weighed[0];
  const last = weighed[weighed.length - 1];
  if (weighed.length >= 2 && first.mean !== null && last.mean !== null) {
    lines.push(`- Weight change: ${signed(last.mean - first.mean)} kg (${first.date} to ${last.date})`);
  }

  for (const finding of correlateSleepAndHeartRate(summaries)) {
    lines.push(`- ${finding.label}: r = ${finding.coefficient.toFixed(2)} across ${finding.pairs} days`);
  }

  return lines.length > 0 ? ["## Trends", ...lines] : [];
}

export class PromptBuilder {
  constructor(private readonly options: PromptBuilderOptions) {}

  /**
   * Render summaries (and an optional prior day to compare against).
   * Oldest days are dropped first when the text would exceed maxLength; after
   * that the data section is clipped and the instructions kept whole.
   */
  build(summaries: DailySummary[], priorDay: DailySummary[] = []): Prompt {
    if (summaries.length === 0) {
      throw new EmptyInputError("Cannot build a prompt from zero summaries");
    }

    const sorted = [...summaries].sort(compareSummaries);
    const sortedPrior = [...priorDay].sort(compareSummaries);
    const dates = uniqueDates(sorted);

    const { maxLength } = this.options;

    let kept = dates;
    let body = this.render(sorted, sortedPrior, kept, 0);
    while (body.length + INSTRUCTIONS_SUFFIX.length > maxLength && kept.length > 1) {
      kept = kept.slice(1);
      body = this.render(sorted, sortedPrior, kept, dates.length - kept.length);
    }

    let text = body + INSTRUCTIONS_SUFFIX;
    const clipped = text.length > maxLength;
    if (clipped) {
      const room = maxLength - INSTRUCTIONS_SUFFIX.length;
      // Instructions longer than the limit on their own: plain cut
      text = room > 0 ? body.slice(0, room) + INSTRUCTIONS_SUFFIX : text.slice(0, maxLength);
    }

    const droppedDates = dates.slice(0, dates.length - kept.length);
    const keptDates = new Set(kept);

    return {
      text,
      summaries: sorted.filter((s) => keptDates.has(s.date)),
      priorDay: sortedPrior,
      metadata: {
        templateVersion: this.options.templateVersion,
        maxLength,
        truncated: droppedDates.length > 0 || clipped,
        droppedDates,
        clipped,
      },
    };
  }

  /**
   * Everything before the instructions
   */
  private render(
    sorted: DailySummary[],
    priorDay: DailySummary[],
    dates: string[],
    droppedCount: number
  ): string {
    const keptDates = new Set(dates);
    const current = sorted.filter((s) => keptDates.has(s.date));

    const lines: string[] = [PROMPT_HEADER, ""];
    lines.push(`Period: ${dates[0]} to ${dates[dates.length - 1]} (${plural(dates.length, "day")})`);
    if (droppedCount > 0) {
      lines.push(`Note: ${plural(droppedCount, "earlier day")} omitted to fit the prompt length.`);
    }

    lines.push("", "## Daily metrics");
    for (const date of dates) {
      lines.push(`### ${date}`);
      for (const summary of current) {
        if (summary.date === date) lines.push(renderSummaryLine(summary));
      }
    }

    const comparison = renderComparison(current, priorDay);
    if (comparison.length > 0) lines.push("", ...comparison);

    const trends = renderTrends(current);
    if (trends.length > 0) lines.push("", ...trends);

    return lines.join("\n");
  }
}
