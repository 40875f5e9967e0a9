/**
 * Fixed prompt text. Changing anything here should come with a new
 * PROMPT_TEMPLATE_VERSION so cached insights are not served for it.
 */

import type { MetricType } from "../models/index.js";

export const PROMPT_HEADER = `You are a health AI assistant analyzing wearable health data (sleep, heart rate, weight).
The daily summaries below are computed from the user's device records.
Days marked "no data recorded" had no measurements; do not infer values for them.`;

export const PROMPT_INSTRUCTIONS = `Please provide a health analysis with the following sections:

1. Key Insights:
   - Patterns and trends in the data
   - Correlations between different metrics
   - Significant changes or anomalies

2. Health Recommendations:
   - Specific, actionable steps for sleep, weight management, and heart health

3. Health Concerns:
   - Potential concerns and when to consult a healthcare professional

Use "-" bullet points under each section. Be specific and evidence-based.`;

export const METRIC_LABELS: Record<MetricType, string> = {
  heart_rate: "Heart rate",
  sleep: "Sleep",
  weight: "Weight",
};

export const METRIC_UNITS: Record<MetricType, string> = {
  heart_rate: "bpm",
  sleep: "min",
  weight: "kg",
};
