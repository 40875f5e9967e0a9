/**
 * @health/core - Prompt
 */

export {
  PromptBuilder,
  compareSummaries,
  renderSummaryLine,
  type Prompt,
  type PromptBuilderOptions,
  type PromptMetadata,
} from "./builder.js";
export { PROMPT_HEADER, PROMPT_INSTRUCTIONS, METRIC_LABELS, METRIC_UNITS } from "./template.js";
