/**
 * Split a model response into the sections the prompt asks for
 */

export interface InsightSections {
  recommendations: string[];
  concerns: string[];
}

type Section = "insights" | "recommendations" | "concerns";

const SECTION_HEADINGS = new Map<string, Section>([
  ["key insights", "insights"],
  ["health recommendations", "recommendations"],
  ["health concerns", "concerns"],
]);

const BULLET = /^(?:[-*•]|\d+[.)])\s+(.*)$/;

/**
 * Collect bullet points under "Health Recommendations" and "Health Concerns".
 * Text outside those sections is ignored; the full response stays the insight content.
 */
export function parseInsightSections(text: string): InsightSections {
  const sections: InsightSections = { recommendations: [], concerns: [] };
  let current: Section | null = null;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    // "## Health Concerns", "**2. Health Recommendations:**", "Key Insights:"
    const heading = SECTION_HEADINGS.get(
      line.replace(/^[#*\d.)\s]+/, "").replace(/[*:\s]+$/, "").toLowerCase()
    );
    if (heading) {
      current = heading;
      continue;
    }

    const bullet = BULLET.exec(line);
    if (!bullet) continue;

    const item = bullet[1].replace(/\*\*/g, "").trim();
    if (!item) continue;

    if (current === "recommendations") sections.recommendations.push(item);
    else if (current === "concerns") sections.concerns.push(item);
  }

  return sections;
}
