// Template for new decision records — every canonical section, in order,
// with placeholders shaped so the default rule set passes on the scaffold.

import { SECTION_TITLES } from "../sections.js";

export interface DecisionRecordInput {
  title: string;
  date: string;
  author: string;
  status?: string;
  /** Number of option stubs (minimum 1) */
  options?: number;
}

const DEFAULT_OPTION_COUNT = 2;

export function renderDecisionRecord(input: DecisionRecordInput): string {
  const optionCount = Math.max(1, input.options ?? DEFAULT_OPTION_COUNT);
  const optionNames = Array.from({ length: optionCount }, (_, i) => `Approach ${i + 1}`);

  const lines: string[] = [
    `# ${input.title}`,
    "",
    `**Date:** ${input.date}`,
    `**Status:** ${input.status ?? "Proposed"}`,
    `**Author:** ${input.author}`,
    "",
    `## ${SECTION_TITLES.overview}`,
    "",
    "_Describe the problem this decision addresses and why it needs deciding now._",
    "",
    `## ${SECTION_TITLES.requirements}`,
    "",
    "- _List the requirements every option must meet._",
    "",
    `## ${SECTION_TITLES.options}`,
    "",
  ];

  optionNames.forEach((name, i) => {
    lines.push(
      `### Option ${i + 1}: ${name}`,
      "",
      "_Summarize the approach._",
      "",
      "**Pros:**",
      "- _Advantage_",
      "",
      "**Cons:**",
      "- _Drawback_",
      "",
    );
  });

  lines.push(
    `## ${SECTION_TITLES.comparison}`,
    "",
    `| Criterion | ${optionNames.join(" | ")} |`,
    `|---|${optionNames.map(() => "---").join("|")}|`,
    `| _Criterion_ | ${optionNames.map(() => "_Rating_").join(" | ")} |`,
    "",
    `## ${SECTION_TITLES.recommendation}`,
    "",
    `_Adopt Option 1 (${optionNames[0]}) because ..._`,
    "",
    `## ${SECTION_TITLES.architecture}`,
    "",
    "```text",
    "[component] --> [component]",
    "```",
    "",
    `## ${SECTION_TITLES["implementation-plan"]}`,
    "",
    "### Phase 1: Foundation",
    "",
    "- **Tools:** `tool_name`",
    "- **Purpose:** _What this phase delivers._",
    "",
    `## ${SECTION_TITLES["decision-summary"]}`,
    "",
    "_Restate the decision and its main trade-off in one paragraph._",
    "",
    `## ${SECTION_TITLES["open-questions"]}`,
    "",
    "1. _What remains undecided?_",
    "",
    `## ${SECTION_TITLES.references}`,
    "",
    "- [Project repository](https://example.com/repository)",
    "- Internal repository: _team/repository_",
    "",
  );

  return lines.join("\n");
}

/**
 * File name for a title: "Solution QA Approach" → "solution-qa-approach.md".
 */
export function decisionRecordFilename(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${slug || "decision-record"}.md`;
}
