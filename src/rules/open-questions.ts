import type { LintRule } from "../types.js";
import { findSections } from "../sections.js";

const MAX_QUOTED = 60;

export const openQuestionFormatRule: LintRule = {
  id: "open-question-format",
  description: "Every open question is phrased as a question",
  defaultSeverity: "error",
  check(doc) {
    const section = findSections(doc.sections, "open-questions")[0];
    if (!section) return [];
    if (doc.openQuestions.length === 0) {
      return [{ message: `Section "${section.title}" lists no questions`, line: section.line }];
    }

    return doc.openQuestions
      .filter((q) => !q.text.trimEnd().endsWith("?"))
      .map((q) => ({
        message: `Open question does not end with "?": "${truncate(q.text)}"`,
        line: q.line,
        hint: "Phrase it as a question",
      }));
  },
};

function truncate(text: string): string {
  return text.length > MAX_QUOTED ? `${text.slice(0, MAX_QUOTED - 1)}…` : text;
}
