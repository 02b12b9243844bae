import type { LintRule } from "../types.js";
import { findSections } from "../sections.js";
import { textMentionsOption } from "./option-names.js";

export const recommendationOptionRule: LintRule = {
  id: "recommendation-option",
  description: "The recommendation names one of the evaluated options",
  defaultSeverity: "warn",
  check(doc) {
    const recommendation = doc.recommendation;
    if (!recommendation || doc.options.length === 0) return [];
    if (doc.options.some((o) => textMentionsOption(recommendation.text, o))) return [];
    return [{
      message: "Recommendation does not name any evaluated option",
      line: recommendation.line,
      hint: `Name one of: ${doc.options.map((o) => o.name).join(", ")}`,
    }];
  },
};

export const architectureDiagramRule: LintRule = {
  id: "architecture-diagram",
  description: "The architecture section carries a diagram in a code block",
  defaultSeverity: "warn",
  check(doc) {
    const section = findSections(doc.sections, "architecture")[0];
    if (!section || doc.diagrams.length > 0) return [];
    return [{
      message: `Section "${section.title}" has no diagram`,
      line: section.line,
      hint: "Add the diagram as a fenced code block",
    }];
  },
};
