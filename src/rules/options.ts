import type { LintRule, RuleFinding } from "../types.js";
import { findSections } from "../sections.js";

export const optionProsConsRule: LintRule = {
  id: "option-pros-cons",
  description: "Every evaluated option lists at least one pro and one con",
  defaultSeverity: "error",
  check(doc) {
    const section = findSections(doc.sections, "options")[0];
    if (!section) return [];
    if (doc.options.length === 0) {
      return [{
        message: `Section "${section.title}" lists no options`,
        line: section.line,
        hint: "Give each option its own ### heading",
      }];
    }

    const findings: RuleFinding[] = [];
    for (const option of doc.options) {
      if (option.pros.length === 0) {
        findings.push({
          message: `Option "${option.name}" has no pros`,
          line: option.line,
          hint: 'Add a "Pros:" list',
        });
      }
      if (option.cons.length === 0) {
        findings.push({
          message: `Option "${option.name}" has no cons`,
          line: option.line,
          hint: 'Add a "Cons:" list',
        });
      }
    }
    return findings;
  },
};

export const optionCountRule: LintRule = {
  id: "option-count",
  description: "Enough options are evaluated to make a comparison",
  defaultSeverity: "warn",
  check(doc, { config }) {
    const section = findSections(doc.sections, "options")[0];
    const count = doc.options.length;
    if (!section || count === 0) return [];

    const { min, expected } = config.options;
    if (expected !== undefined && count !== expected) {
      return [{ message: `Expected ${expected} evaluated options, found ${count}`, line: section.line }];
    }
    if (count < min) {
      return [{
        message: `Only ${count} option${count === 1 ? "" : "s"} evaluated; at least ${min} expected`,
        line: section.line,
      }];
    }
    return [];
  },
};
