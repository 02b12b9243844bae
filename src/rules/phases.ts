import type { LintRule, RuleFinding } from "../types.js";
import { findSections } from "../sections.js";

export const phaseToolsPurposeRule: LintRule = {
  id: "phase-tools-purpose",
  description: "Every implementation phase names at least one tool and states its purpose",
  defaultSeverity: "error",
  check(doc) {
    const section = findSections(doc.sections, "implementation-plan")[0];
    if (!section) return [];
    if (doc.phases.length === 0) {
      return [{
        message: `Section "${section.title}" defines no phases`,
        line: section.line,
        hint: "Use one ### heading per phase, or a table with a Phase column",
      }];
    }

    const findings: RuleFinding[] = [];
    for (const phase of doc.phases) {
      const name = phase.name || "(unnamed)";
      if (phase.tools.length === 0) {
        findings.push({
          message: `Phase "${name}" names no tools`,
          line: phase.line,
          hint: 'Add a "Tools:" line listing them in backticks',
        });
      }
      if (!phase.purpose) {
        findings.push({
          message: `Phase "${name}" states no purpose`,
          line: phase.line,
          hint: 'Add a "Purpose:" line',
        });
      }
    }
    return findings;
  },
};
