import type { LintRule, RuleFinding, Section, SectionKind } from "../types.js";
import { SECTION_TITLES, sectionOrder, isEmptySection } from "../sections.js";

export const requiredSectionsRule: LintRule = {
  id: "required-sections",
  description: "Every required section is present",
  defaultSeverity: "error",
  check(doc, { config }) {
    const present = new Set(doc.sections.map((s) => s.kind));
    return config.sections.required
      .filter((kind) => !present.has(kind))
      .map((kind) => ({
        message: `Missing required section "${SECTION_TITLES[kind]}"`,
        hint: `Add a "## ${SECTION_TITLES[kind]}" heading`,
      }));
  },
};

export const sectionOrderRule: LintRule = {
  id: "section-order",
  description: "Sections follow Overview → … → References order",
  defaultSeverity: "error",
  check(doc) {
    const findings: RuleFinding[] = [];
    let latest: { section: Section; order: number } | undefined;

    for (const section of doc.sections) {
      if (!section.kind) continue;
      const order = sectionOrder(section.kind);
      if (latest && order < latest.order) {
        findings.push({
          message: `Section "${section.title}" should come before "${latest.section.title}"`,
          line: section.line,
        });
      } else {
        latest = { section, order };
      }
    }
    return findings;
  },
};

export const duplicateSectionRule: LintRule = {
  id: "duplicate-section",
  description: "Each section appears once",
  defaultSeverity: "warn",
  check(doc) {
    const findings: RuleFinding[] = [];
    const seen = new Map<SectionKind, Section>();
    for (const section of doc.sections) {
      if (!section.kind) continue;
      const first = seen.get(section.kind);
      if (first) {
        findings.push({
          message: `Section "${section.title}" repeats "${first.title}" (line ${first.line})`,
          line: section.line,
        });
      } else {
        seen.set(section.kind, section);
      }
    }
    return findings;
  },
};

export const emptySectionRule: LintRule = {
  id: "empty-section",
  description: "Recognized sections have content",
  defaultSeverity: "warn",
  check(doc) {
    return doc.sections
      .filter((s) => s.kind && isEmptySection(s))
      .map((s) => ({ message: `Section "${s.title}" is empty`, line: s.line }));
  },
};
