import type { LintRule, RuleFinding } from "../types.js";
import { findSections } from "../sections.js";
import { isHttpUrl } from "../markdown-scanner.js";

export const referenceTargetRule: LintRule = {
  id: "reference-target",
  description: "Every reference is an http(s) URL or carries an internal-repository label",
  defaultSeverity: "error",
  check(doc) {
    const section = findSections(doc.sections, "references")[0];
    if (!section) return [];
    if (doc.references.length === 0) {
      return [{ message: `Section "${section.title}" lists no references`, line: section.line }];
    }

    const findings: RuleFinding[] = [];
    for (const ref of doc.references) {
      if (ref.url && isHttpUrl(ref.url)) continue;
      if (ref.internal) continue;
      findings.push(ref.url
        ? { message: `Reference "${ref.text}" links to "${ref.url}", which is not an http(s) URL`, line: ref.line }
        : {
            message: `Reference "${ref.text}" has neither a URL nor an internal repository label`,
            line: ref.line,
            hint: 'Link it, or mark it "(internal)"',
          });
    }
    return findings;
  },
};
