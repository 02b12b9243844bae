import type { LintRule, RuleFinding } from "../types.js";
import { getField, isAllowedStatus, isIsoDate } from "../front-matter.js";

export const frontMatterRule: LintRule = {
  id: "front-matter",
  description: "Date, Status and Author lines sit between the title and the first section",
  defaultSeverity: "error",
  check(doc, { config }) {
    const findings: RuleFinding[] = [];
    const anchor = doc.title?.line ?? 1;

    for (const key of config.frontMatter.required) {
      if (!getField(doc.frontMatter, key)) {
        findings.push({
          message: `Missing front matter field "${key}"`,
          line: anchor,
          hint: `Add a "${key}: ..." line below the title`,
        });
      }
    }

    const date = doc.frontMatter.date;
    if (date && !isIsoDate(date.value)) {
      findings.push({
        message: `Date "${date.value}" is not a YYYY-MM-DD calendar date`,
        line: date.line,
      });
    }

    const status = doc.frontMatter.status;
    const allowed = config.frontMatter.statuses;
    if (status && !isAllowedStatus(status.value, allowed)) {
      findings.push({
        message: `Status "${status.value}" is not one of: ${allowed.join(", ")}`,
        line: status.line,
      });
    }

    return findings;
  },
};
