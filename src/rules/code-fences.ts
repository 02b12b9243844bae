import type { LintRule } from "../types.js";

export const unclosedCodeFenceRule: LintRule = {
  id: "unclosed-code-fence",
  description: "Every code fence is closed",
  defaultSeverity: "error",
  check(doc) {
    return doc.unclosedFences.map((fence) => ({
      message: "Code fence is never closed; the rest of the document is swallowed",
      line: fence.line,
    }));
  },
};
