import { describe, it, expect } from "vitest";
import { renderDecisionRecord, decisionRecordFilename } from "../src/templates/decision-record.js";
import { parseDecisionDocument } from "../src/document-parser.js";
import { lintDocument } from "../src/linter.js";
import { DEFAULT_CONFIG } from "../src/config.js";
import { createConfig } from "../src/index.js";

const input = { title: "Pick a Queue", date: "2025-06-12", author: "Test Author" };

describe("renderDecisionRecord", () => {
  it("passes every default rule", () => {
    const result = lintDocument(renderDecisionRecord(input), DEFAULT_CONFIG);
    expect(result.issues).toEqual([]);
  });

  it("starts with the title and front matter", () => {
    expect(renderDecisionRecord(input).split("\n").slice(0, 5)).toEqual([
      "# Pick a Queue",
      "",
      "**Date:** 2025-06-12",
      "**Status:** Proposed",
      "**Author:** Test Author",
    ]);
  });

  it("writes one option stub and matrix column per requested option", () => {
    const content = renderDecisionRecord({ ...input, options: 3, status: "Draft" });
    const doc = parseDecisionDocument(content);

    expect(doc.frontMatter.status?.value).toBe("Draft");
    expect(doc.options.map((o) => o.name)).toEqual(["Approach 1", "Approach 2", "Approach 3"]);
    expect(doc.matrix?.columns).toEqual(["Approach 1", "Approach 2", "Approach 3"]);
    expect(lintDocument(content, createConfig({ options: { expected: 3 } })).issues).toEqual([]);
  });

  it("writes at least one option", () => {
    const doc = parseDecisionDocument(renderDecisionRecord({ ...input, options: 0 }));
    expect(doc.options).toHaveLength(1);
  });
});

describe("decisionRecordFilename", () => {
  it("slugs the title", () => {
    expect(decisionRecordFilename("Solution QA Approach")).toBe("solution-qa-approach.md");
    expect(decisionRecordFilename("Use Postgres 16?")).toBe("use-postgres-16.md");
  });

  it("falls back when the title has no usable characters", () => {
    expect(decisionRecordFilename("  !!! ")).toBe("decision-record.md");
  });
});
