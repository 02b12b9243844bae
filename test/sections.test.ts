import { describe, it, expect } from "vitest";
import { scanMarkdown } from "../src/markdown-scanner.js";
import {
  normalizeHeading,
  classifySection,
  buildSectionTree,
  flattenSection,
  isEmptySection,
  sectionOrder,
} from "../src/sections.js";

describe("normalizeHeading", () => {
  it("drops numbering, markup and a trailing colon", () => {
    expect(normalizeHeading("2. **Options Evaluated**:")).toBe("options evaluated");
    expect(normalizeHeading("📌 Open  Questions")).toBe("open questions");
  });
});

describe("classifySection", () => {
  it("maps aliases to canonical kinds", () => {
    expect(classifySection("Overview")).toBe("overview");
    expect(classifySection("Context")).toBe("overview");
    expect(classifySection("Alternatives Considered")).toBe("options");
    expect(classifySection("Rollout Plan")).toBe("implementation-plan");
  });

  it("returns undefined for unrecognized headings", () => {
    expect(classifySection("Unrelated Notes")).toBeUndefined();
  });

  it("accepts configured aliases", () => {
    expect(classifySection("Further Reading")).toBeUndefined();
    expect(classifySection("Further Reading", { references: ["further reading"] })).toBe("references");
  });
});

describe("sectionOrder", () => {
  it("follows the canonical order", () => {
    expect(sectionOrder("overview")).toBe(0);
    expect(sectionOrder("references")).toBe(9);
    expect(sectionOrder("comparison")).toBeLessThan(sectionOrder("recommendation"));
  });
});

describe("buildSectionTree", () => {
  const content = [
    "# Title",
    "intro",
    "## Overview",
    "text",
    "### Detail",
    "more",
    "## Custom Notes",
  ].join("\n");

  it("nests deeper headings under level-2 sections", () => {
    const sections = buildSectionTree(scanMarkdown(content), {}, 7);

    expect(sections).toHaveLength(2);
    const [overview, custom] = sections;
    expect(overview).toMatchObject({ title: "Overview", kind: "overview", level: 2, line: 3, endLine: 6 });
    expect(overview.children).toHaveLength(1);
    expect(overview.children[0]).toMatchObject({ title: "Detail", level: 3, line: 5, endLine: 6 });
    expect(overview.children[0].kind).toBeUndefined();
    expect(custom).toMatchObject({ title: "Custom Notes", line: 7, endLine: 7 });
    expect(custom.kind).toBeUndefined();
  });

  it("leaves content before the first section out of the tree", () => {
    const sections = buildSectionTree(scanMarkdown(content), {}, 7);
    const texts = sections.flatMap((s) => flattenSection(s)).map((b) => ("text" in b ? b.text : ""));
    expect(texts).not.toContain("intro");
  });

  it("flattens child headings back in document order", () => {
    const [overview] = buildSectionTree(scanMarkdown(content), {}, 7);
    expect(flattenSection(overview).map((b) => [b.type, b.line])).toEqual([
      ["paragraph", 4],
      ["heading", 5],
      ["paragraph", 6],
    ]);
  });

  it("reports sections with neither blocks nor children as empty", () => {
    const [overview, custom] = buildSectionTree(scanMarkdown(content), {}, 7);
    expect(isEmptySection(overview)).toBe(false);
    expect(isEmptySection(custom)).toBe(true);
  });

  it("closes open sections at a level-1 heading", () => {
    const sections = buildSectionTree(scanMarkdown("## Overview\ntext\n# Appendix\nloose"), {}, 4);
    expect(sections).toHaveLength(1);
    expect(sections[0].endLine).toBe(2);
    expect(sections[0].blocks).toHaveLength(1);
  });
});
