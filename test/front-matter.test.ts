import { describe, it, expect } from "vitest";
import { scanMarkdown } from "../src/markdown-scanner.js";
import { parseFrontMatter, isIsoDate, getField } from "../src/front-matter.js";

const HEADER = [
  "# Pick a Queue",
  "",
  "**Date:** 2025-01-31",
  "- Status: Accepted (2025-02-01)",
  "",
  "Owner: Data Team",
  "",
  "## Overview",
  "",
  "Note: not front matter",
].join("\n");

describe("parseFrontMatter", () => {
  it("reads emphasized lines, list items and plain lines before the first section", () => {
    const fm = parseFrontMatter(scanMarkdown(HEADER));

    expect(fm.fields).toEqual([
      { key: "Date", value: "2025-01-31", line: 3 },
      { key: "Status", value: "Accepted (2025-02-01)", line: 4 },
      { key: "Owner", value: "Data Team", line: 6 },
    ]);
    expect(fm.date?.value).toBe("2025-01-31");
    expect(fm.status?.line).toBe(4);
    expect(fm.author?.value).toBe("Data Team");
  });

  it("keeps the first value when a key repeats", () => {
    const fm = parseFrontMatter(scanMarkdown("# T\n\nStatus: Draft\nStatus: Accepted\n"));
    expect(fm.status?.value).toBe("Draft");
    expect(fm.fields).toHaveLength(2);
  });

  it("returns no fields for a document without front matter", () => {
    const fm = parseFrontMatter(scanMarkdown("# T\n\n## Overview\n\nDate: 2025-01-01\n"));
    expect(fm).toEqual({ fields: [] });
  });
});

describe("getField", () => {
  it("resolves author aliases and arbitrary keys case-insensitively", () => {
    const fm = parseFrontMatter(scanMarkdown(`${HEADER}\n`));
    expect(getField(fm, "Author")?.value).toBe("Data Team");
    expect(getField(fm, "owner")?.line).toBe(6);
    expect(getField(fm, "DATE")?.value).toBe("2025-01-31");
    expect(getField(fm, "Reviewers")).toBeUndefined();
  });
});

describe("isIsoDate", () => {
  it("accepts real calendar dates", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate(" 2025-06-12 ")).toBe(true);
  });

  it("rejects impossible dates and other formats", () => {
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2025-13-01")).toBe(false);
    expect(isIsoDate("2025-1-5")).toBe(false);
    expect(isIsoDate("12/06/2025")).toBe(false);
  });
});
