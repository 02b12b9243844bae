import { describe, it, expect, beforeEach, afterAll, vi } from "vitest";
import { mkdtempSync, readFileSync, writeFileSync, rmSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runInit } from "../src/bin/init.js";
import { lintDocument } from "../src/linter.js";
import { DEFAULT_CONFIG } from "../src/config.js";
import { parseDecisionDocument } from "../src/document-parser.js";
import { createConfig } from "../src/index.js";

const BASE = mkdtempSync(join(tmpdir(), "decision-lint-init-"));

beforeEach(() => {
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterAll(() => {
  vi.restoreAllMocks();
  rmSync(BASE, { recursive: true, force: true });
});

describe("runInit", () => {
  it("writes a record named after the title that lints clean", () => {
    const result = runInit({
      cwd: BASE,
      title: "Solution QA Approach",
      author: "Test Author",
      date: "2025-06-12",
    });

    expect(result).toEqual({ written: true, path: join(BASE, "solution-qa-approach.md") });
    const content = readFileSync(result.path, "utf-8");
    expect(content.startsWith("# Solution QA Approach\n")).toBe(true);
    expect(lintDocument(content, DEFAULT_CONFIG).issues).toEqual([]);
  });

  it("creates parent directories for an explicit file", () => {
    const result = runInit({ cwd: BASE, file: "docs/decisions/queue.md", title: "Queue", author: "A" });
    expect(result.path).toBe(join(BASE, "docs", "decisions", "queue.md"));
    expect(readFileSync(result.path, "utf-8").split("\n")[0]).toBe("# Queue");
  });

  it("refuses to overwrite without force", () => {
    const path = join(BASE, "existing.md");
    writeFileSync(path, "keep me\n");

    expect(runInit({ cwd: BASE, file: "existing.md" })).toEqual({ written: false, path });
    expect(readFileSync(path, "utf-8")).toBe("keep me\n");

    expect(runInit({ cwd: BASE, file: "existing.md", force: true }).written).toBe(true);
    expect(readFileSync(path, "utf-8").split("\n")[0]).toBe("# Untitled Decision");
  });

  it("raises the option count to the configured minimum", () => {
    const result = runInit({ cwd: BASE, file: "single.md", author: "A", status: "Draft", options: 1 });
    const content = readFileSync(result.path, "utf-8");

    expect(parseDecisionDocument(content).options).toHaveLength(2);
    expect(parseDecisionDocument(content).frontMatter.status?.value).toBe("Draft");
    expect(lintDocument(content, DEFAULT_CONFIG).issues).toEqual([]);
  });

  it("refuses a status outside the allowed list", () => {
    const result = runInit({ cwd: BASE, file: "bad-status.md", author: "A", status: "Foo" });
    expect(result).toEqual({ written: false, path: join(BASE, "bad-status.md") });
    expect(existsSync(result.path)).toBe(false);
  });

  it("follows configured statuses and option counts", () => {
    const config = createConfig({
      frontMatter: { statuses: ["Open", "Closed"] },
      options: { expected: 3 },
    });
    const result = runInit({ cwd: BASE, file: "configured.md", author: "A", options: 5, config });
    const content = readFileSync(result.path, "utf-8");

    expect(parseDecisionDocument(content).frontMatter.status?.value).toBe("Open");
    expect(parseDecisionDocument(content).options).toHaveLength(3);
    expect(lintDocument(content, config).issues).toEqual([]);
  });
});
