// src/linter.ts — Runs the rule registry over decision documents

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { FileResult, LintIssue, LintRun, ResolvedConfig, Warning } from "./types.js";
import { FileNotFoundError } from "./types.js";
import { parseDecisionDocument } from "./document-parser.js";
import { ALL_RULES, resolveRuleSeverities } from "./rule-registry.js";
import { discoverDocuments } from "./file-discovery.js";

/**
 * Lint one document's content. `file` only labels the result.
 */
export function lintDocument(
  content: string,
  config: ResolvedConfig,
  file = "<input>",
): FileResult {
  const document = parseDecisionDocument(content, {
    file,
    aliases: config.sections.aliases,
  });
  const severities = resolveRuleSeverities(config);

  const issues: LintIssue[] = [];
  for (const rule of ALL_RULES) {
    const severity = severities.get(rule.id);
    if (!severity) continue;
    for (const finding of rule.check(document, { config })) {
      issues.push({
        ruleId: rule.id,
        severity,
        message: finding.message,
        line: finding.line,
        hint: finding.hint,
      });
    }
  }
  issues.sort(compareIssues);

  return {
    file,
    document,
    issues,
    errorCount: issues.filter((i) => i.severity === "error").length,
    warningCount: issues.filter((i) => i.severity === "warn").length,
  };
}

/**
 * Read and lint a single file.
 * @throws FileNotFoundError when the path does not exist
 */
export function lintFile(filePath: string, config: ResolvedConfig): FileResult {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) throw new FileNotFoundError(absPath);
  return lintDocument(readFileSync(absPath, "utf-8"), config, absPath);
}

/**
 * Discover and lint every document under config.paths. Files that cannot be
 * read become warnings instead of results.
 */
export function lintFiles(config: ResolvedConfig, warnings: Warning[] = []): LintRun {
  const files = discoverDocuments(config.paths, config.include, config.exclude, warnings);
  const results: FileResult[] = [];

  for (const file of files) {
    try {
      results.push(lintFile(file, config));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "error", module: "linter", message: `Cannot lint: ${msg}`, file });
    }
  }

  return summarizeRun(results);
}

export function summarizeRun(results: FileResult[]): LintRun {
  let errorCount = 0;
  let warningCount = 0;
  for (const result of results) {
    errorCount += result.errorCount;
    warningCount += result.warningCount;
  }
  return { results, fileCount: results.length, errorCount, warningCount };
}

function compareIssues(a: LintIssue, b: LintIssue): number {
  return (a.line ?? 0) - (b.line ?? 0) || a.ruleId.localeCompare(b.ruleId);
}
