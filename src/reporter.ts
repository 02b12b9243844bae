// src/reporter.ts — Text and JSON reports for a lint run

import { relative } from "node:path";
import type { FileResult, LintRun } from "./types.js";

export interface TextReportOptions {
  cwd?: string;
  /** Print each issue's hint on the line below it */
  hints?: boolean;
}

/**
 * Format a lint run in the familiar stylish layout:
 *
 *   docs/decisions/solution-qa.md
 *     42  error  Option "Custom agent" has no cons  option-pros-cons
 *
 *   ✖ 1 problem (1 error, 0 warnings)
 */
export function formatText(run: LintRun, options: TextReportOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const lines: string[] = [];

  for (const result of run.results) {
    if (result.issues.length === 0) continue;
    lines.push(displayPath(result, cwd));

    const locWidth = Math.max(...result.issues.map((i) => location(i.line).length));
    const severityWidth = Math.max(...result.issues.map((i) => i.severity.length));
    for (const issue of result.issues) {
      lines.push(
        `  ${location(issue.line).padStart(locWidth)}  ${issue.severity.padEnd(severityWidth)}  ${issue.message}  ${issue.ruleId}`,
      );
      if (options.hints && issue.hint) {
        lines.push(`  ${" ".repeat(locWidth)}  ${" ".repeat(severityWidth)}  → ${issue.hint}`);
      }
    }
    lines.push("");
  }

  lines.push(summaryLine(run));
  return lines.join("\n");
}

export function summaryLine(run: LintRun): string {
  const problems = run.errorCount + run.warningCount;
  if (problems === 0) {
    return `✔ ${plural(run.fileCount, "file")} checked, no problems`;
  }
  return `✖ ${plural(problems, "problem")} (${plural(run.errorCount, "error")}, ${plural(run.warningCount, "warning")})`;
}

/**
 * JSON report: counts plus per-file issues. The parsed document model is
 * left out; `decision-lint outline` prints it.
 */
export function formatJson(run: LintRun, cwd: string = process.cwd()): string {
  return JSON.stringify(
    {
      fileCount: run.fileCount,
      errorCount: run.errorCount,
      warningCount: run.warningCount,
      results: run.results.map((result) => ({
        file: displayPath(result, cwd),
        errorCount: result.errorCount,
        warningCount: result.warningCount,
        issues: result.issues,
      })),
    },
    null,
    2,
  );
}

/**
 * Errors always fail; warnings fail once they exceed maxWarnings (-1 = unlimited).
 */
export function shouldFail(run: LintRun, maxWarnings: number): boolean {
  if (run.errorCount > 0) return true;
  return maxWarnings >= 0 && run.warningCount > maxWarnings;
}

function displayPath(result: FileResult, cwd: string): string {
  if (result.file.startsWith("<")) return result.file;
  return relative(cwd, result.file) || result.file;
}

function location(line: number | undefined): string {
  return line === undefined ? "-" : String(line);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
