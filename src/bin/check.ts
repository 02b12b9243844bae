// src/bin/check.ts — Baseline check for CI
// Lints the configured paths and fails only on issues missing from the saved baseline.

import { resolve, relative, dirname } from "node:path";
import { existsSync, readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { lintFiles } from "../linter.js";
import { createBaseline, parseBaseline, diffAgainstBaseline } from "../baseline.js";
import type { Baseline, ResolvedConfig, Warning } from "../types.js";

export const DEFAULT_BASELINE = ".decision-lint-baseline.json";

export interface CheckOptions {
  baseline?: string;
  saveBaseline?: boolean;
  quiet?: boolean;
  cwd?: string;
}

function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

/**
 * Run the baseline check. Returns true when the check fails (for exit code).
 */
export function runCheck(
  config: ResolvedConfig,
  options: CheckOptions = {},
  warnings: Warning[] = [],
): boolean {
  const cwd = options.cwd ?? process.cwd();
  const baselinePath = resolve(cwd, options.baseline ?? DEFAULT_BASELINE);
  const displayPath = relative(cwd, baselinePath);

  const run = lintFiles(config, warnings);

  if (run.fileCount === 0) {
    stderr(`  No decision records found in: ${config.paths.join(", ")}`);
    return true;
  }

  if (options.saveBaseline) {
    const baseline = createBaseline(run, cwd);
    mkdirSync(dirname(baselinePath), { recursive: true });
    writeFileSync(baselinePath, JSON.stringify(baseline, null, 2) + "\n");
    stderr(`  Baseline saved: ${displayPath} (${baseline.entries.length} known issues)`);
    return false;
  }

  if (!existsSync(baselinePath)) {
    stderr(`  No baseline found at ${displayPath}`);
    stderr(`  Run with --save-baseline first to create one.`);
    return true;
  }

  let baseline: Baseline;
  try {
    baseline = parseBaseline(readFileSync(baselinePath, "utf-8"), displayPath);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    stderr(`  ${msg}`);
    return true;
  }

  const diff = diffAgainstBaseline(run, baseline, cwd);

  if (diff.hasNewIssues) {
    stderr(`  New issues since baseline: ${diff.summary}`);
    for (const issue of diff.newIssues) {
      stderr(`    ${issue.file}: ${issue.message} (${issue.ruleId})`);
    }
  } else if (!options.quiet) {
    stderr(`  ${diff.summary}.`);
  }

  if (diff.resolvedIssues.length > 0 && !options.quiet) {
    stderr(`  Run with --save-baseline to drop ${diff.resolvedIssues.length} resolved issue(s) from the baseline.`);
  }

  return diff.hasNewIssues;
}
