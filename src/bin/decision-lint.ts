#!/usr/bin/env node
// CLI entry point for decision-lint

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { LINTER_VERSION, FileNotFoundError } from "../types.js";
import type { Warning } from "../types.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import { lintFiles } from "../linter.js";
import { parseDecisionDocument } from "../document-parser.js";
import { formatText, formatJson, shouldFail } from "../reporter.js";

const HELP_TEXT = `
decision-lint v${LINTER_VERSION}

Usage:
  decision-lint [paths...]               Lint decision records (default: current directory)
  decision-lint outline <file>           Print the parsed document model as JSON
  decision-lint init [file]              Scaffold a new decision record
  decision-lint check [paths...]         Fail only on issues missing from the baseline (for CI)

Options:
  --format, -f         Report format: text (default) or json
  --config, -c         Path to config file (default: decision-lint.config.json)
  --rule <id=level>    Override a rule: error, warn or off (repeatable)
  --max-warnings <n>   Fail when warnings exceed n
  --hints              Print a fix hint under each issue
  --quiet, -q          Suppress warnings
  --verbose, -v        Print timing and hints
  --version            Print the version
  --help, -h           Show this help text

init:
  --title <text>       Document title (default: "Untitled Decision")
  --author <name>      Author line (default: $GIT_AUTHOR_NAME or $USER)
  --status <status>    Status line (default: Proposed)
  --options <n>        Number of option stubs (default: 2)
  --force              Overwrite an existing file

check:
  --baseline <path>    Baseline file (default: .decision-lint-baseline.json)
  --save-baseline      Record the current issues as the baseline

Environment Variables:
  DECISION_LINT_FORMAT Default report format when no flag or config sets one

Examples:
  npx decision-lint docs/decisions
  npx decision-lint docs/decisions/solution-qa.md --format json
  npx decision-lint init docs/decisions/solution-qa.md --title "Solution QA Approach" --options 4
  npx decision-lint check docs/decisions --save-baseline
`.trim();

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${w.file ? ` (${w.file})` : ""}\n`);
  }
}

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    return 0;
  }

  if (args.version) {
    process.stdout.write(LINTER_VERSION + "\n");
    return 0;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);

  // Handle "init" subcommand — scaffold a new document
  if (args.command === "init") {
    printWarnings(warnings, args.quiet);
    const { runInit } = await import("./init.js");
    const result = runInit({
      file: args.paths[0],
      title: args.title,
      author: args.author,
      status: args.status,
      options: args.options,
      force: args.force,
      config,
    });
    return result.written ? 0 : 1;
  }

  // Handle "outline" subcommand — dump the parsed model
  if (args.command === "outline") {
    printWarnings(warnings, args.quiet);
    const file = args.paths[0];
    if (!file) {
      process.stderr.write("[error] outline: a file path is required\n");
      return 1;
    }
    const absPath = resolve(file);
    if (!existsSync(absPath)) throw new FileNotFoundError(absPath);
    const document = parseDecisionDocument(readFileSync(absPath, "utf-8"), {
      file: absPath,
      aliases: config.sections.aliases,
    });
    process.stdout.write(JSON.stringify(document, null, 2) + "\n");
    return 0;
  }

  // Handle "check" subcommand — baseline comparison
  if (args.command === "check") {
    const { runCheck } = await import("./check.js");
    const failed = runCheck(config, {
      baseline: args.baseline,
      saveBaseline: args.saveBaseline,
      quiet: args.quiet,
    }, warnings);
    printWarnings(warnings, args.quiet);
    return failed ? 1 : 0;
  }

  const start = performance.now();
  const run = lintFiles(config, warnings);
  printWarnings(warnings, args.quiet);

  if (args.verbose) {
    const ms = Math.round(performance.now() - start);
    process.stderr.write(`[INFO] Linted ${run.fileCount} file(s) in ${ms}ms\n`);
  }

  if (run.fileCount === 0) {
    process.stderr.write(`[error] No decision records found in: ${config.paths.join(", ")}\n`);
    return 1;
  }

  const report = config.output.format === "json"
    ? formatJson(run)
    : formatText(run, { hints: args.hints || args.verbose });
  process.stdout.write(report + "\n");

  return shouldFail(run, config.maxWarnings) ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Fatal error: ${msg}\n`);
    process.exitCode = 1;
  });
