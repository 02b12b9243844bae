// src/bin/init.ts — Scaffold a new decision record
// Writes a document with every canonical section that passes the default rules.

import { resolve, relative, dirname } from "node:path";
import { existsSync, writeFileSync, mkdirSync } from "node:fs";
import { renderDecisionRecord, decisionRecordFilename } from "../templates/decision-record.js";
import { DEFAULT_CONFIG } from "../config.js";
import { isAllowedStatus } from "../front-matter.js";
import type { ResolvedConfig } from "../types.js";

export interface InitOptions {
  file?: string;
  title?: string;
  author?: string;
  status?: string;
  options?: number;
  force?: boolean;
  date?: string;
  cwd?: string;
  /** Statuses and option counts the scaffold must satisfy */
  config?: Pick<ResolvedConfig, "frontMatter" | "options">;
}

export interface InitResult {
  written: boolean;
  path: string;
}

const DEFAULT_TITLE = "Untitled Decision";
const DEFAULT_OPTION_COUNT = 2;
const DEFAULT_STATUS = "Proposed";

function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

export function runInit(options: InitOptions = {}): InitResult {
  const cwd = options.cwd ?? process.cwd();
  const title = options.title ?? DEFAULT_TITLE;
  const outPath = resolve(cwd, options.file ?? decisionRecordFilename(title));

  const config = options.config ?? DEFAULT_CONFIG;

  if (options.status !== undefined && !isAllowedStatus(options.status, config.frontMatter.statuses)) {
    stderr(`  Status "${options.status}" is not one of: ${config.frontMatter.statuses.join(", ")}`);
    return { written: false, path: outPath };
  }

  if (existsSync(outPath) && !options.force) {
    stderr(`  ${relative(cwd, outPath)} already exists. Use --force to overwrite.`);
    return { written: false, path: outPath };
  }

  const content = renderDecisionRecord({
    title,
    date: options.date ?? new Date().toISOString().slice(0, 10),
    author: options.author ?? process.env.GIT_AUTHOR_NAME ?? process.env.USER ?? "Unknown",
    status: options.status ?? defaultStatus(config.frontMatter.statuses),
    options: optionCount(options.options, config.options),
  });

  mkdirSync(dirname(outPath), { recursive: true });
  writeFileSync(outPath, content);
  stderr(`  Written: ${relative(cwd, outPath)}`);
  stderr(`  Fill in the placeholders, then run \`decision-lint ${relative(cwd, outPath)}\`.`);
  return { written: true, path: outPath };
}

function defaultStatus(allowed: string[]): string {
  return isAllowedStatus(DEFAULT_STATUS, allowed) ? DEFAULT_STATUS : allowed[0];
}

/**
 * Option stubs to write: the configured exact count when there is one,
 * otherwise the request raised to the configured minimum.
 */
function optionCount(requested: number | undefined, limits: ResolvedConfig["options"]): number {
  if (limits.expected !== undefined) return limits.expected;
  const count = Math.max(limits.min, requested ?? DEFAULT_OPTION_COUNT);
  if (requested !== undefined && count !== requested) {
    stderr(`  Writing ${count} option stubs; at least ${limits.min} are required.`);
  }
  return count;
}
