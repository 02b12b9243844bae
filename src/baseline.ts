// src/baseline.ts — Known-issue baseline for `decision-lint check`
// Compares a lint run to a saved snapshot so CI fails only on issues introduced since.
// Fingerprints leave out line numbers; editing text above an issue must not make it "new".

import { relative, sep } from "node:path";
import { z } from "zod";
import type { Baseline, BaselineDiff, BaselineEntry, LintRun } from "./types.js";
import { ConfigError, LINTER_VERSION } from "./types.js";

const baselineSchema = z.object({
  version: z.string(),
  createdAt: z.string(),
  entries: z.array(
    z.object({
      file: z.string(),
      ruleId: z.string(),
      message: z.string(),
    }),
  ),
});

/**
 * Snapshot every issue in the run.
 */
export function createBaseline(run: LintRun, cwd: string = process.cwd()): Baseline {
  return {
    version: LINTER_VERSION,
    createdAt: new Date().toISOString(),
    entries: collectEntries(run, cwd),
  };
}

export function parseBaseline(json: string, source = "baseline"): Baseline {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${source}: ${msg}`, source);
  }
  const result = baselineSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ConfigError(
      `Invalid ${source}: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown shape"}`,
      source,
    );
  }
  return result.data;
}

/**
 * Compare a run to a baseline. Duplicate fingerprints are counted, so a
 * second copy of a known issue is still reported as new.
 */
export function diffAgainstBaseline(
  run: LintRun,
  baseline: Baseline,
  cwd: string = process.cwd(),
): BaselineDiff {
  const remaining = new Map<string, { entry: BaselineEntry; count: number }>();
  for (const entry of baseline.entries) {
    const key = fingerprint(entry);
    const known = remaining.get(key);
    if (known) known.count++;
    else remaining.set(key, { entry, count: 1 });
  }

  const newIssues: BaselineEntry[] = [];
  for (const entry of collectEntries(run, cwd)) {
    const known = remaining.get(fingerprint(entry));
    if (known && known.count > 0) known.count--;
    else newIssues.push(entry);
  }

  const resolvedIssues: BaselineEntry[] = [];
  for (const { entry, count } of remaining.values()) {
    for (let i = 0; i < count; i++) resolvedIssues.push(entry);
  }

  const parts: string[] = [];
  if (newIssues.length > 0) parts.push(`${newIssues.length} new issue${newIssues.length === 1 ? "" : "s"}`);
  if (resolvedIssues.length > 0) parts.push(`${resolvedIssues.length} resolved`);

  return {
    newIssues,
    resolvedIssues,
    summary: parts.length > 0 ? parts.join(", ") : "No changes since baseline",
    hasNewIssues: newIssues.length > 0,
  };
}

function collectEntries(run: LintRun, cwd: string): BaselineEntry[] {
  const entries: BaselineEntry[] = [];
  for (const result of run.results) {
    const file = relative(cwd, result.file).split(sep).join("/");
    for (const issue of result.issues) {
      entries.push({ file, ruleId: issue.ruleId, message: issue.message });
    }
  }
  return entries.sort((a, b) => fingerprint(a).localeCompare(fingerprint(b)));
}

function fingerprint(entry: BaselineEntry): string {
  return `${entry.file}\u0000${entry.ruleId}\u0000${entry.message}`;
}
