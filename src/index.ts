// src/index.ts — Library API
// Two entry points: lint() over files on disk and lintDocument() over a string.

import type { LintRun, ResolvedConfig, Warning } from "./types.js";
import { DEFAULT_CONFIG } from "./config.js";
import { lintFiles } from "./linter.js";

// Re-export all public types
export type {
  Block,
  DecisionDocument,
  Section,
  SectionKind,
  FrontMatter,
  FrontMatterField,
  EvaluatedOption,
  ListEntry,
  ComparisonMatrix,
  MatrixRow,
  Recommendation,
  ArchitectureDiagram,
  Phase,
  Reference,
  LintRule,
  RuleFinding,
  RuleContext,
  LintIssue,
  FileResult,
  LintRun,
  Severity,
  SeveritySetting,
  OutputFormat,
  ResolvedConfig,
  Warning,
  Baseline,
  BaselineEntry,
  BaselineDiff,
} from "./types.js";

export { FileNotFoundError, ConfigError, LINTER_VERSION, SECTION_KINDS } from "./types.js";
export { scanMarkdown, stripInline, extractLinks } from "./markdown-scanner.js";
export { parseDecisionDocument } from "./document-parser.js";
export { SECTION_TITLES, SECTION_ALIASES, classifySection } from "./sections.js";
export { ALL_RULES, getRule } from "./rule-registry.js";
export { lintDocument, lintFile, lintFiles } from "./linter.js";
export { formatText, formatJson, shouldFail } from "./reporter.js";
export { createBaseline, parseBaseline, diffAgainstBaseline } from "./baseline.js";
export { renderDecisionRecord, decisionRecordFilename } from "./templates/decision-record.js";
export { DEFAULT_CONFIG } from "./config.js";

export type LintOptions = Partial<Omit<ResolvedConfig, "sections" | "frontMatter" | "options" | "output">> & {
  paths: string[];
  sections?: Partial<ResolvedConfig["sections"]>;
  frontMatter?: Partial<ResolvedConfig["frontMatter"]>;
  options?: Partial<ResolvedConfig["options"]>;
  output?: Partial<ResolvedConfig["output"]>;
};

/**
 * Build a full config from partial options, filling the rest from defaults.
 * Fields set to undefined fall back to their defaults as well.
 */
export function createConfig(options: Partial<LintOptions> = {}): ResolvedConfig {
  return {
    paths: options.paths ?? DEFAULT_CONFIG.paths,
    include: options.include ?? DEFAULT_CONFIG.include,
    exclude: options.exclude ?? DEFAULT_CONFIG.exclude,
    rules: { ...DEFAULT_CONFIG.rules, ...options.rules },
    sections: {
      required: options.sections?.required ?? DEFAULT_CONFIG.sections.required,
      aliases: options.sections?.aliases ?? DEFAULT_CONFIG.sections.aliases,
    },
    frontMatter: {
      required: options.frontMatter?.required ?? DEFAULT_CONFIG.frontMatter.required,
      statuses: options.frontMatter?.statuses ?? DEFAULT_CONFIG.frontMatter.statuses,
    },
    options: {
      min: options.options?.min ?? DEFAULT_CONFIG.options.min,
      expected: options.options?.expected ?? DEFAULT_CONFIG.options.expected,
    },
    output: {
      format: options.output?.format ?? DEFAULT_CONFIG.output.format,
    },
    maxWarnings: options.maxWarnings ?? DEFAULT_CONFIG.maxWarnings,
    verbose: options.verbose ?? DEFAULT_CONFIG.verbose,
  };
}

/**
 * Discover and lint decision documents under the given paths.
 */
export function lint(options: LintOptions, warnings: Warning[] = []): LintRun {
  return lintFiles(createConfig(options), warnings);
}
