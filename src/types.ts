// src/types.ts — ALL shared types for the decision-record linter

// ─── Markdown blocks ─────────────────────────────────────────────────────────

export interface HeadingBlock {
  type: "heading";
  level: number;
  text: string;
  line: number;
}

export interface ListItemBlock {
  type: "list-item";
  ordered: boolean;
  depth: number;
  marker: string;
  text: string;
  line: number;
}

export interface TableRow {
  cells: string[];
  line: number;
}

export interface TableBlock {
  type: "table";
  header: string[];
  rows: TableRow[];
  line: number;
}

export interface CodeBlock {
  type: "code";
  lang: string;
  content: string;
  line: number;
  endLine: number;
  closed: boolean;
}

export interface SourceLine {
  text: string;
  line: number;
}

export interface ParagraphBlock {
  type: "paragraph";
  lines: SourceLine[];
  text: string;
  line: number;
}

export interface QuoteBlock {
  type: "quote";
  text: string;
  line: number;
}

export interface RuleBlock {
  type: "rule";
  line: number;
}

export type Block =
  | HeadingBlock
  | ListItemBlock
  | TableBlock
  | CodeBlock
  | ParagraphBlock
  | QuoteBlock
  | RuleBlock;

// ─── Document model ──────────────────────────────────────────────────────────

export const SECTION_KINDS = [
  "overview",
  "requirements",
  "options",
  "comparison",
  "recommendation",
  "architecture",
  "implementation-plan",
  "decision-summary",
  "open-questions",
  "references",
] as const;

export type SectionKind = (typeof SECTION_KINDS)[number];

export interface Section {
  title: string;
  kind?: SectionKind;
  level: number;
  line: number;
  endLine: number;
  /** Blocks before the first child heading */
  blocks: Block[];
  children: Section[];
}

export interface FrontMatterField {
  key: string;
  value: string;
  line: number;
}

export interface FrontMatter {
  fields: FrontMatterField[];
  date?: FrontMatterField;
  status?: FrontMatterField;
  author?: FrontMatterField;
}

export interface ListEntry {
  text: string;
  line: number;
}

export interface EvaluatedOption {
  /** "1" for "Option 1: Codex CLI", undefined when the heading has no prefix */
  id?: string;
  name: string;
  title: string;
  line: number;
  pros: ListEntry[];
  cons: ListEntry[];
}

export interface MatrixRow {
  criterion: string;
  cells: string[];
  line: number;
}

export interface ComparisonMatrix {
  criterionLabel: string;
  columns: string[];
  headerLength: number;
  rows: MatrixRow[];
  line: number;
}

export interface Recommendation {
  text: string;
  line: number;
}

export interface ArchitectureDiagram {
  lang: string;
  content: string;
  line: number;
}

export interface Phase {
  name: string;
  tools: string[];
  purpose: string;
  line: number;
}

export interface Reference {
  text: string;
  line: number;
  url?: string;
  internal: boolean;
}

export interface DecisionDocument {
  file?: string;
  title?: { text: string; line: number };
  frontMatter: FrontMatter;
  sections: Section[];
  options: EvaluatedOption[];
  matrix?: ComparisonMatrix;
  recommendation?: Recommendation;
  diagrams: ArchitectureDiagram[];
  phases: Phase[];
  openQuestions: ListEntry[];
  references: Reference[];
  unclosedFences: CodeBlock[];
}

// ─── Config ──────────────────────────────────────────────────────────────────

export type Severity = "error" | "warn";
export type SeveritySetting = Severity | "off";

export type OutputFormat = "text" | "json";

export interface ResolvedConfig {
  paths: string[];
  include: string[];
  exclude: string[];
  rules: Record<string, SeveritySetting>;
  sections: {
    required: SectionKind[];
    aliases: Partial<Record<SectionKind, string[]>>;
  };
  frontMatter: {
    required: string[];
    statuses: string[];
  };
  options: {
    min: number;
    expected?: number;
  };
  output: {
    format: OutputFormat;
  };
  maxWarnings: number;
  verbose: boolean;
}

// ─── Warnings (passed to all modules) ───────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Rules & results ─────────────────────────────────────────────────────────

export interface RuleFinding {
  message: string;
  line?: number;
  hint?: string;
}

export interface RuleContext {
  config: ResolvedConfig;
}

export interface LintRule {
  id: string;
  description: string;
  defaultSeverity: Severity;
  check(doc: DecisionDocument, context: RuleContext): RuleFinding[];
}

export interface LintIssue {
  ruleId: string;
  severity: Severity;
  message: string;
  line?: number;
  hint?: string;
}

export interface FileResult {
  file: string;
  document: DecisionDocument;
  issues: LintIssue[];
  errorCount: number;
  warningCount: number;
}

export interface LintRun {
  results: FileResult[];
  fileCount: number;
  errorCount: number;
  warningCount: number;
}

// ─── Baseline ────────────────────────────────────────────────────────────────

export interface BaselineEntry {
  file: string;
  ruleId: string;
  message: string;
}

export interface Baseline {
  version: string;
  createdAt: string;
  entries: BaselineEntry[];
}

export interface BaselineDiff {
  newIssues: BaselineEntry[];
  resolvedIssues: BaselineEntry[];
  summary: string;
  hasNewIssues: boolean;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    if (cause) this.cause = cause;
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const LINTER_VERSION = "0.3.0";

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  "dist",
  "build",
  "coverage",
  ".git",
] as const;

export const MARKDOWN_EXTENSIONS = /\.(md|markdown)$/i;
