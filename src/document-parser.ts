// src/document-parser.ts — Decision document model
// Scans a Markdown decision record and lifts the parts the rules check:
// options with pros/cons, the comparison matrix, phases, open questions, references.

import type {
  Block,
  CodeBlock,
  ComparisonMatrix,
  DecisionDocument,
  EvaluatedOption,
  HeadingBlock,
  ListEntry,
  Phase,
  Recommendation,
  Reference,
  Section,
  SectionKind,
  TableBlock,
  ArchitectureDiagram,
} from "./types.js";
import { scanMarkdown, stripInline, extractLinks, extractCodeSpans, isHttpUrl } from "./markdown-scanner.js";
import { parseFrontMatter } from "./front-matter.js";
import { buildSectionTree, flattenSection, findSections } from "./sections.js";

export interface ParseOptions {
  file?: string;
  aliases?: Partial<Record<SectionKind, string[]>>;
}

const PRO_LABELS = new Set(["pros", "pro", "advantages", "strengths", "benefits"]);
const CON_LABELS = new Set(["cons", "con", "disadvantages", "weaknesses", "drawbacks", "risks"]);
const TOOL_LABELS = new Set(["tools", "tool", "tooling", "mcp tools", "key tools"]);
const PURPOSE_LABELS = new Set([
  "purpose",
  "goal",
  "goals",
  "objective",
  "objectives",
  "focus",
  "outcome",
  "deliverable",
  "deliverables",
  "description",
]);

const OPTION_PREFIX_RE = /^option\s+([A-Za-z0-9]+)\s*(?:[:.)\-–—]\s*)?(.*)$/i;
const PHASE_COLUMN_RE = /^(?:phase|stage|milestone|step)s?\b/;
const TOOLS_COLUMN_RE = /^(?:tools?|tooling|mcp tools?|key tools|components?)$/;
const PURPOSE_COLUMN_RE = /^(?:purpose|goals?|objectives?|description|deliverables?|focus|outcome)$/;
const EMPTY_TOOL_RE = /^(?:none|n\/a|tbd|-|—|–)$/i;
const INTERNAL_RE = /\binternal\b/i;

// ─── Entry point ─────────────────────────────────────────────────────────────

/**
 * Parse a decision record into its document model.
 */
export function parseDecisionDocument(
  content: string,
  options: ParseOptions = {},
): DecisionDocument {
  const blocks = scanMarkdown(content);
  const lineCount = content.replace(/\r\n?/g, "\n").split("\n").length;
  const sections = buildSectionTree(blocks, options.aliases, lineCount);

  const titleBlock = blocks.find(
    (b): b is HeadingBlock => b.type === "heading" && b.level === 1,
  );

  const first = (kind: SectionKind): Section | undefined => findSections(sections, kind)[0];

  return {
    file: options.file,
    title: titleBlock ? { text: stripInline(titleBlock.text), line: titleBlock.line } : undefined,
    frontMatter: parseFrontMatter(blocks),
    sections,
    options: parseOptions(first("options")),
    matrix: parseMatrix(first("comparison")),
    recommendation: parseRecommendation(first("recommendation")),
    diagrams: parseDiagrams(first("architecture")),
    phases: parsePhases(first("implementation-plan")),
    openQuestions: parseListEntries(first("open-questions")),
    references: parseReferences(first("references")),
    unclosedFences: blocks.filter((b): b is CodeBlock => b.type === "code" && !b.closed),
  };
}

// ─── Markers ("**Pros:**", "Tools: `a`, `b`") ───────────────────────────────

interface Marker {
  label: string;
  rest: string;
}

/**
 * Split "Label: rest" text. Without a colon the whole text is the label.
 * The label is normalized; the rest keeps its inline markup.
 */
export function splitMarker(text: string): Marker {
  const colon = text.indexOf(":");
  if (colon === -1) return { label: normalizeLabel(text), rest: "" };
  return {
    label: normalizeLabel(text.slice(0, colon)),
    rest: text.slice(colon + 1).replace(/^\s*(?:\*\*|__)/, "").trim(),
  };
}

function normalizeLabel(text: string): string {
  return stripInline(text)
    .replace(/[*_]/g, "")
    .replace(/^[^\p{L}]+/u, "")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

// ─── Options ─────────────────────────────────────────────────────────────────

function parseOptions(section: Section | undefined): EvaluatedOption[] {
  if (!section) return [];
  return section.children.map(parseOption);
}

function parseOption(section: Section): EvaluatedOption {
  const prefix = OPTION_PREFIX_RE.exec(section.title);
  const rest = prefix ? prefix[2].trim() : "";
  const option: EvaluatedOption = {
    id: prefix ? prefix[1] : undefined,
    name: rest || section.title,
    title: section.title,
    line: section.line,
    pros: [],
    cons: [],
  };

  let bucket: ListEntry[] | undefined;
  let fromHeading = false;
  let markerDepth = -1;

  const bucketFor = (label: string): ListEntry[] | undefined => {
    if (PRO_LABELS.has(label)) return option.pros;
    if (CON_LABELS.has(label)) return option.cons;
    return undefined;
  };

  for (const block of flattenSection(section)) {
    switch (block.type) {
      case "heading": {
        bucket = bucketFor(splitMarker(block.text).label);
        fromHeading = bucket !== undefined;
        markerDepth = -1;
        break;
      }
      case "paragraph": {
        // Plain lines continue a marker earlier in the same paragraph, or a Pros/Cons heading
        let current = fromHeading ? bucket : undefined;
        for (const line of block.lines) {
          const marker = splitMarker(line.text);
          const target = bucketFor(marker.label);
          if (target) {
            current = target;
            fromHeading = false;
            if (marker.rest) current.push({ text: stripInline(marker.rest), line: line.line });
          } else if (current) {
            const text = stripInline(line.text);
            if (text) current.push({ text, line: line.line });
          }
        }
        bucket = current;
        markerDepth = -1;
        break;
      }
      case "list-item": {
        const marker = splitMarker(block.text);
        const target = bucketFor(marker.label);
        if (target) {
          bucket = target;
          fromHeading = false;
          markerDepth = block.depth;
          if (marker.rest) bucket.push({ text: stripInline(marker.rest), line: block.line });
        } else if (bucket && block.depth > markerDepth) {
          const text = stripInline(block.text);
          if (text) bucket.push({ text, line: block.line });
        } else {
          bucket = undefined;
        }
        break;
      }
      case "rule":
        bucket = undefined;
        fromHeading = false;
        break;
      default:
        break;
    }
  }

  return option;
}

// ─── Comparison matrix ───────────────────────────────────────────────────────

function parseMatrix(section: Section | undefined): ComparisonMatrix | undefined {
  if (!section) return undefined;
  const table = flattenSection(section).find((b): b is TableBlock => b.type === "table");
  if (!table) return undefined;

  return {
    criterionLabel: stripInline(table.header[0] ?? ""),
    columns: table.header.slice(1).map(stripInline),
    headerLength: table.header.length,
    rows: table.rows.map((row) => ({
      criterion: stripInline(row.cells[0] ?? ""),
      cells: row.cells.slice(1).map(stripInline),
      line: row.line,
    })),
    line: table.line,
  };
}

// ─── Recommendation + architecture ──────────────────────────────────────────

function parseRecommendation(section: Section | undefined): Recommendation | undefined {
  if (!section) return undefined;
  const parts: string[] = [];
  for (const block of flattenSection(section)) {
    if (block.type === "paragraph" || block.type === "list-item" || block.type === "quote") {
      parts.push(stripInline(block.text));
    } else if (block.type === "heading") {
      parts.push(stripInline(block.text));
    }
  }
  return { text: parts.filter(Boolean).join(" "), line: section.line };
}

function parseDiagrams(section: Section | undefined): ArchitectureDiagram[] {
  if (!section) return [];
  return flattenSection(section)
    .filter((b): b is CodeBlock => b.type === "code")
    .map((b) => ({ lang: b.lang, content: b.content, line: b.line }));
}

// ─── Implementation plan ─────────────────────────────────────────────────────

function parsePhases(section: Section | undefined): Phase[] {
  if (!section) return [];
  const table = flattenSection(section).find(
    (b): b is TableBlock =>
      b.type === "table" && b.header.some((h) => PHASE_COLUMN_RE.test(normalizeLabel(h))),
  );
  if (table) return phasesFromTable(table);
  return section.children.map(phaseFromSection);
}

function phasesFromTable(table: TableBlock): Phase[] {
  const columns = table.header.map(normalizeLabel);
  const phaseCol = columns.findIndex((c) => PHASE_COLUMN_RE.test(c));
  const toolsCol = columns.findIndex((c) => TOOLS_COLUMN_RE.test(c));
  const purposeCol = columns.findIndex((c) => PURPOSE_COLUMN_RE.test(c));

  return table.rows.map((row) => ({
    name: stripInline(row.cells[phaseCol] ?? ""),
    tools: toolsCol === -1 ? [] : parseToolList(row.cells[toolsCol] ?? ""),
    purpose: purposeCol === -1 ? "" : stripInline(row.cells[purposeCol] ?? ""),
    line: row.line,
  }));
}

function phaseFromSection(section: Section): Phase {
  const blocks = flattenSection(section);
  const tools: string[] = [];
  let purpose = "";
  let firstPlain = "";
  let collecting: "tools" | "purpose" | undefined;
  let markerDepth = -1;

  const consume = (text: string, depth: number, isListItem: boolean): void => {
    const marker = splitMarker(text);
    if (TOOL_LABELS.has(marker.label)) {
      tools.push(...parseToolList(marker.rest));
      collecting = marker.rest ? undefined : "tools";
      markerDepth = depth;
      return;
    }
    if (PURPOSE_LABELS.has(marker.label)) {
      if (marker.rest && !purpose) purpose = stripInline(marker.rest);
      collecting = marker.rest ? undefined : "purpose";
      markerDepth = depth;
      return;
    }
    if (collecting && (!isListItem || depth > markerDepth)) {
      if (collecting === "tools") tools.push(...parseToolList(text));
      else if (!purpose) purpose = stripInline(text);
      if (!isListItem) collecting = undefined;
      return;
    }
    collecting = undefined;
    if (!firstPlain) firstPlain = stripInline(text);
  };

  for (const block of blocks) {
    if (block.type === "paragraph") {
      for (const line of block.lines) consume(line.text, -1, false);
    } else if (block.type === "list-item") {
      consume(block.text, block.depth, true);
    } else if (block.type === "heading") {
      const marker = splitMarker(block.text);
      collecting = TOOL_LABELS.has(marker.label)
        ? "tools"
        : PURPOSE_LABELS.has(marker.label)
          ? "purpose"
          : undefined;
      markerDepth = -1;
    }
  }

  if (tools.length === 0) {
    for (const block of blocks) {
      if (block.type === "paragraph" || block.type === "list-item") {
        for (const span of extractCodeSpans(block.text)) {
          if (!tools.includes(span)) tools.push(span);
        }
      }
    }
  }

  return {
    name: section.title,
    tools,
    purpose: purpose || firstPlain,
    line: section.line,
  };
}

/**
 * Tool names from a cell or marker: code spans when present, otherwise
 * the text split on commas, semicolons, "+" and "and".
 */
export function parseToolList(text: string): string[] {
  const spans = extractCodeSpans(text);
  const names = spans.length > 0
    ? spans
    : stripInline(text).split(/\s*[,;+]\s*|\s+and\s+/);
  return names.map((n) => n.trim()).filter((n) => n && !EMPTY_TOOL_RE.test(n));
}

// ─── Open questions + references ─────────────────────────────────────────────

function topLevelItems(section: Section): Block[] {
  return flattenSection(section).filter((b) => b.type === "list-item" && b.depth === 0);
}

function parseListEntries(section: Section | undefined): ListEntry[] {
  if (!section) return [];
  const entries: ListEntry[] = [];
  for (const block of topLevelItems(section)) {
    if (block.type === "list-item") entries.push({ text: stripInline(block.text), line: block.line });
  }
  return entries;
}

function parseReferences(section: Section | undefined): Reference[] {
  if (!section) return [];
  const references: Reference[] = [];
  for (const block of topLevelItems(section)) {
    if (block.type !== "list-item") continue;
    const text = stripInline(block.text);
    // Any http(s) link makes the reference resolvable; otherwise keep the first target
    const links = extractLinks(block.text);
    const link = links.find((l) => isHttpUrl(l.url)) ?? links[0];
    references.push({
      text,
      line: block.line,
      url: link?.url,
      internal: INTERNAL_RE.test(text),
    });
  }
  return references;
}
