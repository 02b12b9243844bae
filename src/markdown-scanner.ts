// src/markdown-scanner.ts — Line-level Markdown scanner
// Turns a document into line-numbered blocks. Covers the constructs decision
// records use (headings, lists, pipe tables, fences, quotes), not full CommonMark.

import type {
  Block,
  ListItemBlock,
  ParagraphBlock,
  TableRow,
} from "./types.js";

const FENCE_OPEN_RE = /^\s*(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE_RE = /^\s*(`{3,}|~{3,})\s*$/;
const HEADING_RE = /^\s{0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;
const THEMATIC_BREAK_RE = /^\s{0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const LIST_ITEM_RE = /^(\s*)([-*+]|\d{1,9}[.)])[ \t]+(.*)$/;
const QUOTE_RE = /^\s{0,3}>\s?(.*)$/;
const TABLE_DELIMITER_RE = /^\s*\|?\s*:?-+:?\s*(?:\|\s*:?-+:?\s*)*\|?\s*$/;

// ─── Block scanning ──────────────────────────────────────────────────────────

/**
 * Scan Markdown content into blocks. Line numbers are 1-based.
 */
export function scanMarkdown(content: string): Block[] {
  const lines = content.replace(/\r\n?/g, "\n").split("\n");
  const blocks: Block[] = [];

  let paragraph: ParagraphBlock | undefined;
  let lastItem: ListItemBlock | undefined;
  let afterBlank = false;
  let i = 0;

  while (i < lines.length) {
    const raw = lines[i];
    const lineNo = i + 1;
    const trimmed = raw.trim();

    if (trimmed === "") {
      paragraph = undefined;
      afterBlank = true;
      i++;
      continue;
    }

    const fence = openFence(raw);
    if (fence) {
      const marker = fence[1];
      const lang = fence[2].trim().split(/\s+/)[0];
      const body: string[] = [];
      let j = i + 1;
      let closed = false;
      while (j < lines.length) {
        const close = FENCE_CLOSE_RE.exec(lines[j]);
        if (close && close[1][0] === marker[0] && close[1].length >= marker.length) {
          closed = true;
          break;
        }
        body.push(lines[j]);
        j++;
      }
      blocks.push({
        type: "code",
        lang,
        content: body.join("\n"),
        line: lineNo,
        endLine: closed ? j + 1 : lines.length,
        closed,
      });
      paragraph = undefined;
      lastItem = undefined;
      afterBlank = false;
      i = closed ? j + 1 : j;
      continue;
    }

    const heading = HEADING_RE.exec(raw);
    if (heading) {
      const text = (heading[2] ?? "").replace(/(?:^|\s+)#+$/, "").trim();
      blocks.push({ type: "heading", level: heading[1].length, text, line: lineNo });
      paragraph = undefined;
      lastItem = undefined;
      afterBlank = false;
      i++;
      continue;
    }

    if (THEMATIC_BREAK_RE.test(raw)) {
      blocks.push({ type: "rule", line: lineNo });
      paragraph = undefined;
      lastItem = undefined;
      afterBlank = false;
      i++;
      continue;
    }

    if (isTableStart(lines, i)) {
      const header = splitTableRow(raw);
      const rows: TableRow[] = [];
      let j = i + 2;
      while (j < lines.length && lines[j].trim() !== "" && lines[j].includes("|") && !openFence(lines[j])) {
        rows.push({ cells: splitTableRow(lines[j]), line: j + 1 });
        j++;
      }
      blocks.push({ type: "table", header, rows, line: lineNo });
      paragraph = undefined;
      lastItem = undefined;
      afterBlank = false;
      i = j;
      continue;
    }

    const quote = QUOTE_RE.exec(raw);
    if (quote) {
      const parts = [quote[1].trim()];
      let j = i + 1;
      let next: RegExpExecArray | null;
      while (j < lines.length && (next = QUOTE_RE.exec(lines[j])) !== null) {
        parts.push(next[1].trim());
        j++;
      }
      blocks.push({ type: "quote", text: parts.filter(Boolean).join(" "), line: lineNo });
      paragraph = undefined;
      lastItem = undefined;
      afterBlank = false;
      i = j;
      continue;
    }

    const item = LIST_ITEM_RE.exec(raw);
    if (item) {
      const marker = item[2];
      const block: ListItemBlock = {
        type: "list-item",
        ordered: /^\d/.test(marker),
        depth: Math.floor(indentWidth(item[1]) / 2),
        marker,
        text: item[3].trim(),
        line: lineNo,
      };
      blocks.push(block);
      lastItem = block;
      paragraph = undefined;
      afterBlank = false;
      i++;
      continue;
    }

    // Plain text: lazy list continuation, paragraph continuation, or a new paragraph
    if (lastItem && (!afterBlank || indentWidth(raw) >= 2)) {
      lastItem.text = `${lastItem.text} ${trimmed}`;
    } else if (paragraph) {
      paragraph.lines.push({ text: trimmed, line: lineNo });
      paragraph.text = `${paragraph.text} ${trimmed}`;
    } else {
      paragraph = {
        type: "paragraph",
        lines: [{ text: trimmed, line: lineNo }],
        text: trimmed,
        line: lineNo,
      };
      blocks.push(paragraph);
      lastItem = undefined;
    }
    afterBlank = false;
    i++;
  }

  return blocks;
}

/**
 * A backtick run whose info string holds another backtick is an inline code
 * span ("```npm test``` runs it"), not a fence.
 */
function openFence(line: string): RegExpExecArray | null {
  const fence = FENCE_OPEN_RE.exec(line);
  if (fence && fence[1][0] === "`" && fence[2].includes("`")) return null;
  return fence;
}

function isTableStart(lines: string[], index: number): boolean {
  if (index + 1 >= lines.length) return false;
  const next = lines[index + 1];
  return lines[index].includes("|") && next.includes("|") && TABLE_DELIMITER_RE.test(next);
}

function indentWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    if (ch === " ") width++;
    else if (ch === "\t") width += 4;
    else break;
  }
  return width;
}

/**
 * Split a pipe-table row into trimmed cells. Edge pipes are dropped and `\|`
 * stays inside its cell as a literal pipe.
 */
export function splitTableRow(line: string): string[] {
  let body = line.trim();
  if (body.startsWith("|")) body = body.slice(1);
  if (body.endsWith("|") && !body.endsWith("\\|")) body = body.slice(0, -1);

  const cells: string[] = [];
  let current = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === "\\" && body[i + 1] === "|") {
      current += "|";
      i++;
    } else if (ch === "|") {
      cells.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  cells.push(current.trim());
  return cells;
}

// ─── Inline helpers ──────────────────────────────────────────────────────────

/**
 * Reduce inline Markdown to its visible text.
 */
export function stripInline(text: string): string {
  return text
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/<((?:https?|mailto):[^>\s]+)>/g, "$1")
    .replace(/`+([^`]*)`+/g, "$1")
    .replace(/(\*\*|__)(.+?)\1/g, "$2")
    .replace(/(^|[^\w*])\*(?!\s)([^*]+?)\*(?!\w)/g, "$1$2")
    .replace(/(^|[^\w_])_(?!\s)([^_]+?)_(?!\w)/g, "$1$2")
    .replace(/~~(.+?)~~/g, "$1")
    .replace(/\s+/g, " ")
    .trim();
}

export interface InlineLink {
  label: string;
  url: string;
}

const LINK_RE =
  /\[([^\]]*)\]\(\s*<?([^)\s>]+)>?(?:\s+"[^"]*")?\s*\)|<(https?:\/\/[^>\s]+)>|(https?:\/\/[^\s<>)\]]+)/g;

/**
 * Inline links, autolinks, and bare http(s) URLs, in order of appearance.
 */
export function extractLinks(text: string): InlineLink[] {
  const links: InlineLink[] = [];
  for (const match of text.matchAll(LINK_RE)) {
    if (match[2] !== undefined) {
      links.push({ label: stripInline(match[1]), url: match[2] });
    } else if (match[3] !== undefined) {
      links.push({ label: match[3], url: match[3] });
    } else if (match[4] !== undefined) {
      const url = match[4].replace(/[.,;:!?]+$/, "");
      links.push({ label: url, url });
    }
  }
  return links;
}

/**
 * True for an absolute http(s) URL with a host.
 */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && url.hostname.length > 0;
  } catch {
    return false;
  }
}

export function extractCodeSpans(text: string): string[] {
  const spans: string[] = [];
  for (const match of text.matchAll(/`([^`]+)`/g)) {
    const span = match[1].trim();
    if (span) spans.push(span);
  }
  return spans;
}
