// src/front-matter.ts — Plain-text front matter
// Decision records carry "Key: value" lines (Date, Status, Author) between the
// title and the first section, often emphasized: "**Date:** 2025-03-01".

import type { Block, FrontMatter, FrontMatterField, SourceLine } from "./types.js";
import { stripInline } from "./markdown-scanner.js";

const FIELD_RE = /^([A-Za-z][A-Za-z -]{0,30}?)\s*:\s*(.+)$/;

const AUTHOR_KEYS = new Set(["author", "authors", "owner", "owners"]);

/**
 * Collect front matter fields from the blocks that precede the first
 * level-2 heading. The level-1 title heading is skipped.
 */
export function parseFrontMatter(blocks: Block[]): FrontMatter {
  const fields: FrontMatterField[] = [];

  for (const block of blocks) {
    if (block.type === "heading" && block.level >= 2) break;

    let candidates: SourceLine[] = [];
    if (block.type === "paragraph") candidates = block.lines;
    else if (block.type === "list-item") candidates = [{ text: block.text, line: block.line }];

    for (const candidate of candidates) {
      const field = parseField(candidate);
      if (field) fields.push(field);
    }
  }

  const result: FrontMatter = { fields };
  for (const field of fields) {
    const key = field.key.toLowerCase();
    if (key === "date" && !result.date) result.date = field;
    else if (key === "status" && !result.status) result.status = field;
    else if (AUTHOR_KEYS.has(key) && !result.author) result.author = field;
  }
  return result;
}

function parseField(source: SourceLine): FrontMatterField | undefined {
  const match = FIELD_RE.exec(stripInline(source.text));
  if (!match) return undefined;
  const value = match[2].trim();
  if (!value) return undefined;
  return { key: match[1].trim(), value, line: source.line };
}

/**
 * True for a YYYY-MM-DD string naming a real calendar date.
 */
export function isIsoDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * A status passes when its first word is in the allowed list, ignoring case:
 * "Accepted (2025-02-01)" passes for "Accepted". An empty list allows anything.
 */
export function isAllowedStatus(value: string, allowed: string[]): boolean {
  if (allowed.length === 0) return true;
  const word = value.trim().split(/[\s(,;—–]+/)[0].toLowerCase();
  return allowed.some((s) => s.toLowerCase() === word);
}

/**
 * Look up any field by key, case-insensitively.
 */
export function getField(frontMatter: FrontMatter, key: string): FrontMatterField | undefined {
  const wanted = key.toLowerCase();
  if (wanted === "date") return frontMatter.date;
  if (wanted === "status") return frontMatter.status;
  if (AUTHOR_KEYS.has(wanted)) return frontMatter.author;
  return frontMatter.fields.find((f) => f.key.toLowerCase() === wanted);
}
