// src/sections.ts — Section tree + canonical section classification

import type { Block, Section, SectionKind } from "./types.js";
import { SECTION_KINDS } from "./types.js";
import { stripInline } from "./markdown-scanner.js";

export const SECTION_TITLES: Record<SectionKind, string> = {
  overview: "Overview",
  requirements: "Requirements",
  options: "Options Evaluated",
  comparison: "Comparison Matrix",
  recommendation: "Recommendation",
  architecture: "Recommended Architecture",
  "implementation-plan": "Implementation Plan",
  "decision-summary": "Decision Summary",
  "open-questions": "Open Questions",
  references: "References",
};

export const SECTION_ALIASES: Record<SectionKind, string[]> = {
  overview: ["overview", "context", "background", "introduction", "problem statement"],
  requirements: ["requirements", "goals", "constraints", "decision drivers"],
  options: ["options evaluated", "options", "considered options", "alternatives", "alternatives considered"],
  comparison: ["comparison matrix", "comparison", "evaluation matrix", "options comparison", "trade-off matrix"],
  recommendation: ["recommendation", "decision", "decision outcome", "proposed decision"],
  architecture: ["recommended architecture", "architecture", "proposed architecture", "target architecture"],
  "implementation-plan": ["implementation plan", "rollout plan", "implementation", "phases", "roadmap"],
  "decision-summary": ["decision summary", "summary", "consequences"],
  "open-questions": ["open questions", "questions", "unresolved questions", "open issues"],
  references: ["references", "links", "see also", "resources"],
};

/**
 * Canonical position of a section kind (0-based).
 */
export function sectionOrder(kind: SectionKind): number {
  return SECTION_KINDS.indexOf(kind);
}

/**
 * Normalize a heading for alias comparison: inline markup, leading numbering,
 * leading symbols and a trailing colon are dropped, case and spacing folded.
 */
export function normalizeHeading(text: string): string {
  return stripInline(text)
    .replace(/^[^\p{L}\p{N}]+/u, "")
    .replace(/^(?:\d+(?:\.\d+)*|[ivxlc]+|[a-z])[.)]\s+/i, "")
    .replace(/[:.]\s*$/, "")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

export function classifySection(
  title: string,
  extraAliases: Partial<Record<SectionKind, string[]>> = {},
): SectionKind | undefined {
  const normalized = normalizeHeading(title);
  for (const kind of SECTION_KINDS) {
    const aliases = [...SECTION_ALIASES[kind], ...(extraAliases[kind] ?? [])];
    if (aliases.some((alias) => normalizeHeading(alias) === normalized)) return kind;
  }
  return undefined;
}

/**
 * Group blocks under level-2 headings. Deeper headings become nested
 * children; content before the first level-2 heading is not part of any section.
 */
export function buildSectionTree(
  blocks: Block[],
  extraAliases: Partial<Record<SectionKind, string[]>> = {},
  lastLine = Number.MAX_SAFE_INTEGER,
): Section[] {
  const roots: Section[] = [];
  const stack: Section[] = [];

  for (const block of blocks) {
    if (block.type === "heading" && block.level >= 2) {
      while (stack.length > 0 && stack[stack.length - 1].level >= block.level) {
        closeSection(stack.pop(), block.line - 1);
      }
      const section: Section = {
        title: stripInline(block.text),
        level: block.level,
        line: block.line,
        endLine: lastLine,
        blocks: [],
        children: [],
      };
      if (stack.length === 0) {
        section.kind = classifySection(block.text, extraAliases);
        roots.push(section);
      } else {
        stack[stack.length - 1].children.push(section);
      }
      stack.push(section);
      continue;
    }

    if (block.type === "heading" && block.level === 1) {
      while (stack.length > 0) closeSection(stack.pop(), block.line - 1);
      continue;
    }

    if (stack.length > 0) stack[stack.length - 1].blocks.push(block);
  }

  return roots;
}

function closeSection(section: Section | undefined, endLine: number): void {
  if (section) section.endLine = endLine;
}

/**
 * All blocks of a section in document order, headings of nested children included.
 */
export function flattenSection(section: Section): Block[] {
  const result: Block[] = [...section.blocks];
  for (const child of section.children) {
    result.push({ type: "heading", level: child.level, text: child.title, line: child.line });
    result.push(...flattenSection(child));
  }
  return result;
}

export function findSections(sections: Section[], kind: SectionKind): Section[] {
  return sections.filter((s) => s.kind === kind);
}

export function isEmptySection(section: Section): boolean {
  return section.blocks.length === 0 && section.children.length === 0;
}
