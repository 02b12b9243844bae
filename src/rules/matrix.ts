import type { LintRule, RuleFinding } from "../types.js";
import { findSections } from "../sections.js";
import { labelMatchesOption } from "./option-names.js";

export const matrixShapeRule: LintRule = {
  id: "matrix-shape",
  description: "The comparison matrix has one row per criterion, one column per option, every cell filled",
  defaultSeverity: "error",
  check(doc) {
    const section = findSections(doc.sections, "comparison")[0];
    if (!section) return [];
    const matrix = doc.matrix;
    if (!matrix) {
      return [{
        message: `Section "${section.title}" has no comparison table`,
        line: section.line,
        hint: "Add a table with one criterion per row and one option per column",
      }];
    }

    const findings: RuleFinding[] = [];
    const optionCount = doc.options.length;
    if (optionCount > 0 && matrix.columns.length !== optionCount) {
      findings.push({
        message: `Comparison matrix has ${matrix.columns.length} option column${matrix.columns.length === 1 ? "" : "s"} but ${optionCount} option${optionCount === 1 ? " is" : "s are"} evaluated`,
        line: matrix.line,
      });
    }

    matrix.columns.forEach((column, index) => {
      if (!column) {
        findings.push({ message: `Matrix column ${index + 2} has no option name`, line: matrix.line });
      }
    });

    if (matrix.rows.length === 0) {
      findings.push({ message: "Comparison matrix has no criteria rows", line: matrix.line });
    }

    const seen = new Map<string, number>();
    for (const row of matrix.rows) {
      const width = row.cells.length + 1;
      const label = row.criterion || "(blank)";
      if (width !== matrix.headerLength) {
        findings.push({
          message: `Row "${label}" has ${width} cells; the header has ${matrix.headerLength}`,
          line: row.line,
        });
      }

      if (!row.criterion) {
        findings.push({ message: "Matrix row has no criterion", line: row.line });
      } else {
        const key = row.criterion.toLowerCase();
        const previous = seen.get(key);
        if (previous !== undefined) {
          findings.push({
            message: `Criterion "${row.criterion}" appears more than once (first on line ${previous})`,
            line: row.line,
          });
        } else {
          seen.set(key, row.line);
        }
      }

      row.cells.forEach((cell, index) => {
        if (cell) return;
        const column = matrix.columns[index] || `column ${index + 2}`;
        findings.push({ message: `Empty cell for "${column}" in row "${label}"`, line: row.line });
      });
    }

    return findings;
  },
};

export const matrixColumnsRule: LintRule = {
  id: "matrix-columns",
  description: "Matrix columns and evaluated options name each other",
  defaultSeverity: "warn",
  check(doc) {
    const matrix = doc.matrix;
    if (!matrix || doc.options.length === 0) return [];

    const findings: RuleFinding[] = [];
    for (const column of matrix.columns) {
      if (column && !doc.options.some((o) => labelMatchesOption(column, o))) {
        findings.push({ message: `Column "${column}" does not name an evaluated option`, line: matrix.line });
      }
    }
    for (const option of doc.options) {
      if (!matrix.columns.some((c) => labelMatchesOption(c, option))) {
        findings.push({ message: `Option "${option.name}" has no column in the comparison matrix`, line: option.line });
      }
    }
    return findings;
  },
};
