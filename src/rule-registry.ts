// src/rule-registry.ts — Rule registry + severity resolution

import type { LintRule, ResolvedConfig, Severity } from "./types.js";
import { frontMatterRule } from "./rules/front-matter.js";
import {
  requiredSectionsRule,
  sectionOrderRule,
  duplicateSectionRule,
  emptySectionRule,
} from "./rules/sections.js";
import { optionProsConsRule, optionCountRule } from "./rules/options.js";
import { matrixShapeRule, matrixColumnsRule } from "./rules/matrix.js";
import { phaseToolsPurposeRule } from "./rules/phases.js";
import { openQuestionFormatRule } from "./rules/open-questions.js";
import { referenceTargetRule } from "./rules/references.js";
import { recommendationOptionRule, architectureDiagramRule } from "./rules/recommendation.js";
import { unclosedCodeFenceRule } from "./rules/code-fences.js";

/** Rules in reporting order */
export const ALL_RULES: readonly LintRule[] = [
  frontMatterRule,
  requiredSectionsRule,
  sectionOrderRule,
  duplicateSectionRule,
  emptySectionRule,
  optionProsConsRule,
  optionCountRule,
  matrixShapeRule,
  matrixColumnsRule,
  recommendationOptionRule,
  architectureDiagramRule,
  phaseToolsPurposeRule,
  openQuestionFormatRule,
  referenceTargetRule,
  unclosedCodeFenceRule,
];

export function getRule(id: string): LintRule | undefined {
  return ALL_RULES.find((r) => r.id === id);
}

/**
 * Effective severity of every enabled rule. Rules set to "off" are absent.
 */
export function resolveRuleSeverities(
  config: Pick<ResolvedConfig, "rules">,
): Map<string, Severity> {
  const severities = new Map<string, Severity>();
  for (const rule of ALL_RULES) {
    const setting = config.rules[rule.id] ?? rule.defaultSeverity;
    if (setting !== "off") severities.set(rule.id, setting);
  }
  return severities;
}
