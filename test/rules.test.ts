import { describe, it, expect } from "vitest";
import { parseDecisionDocument } from "../src/document-parser.js";
import { ALL_RULES, getRule, resolveRuleSeverities } from "../src/rule-registry.js";
import { labelMatchesOption, textMentionsOption } from "../src/rules/option-names.js";
import { isHttpUrl } from "../src/markdown-scanner.js";
import { createConfig } from "../src/index.js";
import type { LintOptions } from "../src/index.js";
import type { EvaluatedOption, RuleFinding } from "../src/types.js";

function check(ruleId: string, lines: string[], options: Partial<LintOptions> = {}): RuleFinding[] {
  const rule = getRule(ruleId);
  if (!rule) throw new Error(`Unknown rule ${ruleId}`);
  const config = createConfig(options);
  const doc = parseDecisionDocument(lines.join("\n"), { aliases: config.sections.aliases });
  return rule.check(doc, { config });
}

const TWO_OPTIONS = [
  "## Options Evaluated",
  "### Option 1: Alpha",
  "- Pros: a",
  "- Cons: b",
  "### Option 2: Beta",
  "- Pros: c",
  "- Cons: d",
];

// ─── Registry ────────────────────────────────────────────────────────────────

describe("rule registry", () => {
  it("has unique ids", () => {
    const ids = ALL_RULES.map((r) => r.id);
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids).toHaveLength(15);
  });

  it("resolves configured severities and drops rules set to off", () => {
    const severities = resolveRuleSeverities({
      rules: { "option-count": "off", "empty-section": "error" },
    });
    expect(severities.has("option-count")).toBe(false);
    expect(severities.get("empty-section")).toBe("error");
    expect(severities.get("front-matter")).toBe("error");
    expect(severities.get("matrix-columns")).toBe("warn");
    expect(severities.size).toBe(14);
  });
});

// ─── Front matter ────────────────────────────────────────────────────────────

describe("front-matter", () => {
  it("reports missing fields and invalid dates", () => {
    expect(check("front-matter", ["# T", "", "Date: 2025-02-30", "Status: accepted — pending review"])).toEqual([
      {
        message: 'Missing front matter field "Author"',
        line: 1,
        hint: 'Add a "Author: ..." line below the title',
      },
      { message: 'Date "2025-02-30" is not a YYYY-MM-DD calendar date', line: 3 },
    ]);
  });

  it("checks the status against the configured list", () => {
    const findings = check("front-matter", ["# T", "", "Status: Accepted"], {
      frontMatter: { required: ["Status"], statuses: ["Open"] },
    });
    expect(findings).toEqual([{ message: 'Status "Accepted" is not one of: Open', line: 3 }]);
  });

  it("accepts any status when the list is empty", () => {
    const findings = check("front-matter", ["# T", "", "Status: Whatever"], {
      frontMatter: { required: [], statuses: [] },
    });
    expect(findings).toEqual([]);
  });
});

// ─── Sections ────────────────────────────────────────────────────────────────

describe("required-sections", () => {
  it("reports each missing section without a line", () => {
    const findings = check("required-sections", ["## Overview", "text"], {
      sections: { required: ["overview", "references"] },
    });
    expect(findings).toEqual([
      { message: 'Missing required section "References"', hint: 'Add a "## References" heading' },
    ]);
  });
});

describe("section-order", () => {
  it("reports a section that appears after a later one", () => {
    expect(check("section-order", ["## References", "- x", "## Overview", "text"])).toEqual([
      { message: 'Section "Overview" should come before "References"', line: 3 },
    ]);
  });

  it("ignores unrecognized sections", () => {
    expect(check("section-order", ["## Overview", "a", "## Notes", "b", "## Requirements", "c"])).toEqual([]);
  });
});

describe("duplicate-section", () => {
  it("reports a second section of the same kind", () => {
    expect(check("duplicate-section", ["## Overview", "a", "## Context", "b"])).toEqual([
      { message: 'Section "Context" repeats "Overview" (line 1)', line: 3 },
    ]);
  });
});

describe("empty-section", () => {
  it("reports recognized sections without content", () => {
    expect(check("empty-section", ["## Overview", "## Notes"])).toEqual([
      { message: 'Section "Overview" is empty', line: 1 },
    ]);
  });
});

// ─── Options ─────────────────────────────────────────────────────────────────

describe("option-pros-cons", () => {
  it("reports an options section without option headings", () => {
    expect(check("option-pros-cons", ["## Options", "", "Just prose."])).toEqual([
      {
        message: 'Section "Options" lists no options',
        line: 1,
        hint: "Give each option its own ### heading",
      },
    ]);
  });

  it("passes options with both lists", () => {
    expect(check("option-pros-cons", TWO_OPTIONS)).toEqual([]);
  });
});

describe("option-count", () => {
  it("warns below the minimum", () => {
    expect(check("option-count", TWO_OPTIONS.slice(0, 4))).toEqual([
      { message: "Only 1 option evaluated; at least 2 expected", line: 1 },
    ]);
  });

  it("checks an exact expected count when configured", () => {
    expect(check("option-count", TWO_OPTIONS, { options: { expected: 3 } })).toEqual([
      { message: "Expected 3 evaluated options, found 2", line: 1 },
    ]);
    expect(check("option-count", TWO_OPTIONS, { options: { expected: 2 } })).toEqual([]);
  });
});

// ─── Matrix ──────────────────────────────────────────────────────────────────

describe("matrix-shape", () => {
  it("reports a comparison section without a table", () => {
    expect(check("matrix-shape", ["## Comparison", "", "text"])).toEqual([
      {
        message: 'Section "Comparison" has no comparison table',
        line: 1,
        hint: "Add a table with one criterion per row and one option per column",
      },
    ]);
  });

  it("reports a column count that differs from the option count", () => {
    const findings = check("matrix-shape", [
      ...TWO_OPTIONS,
      "## Comparison Matrix",
      "| Criterion | Alpha |",
      "|---|---|",
      "| Cost | Low |",
    ]);
    expect(findings).toEqual([
      { message: "Comparison matrix has 1 option column but 2 options are evaluated", line: 9 },
    ]);
  });

  it("reports a table without rows", () => {
    expect(check("matrix-shape", ["## Comparison Matrix", "| Criterion | A |", "|---|---|"])).toEqual([
      { message: "Comparison matrix has no criteria rows", line: 2 },
    ]);
  });

  it("reports rows without a criterion", () => {
    expect(check("matrix-shape", ["## Comparison Matrix", "| Criterion | A |", "|---|---|", "| | Low |"])).toEqual([
      { message: "Matrix row has no criterion", line: 4 },
    ]);
  });
});

describe("matrix-columns", () => {
  it("accepts columns named by option id", () => {
    const findings = check("matrix-columns", [
      ...TWO_OPTIONS,
      "## Comparison Matrix",
      "| Criterion | Option 1 | 2 |",
      "|---|---|---|",
      "| Cost | Low | High |",
    ]);
    expect(findings).toEqual([]);
  });
});

describe("option names", () => {
  const option: EvaluatedOption = {
    id: "2",
    name: "Custom Agent Loop",
    title: "Option 2: Custom Agent Loop",
    line: 1,
    pros: [],
    cons: [],
  };

  it("matches labels by id or by whole words of the name", () => {
    expect(labelMatchesOption("Option 2", option)).toBe(true);
    expect(labelMatchesOption("2", option)).toBe(true);
    expect(labelMatchesOption("Custom Agent", option)).toBe(true);
    expect(labelMatchesOption("Agent Loop v2", option)).toBe(false);
    expect(labelMatchesOption("", option)).toBe(false);
  });

  it("finds options mentioned in free text", () => {
    expect(textMentionsOption("We pick option 2.", option)).toBe(true);
    expect(textMentionsOption("We pick option 21.", option)).toBe(false);
    expect(textMentionsOption("Go with the custom agent-loop.", option)).toBe(true);
  });
});

// ─── Recommendation + architecture ──────────────────────────────────────────

describe("recommendation-option", () => {
  it("passes when the recommendation names an option", () => {
    expect(check("recommendation-option", [...TWO_OPTIONS, "## Recommendation", "Adopt Beta."])).toEqual([]);
  });

  it("lists the options in its hint", () => {
    expect(check("recommendation-option", [...TWO_OPTIONS, "## Recommendation", "Adopt Gamma."])).toEqual([
      {
        message: "Recommendation does not name any evaluated option",
        line: 8,
        hint: "Name one of: Alpha, Beta",
      },
    ]);
  });
});

describe("architecture-diagram", () => {
  it("reports an architecture section without a code block", () => {
    expect(check("architecture-diagram", ["## Architecture", "", "text"])).toEqual([
      {
        message: 'Section "Architecture" has no diagram',
        line: 1,
        hint: "Add the diagram as a fenced code block",
      },
    ]);
  });
});

// ─── Phases, questions, references, fences ──────────────────────────────────

describe("phase-tools-purpose", () => {
  it("reports a plan without phases", () => {
    expect(check("phase-tools-purpose", ["## Implementation Plan", "", "text only"])).toEqual([
      {
        message: 'Section "Implementation Plan" defines no phases',
        line: 1,
        hint: "Use one ### heading per phase, or a table with a Phase column",
      },
    ]);
  });

  it("reads tools and purpose listed under sub-headings", () => {
    expect(check("phase-tools-purpose", [
      "## Implementation Plan",
      "### Phase 1",
      "#### Tools",
      "- psql",
      "#### Purpose",
      "- Load data",
    ])).toEqual([]);
  });
});

describe("open-question-format", () => {
  it("reports a section without questions", () => {
    expect(check("open-question-format", ["## Open Questions", "", "None right now."])).toEqual([
      { message: 'Section "Open Questions" lists no questions', line: 1 },
    ]);
  });

  it("truncates long statements in the message", () => {
    const findings = check("open-question-format", ["## Open Questions", `- ${"a".repeat(70)}`]);
    expect(findings).toEqual([
      {
        message: `Open question does not end with "?": "${"a".repeat(59)}…"`,
        line: 2,
        hint: "Phrase it as a question",
      },
    ]);
  });
});

describe("reference-target", () => {
  it("accepts http(s) links and internal labels", () => {
    expect(check("reference-target", [
      "## References",
      "- [Docs](https://docs.example.com)",
      "- Internal wiki page",
    ])).toEqual([]);
  });

  it("accepts a reference with any http(s) link", () => {
    expect(check("reference-target", ["## References", "- [Repo](./x) mirror https://mirror.example/x"])).toEqual([]);
  });

  it("reports non-http links", () => {
    expect(check("reference-target", ["## References", "- [Design](ftp://files.example/design)"])).toEqual([
      { message: 'Reference "Design" links to "ftp://files.example/design", which is not an http(s) URL', line: 2 },
    ]);
  });

  it("checks URLs for a scheme and host", () => {
    expect(isHttpUrl("https://example.com/a")).toBe(true);
    expect(isHttpUrl("http://")).toBe(false);
    expect(isHttpUrl("mailto:team@example.com")).toBe(false);
    expect(isHttpUrl("./runbook.md")).toBe(false);
  });
});

describe("unclosed-code-fence", () => {
  it("reports the opening line of an unclosed fence", () => {
    expect(check("unclosed-code-fence", ["# T", "```", "code"])).toEqual([
      { message: "Code fence is never closed; the rest of the document is swallowed", line: 2 },
    ]);
  });
});
