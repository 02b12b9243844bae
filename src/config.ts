// src/config.ts — Config Resolver
// defaults ← config file (decision-lint.config.json or package.json "decisionLint") ← CLI flags

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { z } from "zod";
import type { OutputFormat, ResolvedConfig, SeveritySetting, Warning } from "./types.js";
import { ConfigError, SECTION_KINDS } from "./types.js";
import { getRule } from "./rule-registry.js";

export type Command = "lint" | "outline" | "init" | "check";

const COMMANDS: readonly Command[] = ["lint", "outline", "init", "check"];

export interface ParsedArgs {
  command: Command;
  paths: string[];
  format?: string;
  config?: string;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
  hints: boolean;
  maxWarnings?: number;
  rules: string[];
  // init
  title?: string;
  author?: string;
  status?: string;
  options?: number;
  force: boolean;
  // check
  baseline?: string;
  saveBaseline: boolean;
}

export const CONFIG_FILENAME = "decision-lint.config.json";
export const PACKAGE_JSON_KEY = "decisionLint";

export const DEFAULT_CONFIG: ResolvedConfig = {
  paths: ["."],
  include: ["**/*.md", "**/*.markdown"],
  exclude: [],
  rules: {},
  sections: {
    required: [...SECTION_KINDS],
    aliases: {},
  },
  frontMatter: {
    required: ["Date", "Status", "Author"],
    statuses: ["Proposed", "Accepted", "Rejected", "Superseded", "Deprecated", "Draft"],
  },
  options: {
    min: 2,
  },
  output: {
    format: "text",
  },
  maxWarnings: -1,
  verbose: false,
};

// ─── Config file schema ─────────────────────────────────────────────────────

const severitySchema = z.enum(["error", "warn", "off"]);
const sectionKindSchema = z.enum(SECTION_KINDS);
const outputFormatSchema = z.enum(["text", "json"]);

export const configFileSchema = z
  .object({
    paths: z.array(z.string()).optional(),
    include: z.array(z.string()).optional(),
    exclude: z.array(z.string()).optional(),
    rules: z.record(z.string(), severitySchema).optional(),
    sections: z
      .object({
        required: z.array(sectionKindSchema).optional(),
        aliases: z.record(sectionKindSchema, z.array(z.string())).optional(),
      })
      .strict()
      .optional(),
    frontMatter: z
      .object({
        required: z.array(z.string()).optional(),
        statuses: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    options: z
      .object({
        min: z.number().int().min(0).optional(),
        expected: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
    output: z.object({ format: outputFormatSchema.optional() }).strict().optional(),
    maxWarnings: z.number().int().min(-1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof configFileSchema>;

// ─── Resolution ──────────────────────────────────────────────────────────────

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd);

  const rules: Record<string, SeveritySetting> = {
    ...fileConfig?.rules,
    ...parseRuleFlags(args.rules, warnings),
  };
  for (const id of Object.keys(rules)) {
    if (!getRule(id)) {
      warnings.push({ level: "warn", module: "config", message: `Unknown rule "${id}" ignored` });
      delete rules[id];
    }
  }

  return {
    paths: args.paths.length > 0 ? args.paths : fileConfig?.paths ?? DEFAULT_CONFIG.paths,
    include: fileConfig?.include ?? DEFAULT_CONFIG.include,
    exclude: fileConfig?.exclude ?? DEFAULT_CONFIG.exclude,
    rules,
    sections: {
      required: fileConfig?.sections?.required ?? DEFAULT_CONFIG.sections.required,
      aliases: fileConfig?.sections?.aliases ?? DEFAULT_CONFIG.sections.aliases,
    },
    frontMatter: {
      required: fileConfig?.frontMatter?.required ?? DEFAULT_CONFIG.frontMatter.required,
      statuses: fileConfig?.frontMatter?.statuses ?? DEFAULT_CONFIG.frontMatter.statuses,
    },
    options: {
      min: fileConfig?.options?.min ?? DEFAULT_CONFIG.options.min,
      expected: fileConfig?.options?.expected,
    },
    output: {
      format: resolveFormat(args.format, fileConfig?.output?.format, warnings),
    },
    maxWarnings: args.maxWarnings ?? fileConfig?.maxWarnings ?? DEFAULT_CONFIG.maxWarnings,
    verbose: args.verbose,
  };
}

function resolveFormat(
  flag: string | undefined,
  fromFile: OutputFormat | undefined,
  warnings: Warning[],
): OutputFormat {
  const candidates: Array<[string, string | undefined]> = [
    ["--format", flag],
    ["config file", fromFile],
    ["DECISION_LINT_FORMAT", process.env.DECISION_LINT_FORMAT],
  ];
  for (const [source, value] of candidates) {
    if (value === undefined || value === "") continue;
    const parsed = outputFormatSchema.safeParse(value);
    if (parsed.success) return parsed.data;
    warnings.push({
      level: "warn",
      module: "config",
      message: `Unknown output format "${value}" from ${source}; using "${DEFAULT_CONFIG.output.format}"`,
    });
    break;
  }
  return DEFAULT_CONFIG.output.format;
}

/**
 * Parse repeated `--rule id=severity` flags.
 */
export function parseRuleFlags(
  flags: string[],
  warnings: Warning[] = [],
): Record<string, SeveritySetting> {
  const rules: Record<string, SeveritySetting> = {};
  for (const flag of flags) {
    const match = /^([\w-]+)=(.+)$/.exec(flag.trim());
    const severity = severitySchema.safeParse(match?.[2]);
    if (!match || !severity.success) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Invalid --rule "${flag}"; expected id=error|warn|off`,
      });
      continue;
    }
    rules[match[1]] = severity.data;
  }
  return rules;
}

// ─── Config file loading ─────────────────────────────────────────────────────

/**
 * Load the config file. An explicit path that exists but is invalid throws
 * ConfigError; a discovered file that is invalid is skipped with a warning.
 */
export function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string = process.cwd(),
): FileConfig | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfig(readJson(absPath), absPath);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigOrWarn(() => parseConfig(readJson(jsonConfig), jsonConfig), warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    return parseConfigOrWarn(() => {
      const pkg = readJson(pkgJson);
      if (typeof pkg !== "object" || pkg === null || !(PACKAGE_JSON_KEY in pkg)) return null;
      return parseConfig(pkg[PACKAGE_JSON_KEY], `${pkgJson}#${PACKAGE_JSON_KEY}`);
    }, warnings);
  }

  return null;
}

function parseConfigOrWarn(
  load: () => FileConfig | null,
  warnings: Warning[],
): FileConfig | null {
  try {
    return load();
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "config", message: msg });
    return null;
  }
}

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse config file ${filePath}: ${msg}`, filePath);
  }
}

function parseConfig(raw: unknown, source: string): FileConfig {
  const result = configFileSchema.safeParse(raw);
  if (result.success) return result.data;
  const details = result.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  throw new ConfigError(`Invalid config in ${source}: ${details}`, source);
}

// ─── CLI args ────────────────────────────────────────────────────────────────

function str(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function strList(value: unknown): string[] {
  if (Array.isArray(value)) return value.map(str).filter((v): v is string => v !== undefined);
  const single = str(value);
  return single === undefined ? [] : [single];
}

function int(value: unknown): number | undefined {
  const text = str(value);
  if (text === undefined) return undefined;
  const parsed = Number.parseInt(text, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { f: "format", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["quiet", "verbose", "help", "version", "hints", "force", "save-baseline"],
    string: ["format", "config", "max-warnings", "rule", "title", "author", "status", "options", "baseline"],
  });

  const positional = args._.map(String);
  const first = positional[0];
  const command: Command = isCommand(first) ? first : "lint";
  if (isCommand(first)) positional.shift();

  return {
    command,
    paths: positional,
    format: str(args.format),
    config: str(args.config),
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
    version: args.version === true,
    hints: args.hints === true,
    maxWarnings: int(args["max-warnings"]),
    rules: strList(args.rule),
    title: str(args.title),
    author: str(args.author),
    status: str(args.status),
    options: int(args.options),
    force: args.force === true,
    baseline: str(args.baseline),
    saveBaseline: args["save-baseline"] === true,
  };
}
