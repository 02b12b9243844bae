// src/file-discovery.ts — Decision document discovery
// git ls-files when available (respects .gitignore), filesystem walk otherwise.
// Include/exclude globs are matched with picomatch against paths relative to each root.

import { existsSync, readdirSync, statSync, realpathSync } from "node:fs";
import { resolve, relative, join, sep, isAbsolute } from "node:path";
import { execSync } from "node:child_process";
import picomatch from "picomatch";
import type { Warning } from "./types.js";
import { DEFAULT_EXCLUDE_DIRS, MARKDOWN_EXTENSIONS } from "./types.js";

const EXCLUDED_DIRS: ReadonlySet<string> = new Set(DEFAULT_EXCLUDE_DIRS);

/**
 * Discover Markdown documents under the given paths. Explicit file paths are
 * taken as-is; directories are searched and filtered by include/exclude globs.
 * Returns sorted, de-duplicated absolute paths.
 */
export function discoverDocuments(
  paths: string[],
  include: string[],
  exclude: string[],
  warnings: Warning[] = [],
): string[] {
  const found = new Set<string>();

  for (const path of paths) {
    const absPath = resolve(path);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "file-discovery",
        message: `Path not found: ${path}`,
        file: absPath,
      });
      continue;
    }

    if (statSync(absPath).isFile()) {
      found.add(absPath);
      continue;
    }

    for (const file of discoverInDirectory(absPath, include, exclude, warnings)) {
      found.add(file);
    }
  }

  return [...found].sort();
}

function discoverInDirectory(
  dir: string,
  include: string[],
  exclude: string[],
  warnings: Warning[],
): string[] {
  const gitFiles = tryGitLsFiles(dir);
  if (gitFiles !== null) {
    return filterByPatterns(gitFiles, dir, include, exclude);
  }

  // Symlinks are compared against the resolved root; its inode seeds cycle detection
  const realRoot = realpathSync(dir);
  const visited = new Set<number>([statSync(realRoot).ino]);
  const files: string[] = [];
  walkDirectory(dir, { dir, real: realRoot }, files, visited, warnings);
  return filterByPatterns(files, dir, include, exclude);
}

/**
 * Use git ls-files to get non-ignored files.
 * Returns null if git is not available or dir is not in a git repo.
 */
function tryGitLsFiles(dir: string): string[] | null {
  try {
    const output = execSync(
      "git ls-files --cached --others --exclude-standard",
      {
        cwd: dir,
        encoding: "utf-8",
        timeout: 5000,
        stdio: ["pipe", "pipe", "pipe"],
      },
    );

    const files: string[] = [];
    for (const line of output.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || !MARKDOWN_EXTENSIONS.test(trimmed)) continue;
      // Apply the same directory exclusions as the filesystem walk
      const parts = trimmed.split("/");
      if (parts.some((p) => EXCLUDED_DIRS.has(p))) continue;
      const absPath = resolve(dir, trimmed);
      // Tracked files deleted from the working tree are still listed
      if (existsSync(absPath)) files.push(absPath);
    }
    return files;
  } catch {
    // git not available or not a git repo — fall back to filesystem walk
    return null;
  }
}

/**
 * Recursive directory walk with symlink cycle and boundary detection.
 */
interface WalkRoot {
  dir: string;
  real: string;
}

function walkDirectory(
  dir: string,
  root: WalkRoot,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (EXCLUDED_DIRS.has(entry.name)) continue;
      walkDirectory(fullPath, root, results, visitedInodes, warnings);
    } else if (entry.isSymbolicLink()) {
      try {
        const realPath = realpathSync(fullPath);
        const stat = statSync(realPath);

        if (!isWithin(root.real, realPath)) {
          warnings.push({
            level: "info",
            module: "file-discovery",
            message: `Symlink ${relative(root.dir, fullPath)} points outside ${root.dir} — skipped`,
            file: fullPath,
          });
          continue;
        }

        if (stat.isDirectory()) {
          if (visitedInodes.has(stat.ino)) {
            warnings.push({
              level: "info",
              module: "file-discovery",
              message: `Symlink cycle detected at ${relative(root.dir, fullPath)} — skipped`,
              file: fullPath,
            });
            continue;
          }
          visitedInodes.add(stat.ino);
          if (!EXCLUDED_DIRS.has(entry.name)) {
            walkDirectory(fullPath, root, results, visitedInodes, warnings);
          }
        } else if (stat.isFile() && MARKDOWN_EXTENSIONS.test(entry.name)) {
          results.push(fullPath);
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "file-discovery",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    } else if (entry.isFile() && MARKDOWN_EXTENSIONS.test(entry.name)) {
      results.push(fullPath);
    }
  }
}

function isWithin(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

function filterByPatterns(
  files: string[],
  rootDir: string,
  include: string[],
  exclude: string[],
): string[] {
  const isIncluded: (path: string) => boolean =
    include.length > 0 ? picomatch(include, { dot: true }) : () => true;
  const isExcluded: (path: string) => boolean =
    exclude.length > 0 ? picomatch(exclude, { dot: true }) : () => false;

  return files.filter((f) => {
    const rel = relative(rootDir, f).split(sep).join("/");
    return isIncluded(rel) && !isExcluded(rel);
  });
}
