// src/path-collector.ts — Snippet discovery per category
// Walks each category folder and matches files against its glob patterns (picomatch).

import { existsSync, readdirSync, realpathSync, statSync } from "node:fs";
import type { Dirent } from "node:fs";
import { join, relative, resolve, sep } from "node:path";
import picomatch from "picomatch";
import type { Section, SnippetMap, Warning } from "./types.js";
import { DEFAULT_EXCLUDE_DIRS } from "./types.js";

export interface CollectOptions {
  /** Glob patterns, relative to the repository root, removed from every category. */
  exclude?: string[];
  warnings?: Warning[];
}

/**
 * Collect the files of every section, keyed by label in section order.
 * Paths are relative to rootDir with forward slashes, deduplicated per section.
 * A missing folder contributes an empty list.
 */
export function collectSnippets(
  rootDir: string,
  sections: readonly Section[],
  options: CollectOptions = {},
): SnippetMap {
  const absRoot = resolve(rootDir);
  const warnings = options.warnings ?? [];
  const exclude = options.exclude ?? [];
  const isExcluded = exclude.length > 0 ? picomatch(exclude, { dot: true }) : () => false;

  const items: SnippetMap = new Map();
  for (const section of sections) {
    const base = resolve(absRoot, section.folder);
    if (!isDirectory(base)) {
      warnings.push({
        level: "info",
        module: "path-collector",
        message: `Folder for "${section.label}" not found — no snippets collected`,
        file: base,
      });
      items.set(section.label, []);
      continue;
    }

    const candidates = listCategoryFiles(base, realpathSync(absRoot), warnings);
    const seen = new Set<string>();
    const collected: string[] = [];
    for (const pattern of section.patterns) {
      const isMatch = picomatch(pattern, { dot: true });
      for (const candidate of candidates) {
        if (!isMatch(candidate)) continue;
        const rel = toPosix(relative(absRoot, join(base, candidate)));
        if (seen.has(rel) || isExcluded(rel)) continue;
        seen.add(rel);
        collected.push(rel);
      }
    }
    items.set(section.label, collected);
  }
  return items;
}

/** Order paths segment by segment, so `a/c.py` sorts before `a-b.py`. */
export function compareSegments(a: string, b: string): number {
  const left = a.split("/");
  const right = b.split("/");
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

function isDirectory(path: string): boolean {
  if (!existsSync(path)) return false;
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

// ─── Category walk ───────────────────────────────────────────────────────────

interface CategoryWalk {
  /** Real path of the repository root; links may not leave it. */
  boundary: string;
  /** Real paths of every directory already entered, the category folder included. */
  visited: Set<string>;
  /** Files found so far, relative to the category folder. */
  files: string[];
  warnings: Warning[];
}

/**
 * Every file below `base` as a category-relative posix path, sorted by segment.
 * Each real directory is entered once, whichever path leads to it.
 */
function listCategoryFiles(base: string, boundary: string, warnings: Warning[]): string[] {
  const realBase = realpathSync(base);
  const walk: CategoryWalk = { boundary, visited: new Set([realBase]), files: [], warnings };
  visitDirectory(walk, base, realBase, "");
  return walk.files.sort(compareSegments);
}

function visitDirectory(walk: CategoryWalk, dir: string, realDir: string, prefix: string): void {
  const entries = readEntries(walk, dir);
  for (const entry of entries) {
    const rel = prefix === "" ? entry.name : `${prefix}/${entry.name}`;
    const fullPath = join(dir, entry.name);

    if (entry.isFile()) {
      walk.files.push(rel);
    } else if (entry.isDirectory()) {
      enterDirectory(walk, fullPath, join(realDir, entry.name), rel);
    } else if (entry.isSymbolicLink()) {
      followLink(walk, fullPath, rel);
    }
  }
}

function readEntries(walk: CategoryWalk, dir: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    walk.warnings.push({
      level: "warn",
      module: "path-collector",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return [];
  }
}

function enterDirectory(walk: CategoryWalk, dir: string, realDir: string, rel: string): void {
  const name = rel.slice(rel.lastIndexOf("/") + 1);
  if ((DEFAULT_EXCLUDE_DIRS as readonly string[]).includes(name)) return;
  if (walk.visited.has(realDir)) {
    walk.warnings.push({
      level: "info",
      module: "path-collector",
      message: `Symlink cycle detected at ${rel} — skipped`,
      file: dir,
    });
    return;
  }
  walk.visited.add(realDir);
  visitDirectory(walk, dir, realDir, rel);
}

function followLink(walk: CategoryWalk, link: string, rel: string): void {
  let realPath: string;
  try {
    realPath = realpathSync(link);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    walk.warnings.push({
      level: "warn",
      module: "path-collector",
      message: `Cannot resolve symlink: ${msg}`,
      file: link,
    });
    return;
  }

  if (realPath !== walk.boundary && !realPath.startsWith(walk.boundary + sep)) {
    walk.warnings.push({
      level: "info",
      module: "path-collector",
      message: `Symlink ${rel} points outside the repository — skipped`,
      file: link,
    });
    return;
  }

  if (isDirectory(realPath)) enterDirectory(walk, link, realPath, rel);
  else walk.files.push(rel);
}
