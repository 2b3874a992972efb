// src/document-updater.ts — Rewrites the index regions of the root and category documents
// Each document is read whole, transformed in memory, then written in one call.

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type {
  DocumentUpdate,
  ResolvedConfig,
  Section,
  SnippetMap,
  Warning,
} from "./types.js";
import { DocumentReadError, NavigationSectionNotFoundError } from "./types.js";
import { renderGlobalIndex, renderLocalIndex } from "./markdown-renderer.js";
import { detectEol, joinLines, replaceSection, splitLines } from "./section-replacer.js";

type UpdaterConfig = Pick<
  ResolvedConfig,
  "rootDir" | "rootDocument" | "sectionDocument" | "sections" | "navigation" | "markers" | "dryRun"
>;

/**
 * Update the root document with the global index. The first navigation
 * variant whose start header is present wins.
 *
 * @throws DocumentReadError when the root document cannot be read
 * @throws NavigationSectionNotFoundError when no variant matches
 */
export function updateRootDocument(
  config: UpdaterConfig,
  snippets: SnippetMap,
  warnings: Warning[] = [],
): DocumentUpdate {
  const path = resolve(config.rootDir, config.rootDocument);
  const original = readDocument(path);
  const lines = splitLines(original);

  for (const [variant, headers] of config.navigation.entries()) {
    const indexLines = renderGlobalIndex(snippets, headers.indexHeader, config.sections, config.markers);
    const updated = replaceSection(lines, headers.startHeader, headers.endHeader, indexLines, config.markers);
    if (updated === undefined) continue;

    warnings.push({
      level: "info",
      module: "document-updater",
      message: `Using navigation section "${headers.startHeader}"`,
      file: path,
    });
    const changed = writeIfChanged(path, original, joinLines(updated, detectEol(original)), config.dryRun);
    return { path, variant, changed };
  }

  throw new NavigationSectionNotFoundError(
    path,
    config.navigation.map((h) => h.startHeader),
  );
}

/**
 * Update the document of every category that declares headers and has one
 * on disk. Failures are reported as warnings and do not stop other categories.
 */
export function updateSectionDocuments(
  config: UpdaterConfig,
  snippets: SnippetMap,
  warnings: Warning[] = [],
): DocumentUpdate[] {
  const updates: DocumentUpdate[] = [];
  for (const section of config.sections) {
    const update = updateSectionDocument(config, section, snippets.get(section.label) ?? [], warnings);
    if (update) updates.push(update);
  }
  return updates;
}

function updateSectionDocument(
  config: UpdaterConfig,
  section: Section,
  files: readonly string[],
  warnings: Warning[],
): DocumentUpdate | undefined {
  if (!section.headers) return undefined;
  const path = resolve(config.rootDir, join(section.folder, config.sectionDocument));
  if (!existsSync(path)) {
    warnings.push({
      level: "info",
      module: "document-updater",
      message: `No document for "${section.label}" — skipped`,
      file: path,
    });
    return undefined;
  }

  let original: string;
  try {
    original = readDocument(path);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "document-updater", message: msg, file: path });
    return undefined;
  }

  const { startHeader, endHeader, indexHeader } = section.headers;
  const indexLines = renderLocalIndex(files, indexHeader, section.folder, config.markers);
  const updated = replaceSection(splitLines(original), startHeader, endHeader, indexLines, config.markers);
  if (updated === undefined) {
    warnings.push({
      level: "warn",
      module: "document-updater",
      message: `Header "${startHeader}" not found — "${section.label}" index not updated`,
      file: path,
    });
    return undefined;
  }

  try {
    const next = joinLines(updated, detectEol(original));
    return { path, changed: writeIfChanged(path, original, next, config.dryRun) };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "error", module: "document-updater", message: `Write failed: ${msg}`, file: path });
    return undefined;
  }
}

function readDocument(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err: unknown) {
    throw new DocumentReadError(path, err instanceof Error ? err : undefined);
  }
}

/** Not crash-atomic: an interrupted write can leave the file truncated. */
function writeIfChanged(path: string, original: string, next: string, dryRun: boolean): boolean {
  if (next === original) return false;
  if (!dryRun) writeFileSync(path, next, "utf-8");
  return true;
}
