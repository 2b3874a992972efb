// src/markdown-renderer.ts — Markdown bullet rendering for snippet indexes
// Output is deterministic: every level is sorted, directories before files.

import type { MarkerPair, Section, SnippetMap, TreeNode } from "./types.js";
import { EMPTY_INDEX_PLACEHOLDER, INDEX_MARKERS } from "./types.js";
import { buildTree, splitPath } from "./tree-builder.js";

const INDENT = "  ";

function bullet(level: number, name: string): string {
  return `${INDENT.repeat(level)}- \`${name}\``;
}

/**
 * Render a tree as nested bullets. Subdirectories come first, each followed
 * by its own subtree one level deeper, then the files of this level.
 */
export function renderTree(node: TreeNode, level = 0): string[] {
  const lines: string[] = [];
  for (const directory of [...node.children.keys()].sort()) {
    lines.push(bullet(level, directory));
    const child = node.children.get(directory);
    if (child) lines.push(...renderTree(child, level + 1));
  }
  for (const fileName of [...node.files].sort()) {
    lines.push(bullet(level, fileName));
  }
  return lines;
}

/**
 * Index for the root document: one `### label` heading per non-empty
 * category, in map order, each followed by the category's tree.
 */
export function renderGlobalIndex(
  items: SnippetMap,
  indexHeader: string,
  sections: readonly Section[] = [],
  markers: MarkerPair = INDEX_MARKERS,
): string[] {
  const folderByLabel = new Map(sections.map((s) => [s.label, s.folder]));
  const content: string[] = [];

  for (const [label, files] of items) {
    if (files.length === 0) continue;
    if (content.length > 0) content.push("");
    content.push(`### ${label}`);
    const tree = buildTree(files, folderByLabel.get(label) ?? "");
    content.push(...renderTree(tree, 0));
  }

  return wrapIndex(content, indexHeader, markers);
}

/**
 * Flat index for a category's own document, paths relative to `folder`.
 * Paths outside `folder` are listed as given.
 */
export function renderLocalIndex(
  paths: readonly string[],
  indexHeader: string,
  folder: string,
  markers: MarkerPair = INDEX_MARKERS,
): string[] {
  const prefix = splitPath(folder).join("/");
  const content = paths.map((path) => {
    const normalized = splitPath(path).join("/");
    if (prefix !== "" && normalized.startsWith(prefix + "/")) {
      return bullet(0, normalized.slice(prefix.length + 1));
    }
    return bullet(0, prefix === "" ? normalized : path);
  });
  return wrapIndex(content, indexHeader, markers);
}

function wrapIndex(content: string[], indexHeader: string, markers: MarkerPair): string[] {
  return [
    markers.start,
    indexHeader,
    "",
    ...(content.length > 0 ? content : [EMPTY_INDEX_PLACEHOLDER]),
    markers.end,
    "",
  ];
}
