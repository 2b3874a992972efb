// src/tree-builder.ts — Prefix tree of directories and leaf filenames

import type { TreeNode } from "./types.js";

export function createTreeNode(): TreeNode {
  return { children: new Map(), files: new Set() };
}

/**
 * Insert a path, already split into segments, below `node`.
 * The last segment becomes a leaf file; every earlier one a directory.
 */
export function insertPath(node: TreeNode, parts: readonly string[]): void {
  if (parts.length === 0) return;
  const [head, ...tail] = parts;
  if (tail.length === 0) {
    node.files.add(head);
    return;
  }
  let child = node.children.get(head);
  if (!child) {
    child = createTreeNode();
    node.children.set(head, child);
  }
  insertPath(child, tail);
}

export function splitPath(path: string): string[] {
  return path.split("/").filter((part) => part !== "" && part !== ".");
}

/**
 * Build a tree from repository-relative paths, dropping the leading
 * `baseFolder` segments from every path that starts with them.
 */
export function buildTree(paths: readonly string[], baseFolder: string): TreeNode {
  const tree = createTreeNode();
  const baseParts = splitPath(baseFolder);
  for (const filePath of paths) {
    let parts = splitPath(filePath);
    if (baseParts.length > 0 && startsWithParts(parts, baseParts)) {
      parts = parts.slice(baseParts.length);
    }
    insertPath(tree, parts);
  }
  return tree;
}

function startsWithParts(parts: string[], prefix: string[]): boolean {
  if (parts.length < prefix.length) return false;
  return prefix.every((part, i) => parts[i] === part);
}
