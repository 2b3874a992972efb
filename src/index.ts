// src/index.ts — Library API
// One entry point: runIndexUpdate(). The stages are exported for callers that
// need them separately.

import type { ResolvedConfig, UpdateResult, Warning } from "./types.js";
import { collectSnippets } from "./path-collector.js";
import { updateRootDocument, updateSectionDocuments } from "./document-updater.js";

export type {
  HeaderTriple,
  MarkerPair,
  Section,
  ResolvedConfig,
  SnippetMap,
  TreeNode,
  HeaderRegion,
  DocumentUpdate,
  UpdateResult,
  Warning,
} from "./types.js";
export {
  DocumentReadError,
  NavigationSectionNotFoundError,
  INDEX_MARKERS,
  INDEX_VERSION,
  EMPTY_INDEX_PLACEHOLDER,
} from "./types.js";

export { collectSnippets, compareSegments } from "./path-collector.js";
export { createTreeNode, insertPath, buildTree } from "./tree-builder.js";
export { renderTree, renderGlobalIndex, renderLocalIndex } from "./markdown-renderer.js";
export {
  findHeader,
  locateRegion,
  removeMarkedBlock,
  rebuildRegion,
  replaceRegion,
  replaceSection,
} from "./section-replacer.js";
export { updateRootDocument, updateSectionDocuments } from "./document-updater.js";
export { defaultConfig, DEFAULT_SECTIONS, DEFAULT_NAVIGATION } from "./config.js";

/**
 * Full pass: collect snippets, rewrite the root document, then every category
 * document. A root document failure aborts before anything is written.
 */
export function runIndexUpdate(config: ResolvedConfig): UpdateResult {
  const warnings: Warning[] = [];
  const snippets = collectSnippets(config.rootDir, config.sections, {
    exclude: config.exclude,
    warnings,
  });

  const root = updateRootDocument(config, snippets, warnings);
  const sections = updateSectionDocuments(config, snippets, warnings);

  return { snippets, documents: [root, ...sections], warnings };
}
