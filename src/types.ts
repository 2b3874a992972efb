// src/types.ts — Shared types for the snippet index synchronizer

// ─── Configuration ───────────────────────────────────────────────────────────

/**
 * The three headings that bound an index inside a document.
 * `startHeader`..`endHeader` is the region the tool may touch;
 * `indexHeader` is written inside the generated block.
 */
export interface HeaderTriple {
  startHeader: string;
  endHeader: string;
  indexHeader: string;
}

export interface MarkerPair {
  start: string;
  end: string;
}

/** A category of snippets sharing a folder and glob patterns. */
export interface Section {
  readonly label: string;
  readonly folder: string;
  readonly patterns: readonly string[];
  /** Present when the category owns its own document. */
  readonly headers?: Readonly<HeaderTriple>;
}

export interface ResolvedConfig {
  rootDir: string;
  /** Root document, relative to rootDir. */
  rootDocument: string;
  /** Per-category document name, relative to the category folder. */
  sectionDocument: string;
  sections: Section[];
  /** Localized header variants for the root document, tried in order. */
  navigation: HeaderTriple[];
  markers: MarkerPair;
  exclude: string[];
  dryRun: boolean;
  verbose: boolean;
}

// ─── Data ────────────────────────────────────────────────────────────────────

/** Label → repository-relative paths, in configured category order. */
export type SnippetMap = Map<string, string[]>;

export interface TreeNode {
  children: Map<string, TreeNode>;
  files: Set<string>;
}

/** Half-open line range [start, end) of a located header region. */
export interface HeaderRegion {
  start: number;
  end: number;
}

export interface DocumentUpdate {
  path: string;
  /** Index of the navigation variant used (root document only). */
  variant?: number;
  changed: boolean;
}

export interface UpdateResult {
  snippets: SnippetMap;
  documents: DocumentUpdate[];
  warnings: Warning[];
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class DocumentReadError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`Cannot read document: ${filePath}${cause ? ` (${cause.message})` : ""}`);
    this.name = "DocumentReadError";
    if (cause) this.cause = cause;
  }
}

export class NavigationSectionNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly triedHeaders: string[],
  ) {
    super(
      `Unable to locate navigation section in ${filePath} (tried: ${triedHeaders.join(", ")})`,
    );
    this.name = "NavigationSectionNotFoundError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const INDEX_VERSION = "1.3.0";

export const INDEX_MARKERS: MarkerPair = {
  start: "<!-- snippet-index:start -->",
  end: "<!-- snippet-index:end -->",
};

export const EMPTY_INDEX_PLACEHOLDER = "_No snippets found yet._";

export const DEFAULT_DOCUMENT = "README.md";

export const DEFAULT_SECTION_END_HEADER = "## How to contribute";
export const DEFAULT_SECTION_INDEX_HEADER = "## Snippet index";

export const DEFAULT_EXCLUDE_DIRS = [".git", "node_modules"] as const;
