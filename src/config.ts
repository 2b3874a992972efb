// src/config.ts — Config Resolver
// defaults ← config file ← CLI flags. The resolved value is passed explicitly
// to every stage; nothing reads process-wide state after this point.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { HeaderTriple, ResolvedConfig, Section, Warning } from "./types.js";
import {
  DEFAULT_DOCUMENT,
  DEFAULT_SECTION_END_HEADER,
  DEFAULT_SECTION_INDEX_HEADER,
  INDEX_MARKERS,
} from "./types.js";

export type Subcommand = "update" | "check";

export interface ParsedArgs {
  command: Subcommand;
  root?: string;
  config?: string;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
  unknown: string[];
}

/** Config file shape; every key optional. */
export interface FileConfig {
  rootDir?: string;
  rootDocument?: string;
  sectionDocument?: string;
  sections?: Section[];
  navigation?: HeaderTriple[];
  exclude?: string[];
}

const CONFIG_FILENAME = "snippet-index.config.json";
const PACKAGE_JSON_KEY = "snippetIndex";

function sectionHeaders(startHeader: string): HeaderTriple {
  return {
    startHeader,
    endHeader: DEFAULT_SECTION_END_HEADER,
    indexHeader: DEFAULT_SECTION_INDEX_HEADER,
  };
}

export const DEFAULT_SECTIONS: readonly Section[] = [
  { label: "Python", folder: "Python", patterns: ["**/*.py"], headers: sectionHeaders("# Python Snippets") },
  { label: "C", folder: "C", patterns: ["**/*.h", "**/*.c"], headers: sectionHeaders("# C Snippets") },
  { label: "Cpp", folder: "Cpp", patterns: ["**/*.hpp", "**/*.cpp"], headers: sectionHeaders("# C++ Snippets") },
  { label: "MATLAB", folder: "MATLAB", patterns: ["**/*.m"], headers: sectionHeaders("# MATLAB Snippets") },
  { label: "Simulink", folder: "Simulink", patterns: ["**/*.slx"], headers: sectionHeaders("# Simulink Snippets") },
  { label: "Arduino", folder: "Arduino", patterns: ["**/*.ino", "**/*.h", "**/*.cpp"], headers: sectionHeaders("# Arduino Snippets") },
  { label: "STM32", folder: "STM32", patterns: ["**/*.c", "**/*.h", "**/*.cpp"], headers: sectionHeaders("# STM32 Snippets") },
];

// English first, then Italian.
export const DEFAULT_NAVIGATION: readonly HeaderTriple[] = [
  { startHeader: "## How to navigate", endHeader: "## Indexing", indexHeader: "## Snippet index" },
  { startHeader: "## Come navigare", endHeader: "## Indicizzazione", indexHeader: "## Elenco snippet" },
];

export function defaultConfig(rootDir: string): ResolvedConfig {
  return {
    rootDir: resolve(rootDir),
    rootDocument: DEFAULT_DOCUMENT,
    sectionDocument: DEFAULT_DOCUMENT,
    sections: [...DEFAULT_SECTIONS],
    navigation: [...DEFAULT_NAVIGATION],
    markers: { ...INDEX_MARKERS },
    exclude: [],
    dryRun: false,
    verbose: false,
  };
}

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, cwd, warnings) ?? {};
  const rootDir = args.root ?? fileConfig.rootDir ?? cwd;
  const defaults = defaultConfig(resolve(cwd, rootDir));

  return {
    ...defaults,
    rootDocument: fileConfig.rootDocument ?? defaults.rootDocument,
    sectionDocument: fileConfig.sectionDocument ?? defaults.sectionDocument,
    sections: fileConfig.sections ?? defaults.sections,
    navigation: fileConfig.navigation ?? defaults.navigation,
    exclude: fileConfig.exclude ?? defaults.exclude,
    dryRun: args.dryRun || args.command === "check",
    verbose: args.verbose,
  };
}

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
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
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && PACKAGE_JSON_KEY in pkg) {
        return validateFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch {
      // Invalid package.json
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return validateFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

// ─── Validation ──────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function toHeaderTriple(value: unknown): HeaderTriple | undefined {
  if (!isRecord(value)) return undefined;
  const { startHeader, endHeader, indexHeader } = value;
  if (typeof startHeader !== "string") return undefined;
  return {
    startHeader,
    endHeader: typeof endHeader === "string" ? endHeader : DEFAULT_SECTION_END_HEADER,
    indexHeader: typeof indexHeader === "string" ? indexHeader : DEFAULT_SECTION_INDEX_HEADER,
  };
}

function toSection(value: unknown): Section | undefined {
  if (!isRecord(value)) return undefined;
  const { label, folder, patterns, headers } = value;
  if (typeof label !== "string" || typeof folder !== "string" || !isStringArray(patterns)) {
    return undefined;
  }
  if (headers === undefined) return { label, folder, patterns };
  const triple = toHeaderTriple(headers);
  return triple ? { label, folder, patterns, headers: triple } : undefined;
}

/**
 * Keep the recognized keys of a parsed config file. Invalid entries are
 * dropped with a warning and fall back to the defaults.
 */
export function validateFileConfig(
  raw: unknown,
  source: string,
  warnings: Warning[] = [],
): FileConfig | null {
  const warn = (message: string) =>
    warnings.push({ level: "warn", module: "config", message, file: source });

  if (!isRecord(raw)) {
    warn("Config must be a JSON object — ignored");
    return null;
  }

  const config: FileConfig = {};
  for (const key of ["rootDir", "rootDocument", "sectionDocument"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "string" && value.trim() !== "") config[key] = value;
    else warn(`"${key}" must be a non-empty string — using default`);
  }

  if (raw.exclude !== undefined) {
    if (isStringArray(raw.exclude)) config.exclude = raw.exclude;
    else warn(`"exclude" must be an array of glob patterns — using default`);
  }

  if (raw.sections !== undefined) {
    const sections: (Section | undefined)[] = Array.isArray(raw.sections) ? raw.sections.map(toSection) : [undefined];
    if (sections.every((s): s is Section => s !== undefined)) config.sections = sections;
    else warn(`"sections" has an invalid entry (label, folder and patterns are required) — using default`);
  }

  if (raw.navigation !== undefined) {
    const variants: (HeaderTriple | undefined)[] = Array.isArray(raw.navigation) ? raw.navigation.map(toHeaderTriple) : [undefined];
    if (variants.length > 0 && variants.every((v): v is HeaderTriple => v !== undefined)) {
      config.navigation = variants;
    } else {
      warn(`"navigation" must be a non-empty array of header triples — using default`);
    }
  }

  return config;
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help"],
    string: ["root", "config"],
  });

  const positional = args._.map(String);
  const first = positional[0];
  const command: Subcommand = first === "check" ? "check" : "update";
  const unknown = first === "check" || first === "update" ? positional.slice(1) : positional;

  return {
    command,
    root: typeof args.root === "string" ? args.root : undefined,
    config: typeof args.config === "string" ? args.config : undefined,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
    unknown,
  };
}
