#!/usr/bin/env node
// CLI entry point for snippet-index

import { relative } from "node:path";
import { runIndexUpdate, INDEX_VERSION } from "../index.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import type { Warning } from "../types.js";

const HELP_TEXT = `
snippet-index v${INDEX_VERSION}

Usage:
  snippet-index [update]       Regenerate the snippet index in README.md and category READMEs
  snippet-index check          Exit 1 if any snippet index is out of date (for CI)

Options:
  --root               Repository root (default: current directory)
  --config, -c         Path to config file (default: snippet-index.config.json)
  --dry-run            Compute the updates without writing any file
  --quiet, -q          Suppress warnings
  --verbose, -v        Print informational messages and per-document results
  --help, -h           Show this help text
`.trim();

function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

function printWarnings(warnings: Warning[], verbose: boolean): void {
  for (const w of warnings) {
    if (w.level === "info" && !verbose) continue;
    stderr(`[${w.level}] ${w.module}: ${w.message}`);
  }
}

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(0);
  }

  const warnings: Warning[] = [];
  if (args.unknown.length > 0) {
    warnings.push({
      level: "warn",
      module: "cli",
      message: `Ignoring unexpected arguments: ${args.unknown.join(" ")}`,
    });
  }
  const config = resolveConfig(args, warnings);

  if (args.command === "check") {
    const { runCheck } = await import("./check.js");
    const { stale, result } = runCheck(config, { quiet: args.quiet });
    if (!args.quiet) printWarnings([...warnings, ...result.warnings], config.verbose);
    process.exit(stale ? 1 : 0);
  }

  const result = runIndexUpdate(config);

  if (!args.quiet) {
    printWarnings([...warnings, ...result.warnings], config.verbose);
  }

  if (config.verbose) {
    for (const doc of result.documents) {
      const status = doc.changed ? (config.dryRun ? "would change" : "updated") : "unchanged";
      stderr(`[INFO] ${relative(config.rootDir, doc.path)}: ${status}`);
    }
  }

  process.stdout.write(config.dryRun ? "Dry run: no README files written.\n" : "README files updated.\n");
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
