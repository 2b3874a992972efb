// src/bin/check.ts — Staleness detection for the snippet indexes
// Runs the full pass without writing and reports documents that would change.

import { relative } from "node:path";
import { runIndexUpdate } from "../index.js";
import type { ResolvedConfig, UpdateResult } from "../types.js";

interface CheckOptions {
  quiet?: boolean;
}

function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

/**
 * `stale` is true when any index needs regeneration (for exit code).
 */
export function runCheck(config: ResolvedConfig, options: CheckOptions = {}): { stale: boolean; result: UpdateResult } {
  const result = runIndexUpdate({ ...config, dryRun: true });
  const stale = result.documents.filter((d) => d.changed);

  if (!options.quiet) {
    if (stale.length > 0) {
      stderr(`  Snippet index is stale in ${stale.length} document(s):`);
      for (const doc of stale) stderr(`    ${relative(config.rootDir, doc.path)}`);
      stderr(`  Run snippet-index to regenerate.`);
    } else {
      stderr(`  Snippet index is up to date (${result.documents.length} document(s) checked)`);
    }
  }

  return { stale: stale.length > 0, result };
}
