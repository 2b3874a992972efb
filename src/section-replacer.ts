// src/section-replacer.ts — Header-bounded region replacement
// Pure functions over line arrays; no file I/O. Lines outside the located
// region are passed through untouched.

import type { HeaderRegion, MarkerPair } from "./types.js";
import { INDEX_MARKERS } from "./types.js";

function isBlank(line: string): boolean {
  return line.trim() === "";
}

/**
 * Index of the first line equal to `header` once both are trimmed, or undefined.
 * Internal whitespace is significant.
 */
export function findHeader(
  lines: readonly string[],
  header: string,
  from = 0,
): number | undefined {
  const target = header.trim();
  for (let i = from; i < lines.length; i++) {
    if (lines[i].trim() === target) return i;
  }
  return undefined;
}

/**
 * Locate the header region. `start` is the start header line; `end` is the
 * end header line, or lines.length when the end header is absent.
 */
export function locateRegion(
  lines: readonly string[],
  startHeader: string,
  endHeader: string,
): HeaderRegion | undefined {
  const start = findHeader(lines, startHeader);
  if (start === undefined) return undefined;
  const end = findHeader(lines, endHeader, start + 1) ?? lines.length;
  return { start, end };
}

/**
 * Drop every marker-delimited block, along with the blank lines right before
 * each start marker. An unterminated block runs to the end.
 */
export function removeMarkedBlock(
  lines: readonly string[],
  markers: MarkerPair = INDEX_MARKERS,
): string[] {
  const result: string[] = [];
  let skip = false;
  for (const line of lines) {
    const stripped = line.trim();
    if (stripped === markers.start) {
      skip = true;
      while (result.length > 0 && isBlank(result[result.length - 1])) result.pop();
      continue;
    }
    if (stripped === markers.end) {
      skip = false;
      continue;
    }
    if (!skip) result.push(line);
  }
  return result;
}

export function stripTrailingBlankLines(lines: readonly string[]): string[] {
  let end = lines.length;
  while (end > 0 && isBlank(lines[end - 1])) end--;
  return lines.slice(0, end);
}

/** Exactly one blank line in front of the content; `[""]` for empty content. */
export function ensureLeadingBlankLine(lines: readonly string[]): string[] {
  let first = 0;
  while (first < lines.length && isBlank(lines[first])) first++;
  if (first === lines.length) return [""];
  return ["", ...lines.slice(first)];
}

/**
 * Rebuild the body between the two headers: strip the previous index,
 * normalize blank lines around the human-written text, append the new index.
 */
export function rebuildRegion(
  body: readonly string[],
  indexLines: readonly string[],
  markers: MarkerPair = INDEX_MARKERS,
): string[] {
  const kept = ensureLeadingBlankLine(stripTrailingBlankLines(removeMarkedBlock(body, markers)));
  if (indexLines.length === 0) return kept;
  if (!isBlank(kept[kept.length - 1])) kept.push("");
  return [...kept, ...indexLines];
}

/**
 * Splice `replacement` between the start header (kept) and the end header (kept).
 */
export function replaceRegion(
  lines: readonly string[],
  region: HeaderRegion,
  replacement: readonly string[],
): string[] {
  return [
    ...lines.slice(0, region.start + 1),
    ...replacement,
    ...lines.slice(region.end),
  ];
}

/**
 * Replace the index between `startHeader` and `endHeader`.
 * Returns undefined when the start header is absent so the caller can try
 * another header configuration.
 */
export function replaceSection(
  lines: readonly string[],
  startHeader: string,
  endHeader: string,
  indexLines: readonly string[],
  markers: MarkerPair = INDEX_MARKERS,
): string[] | undefined {
  const region = locateRegion(lines, startHeader, endHeader);
  if (!region) return undefined;
  const body = lines.slice(region.start + 1, region.end);
  return replaceRegion(lines, region, rebuildRegion(body, indexLines, markers));
}

// ─── Text <-> lines ──────────────────────────────────────────────────────────

/** Split document text into lines; a final line terminator adds no empty line. */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** "\r\n" when the text uses it anywhere, otherwise "\n". */
export function detectEol(text: string): string {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

/** Join lines with `eol`, always ending with a line terminator. */
export function joinLines(lines: readonly string[], eol = "\n"): string {
  return lines.join(eol) + eol;
}
