import { describe, it, expect } from "vitest";
import {
  detectEol,
  ensureLeadingBlankLine,
  findHeader,
  joinLines,
  locateRegion,
  rebuildRegion,
  removeMarkedBlock,
  replaceRegion,
  replaceSection,
  splitLines,
  stripTrailingBlankLines,
} from "../src/section-replacer.js";

const START = "<!-- snippet-index:start -->";
const END = "<!-- snippet-index:end -->";

const INDEX = [START, "## Snippet index", "", "- `a.py`", END, ""];

const DOC = [
  "# Title",
  "intro",
  "## How to navigate",
  "Browse by folder.",
  "## Indexing",
  "footer",
];

// ─── Locating ────────────────────────────────────────────────────────────────

describe("findHeader", () => {
  it("ignores surrounding whitespace on the document line", () => {
    expect(findHeader(["x", "  ## How to navigate  "], "## How to navigate")).toBe(1);
  });

  it("treats internal whitespace as significant", () => {
    expect(findHeader(["##  How to navigate"], "## How to navigate")).toBeUndefined();
  });

  it("returns the first match", () => {
    expect(findHeader(["## A", "## A"], "## A")).toBe(0);
  });

  it("starts from the given offset", () => {
    expect(findHeader(["## A", "x", "## A"], "## A", 1)).toBe(2);
  });
});

describe("locateRegion", () => {
  it("returns start and end header indexes", () => {
    expect(locateRegion(DOC, "## How to navigate", "## Indexing")).toEqual({ start: 2, end: 4 });
  });

  it("extends to the end of the document without an end header", () => {
    expect(locateRegion(DOC, "## How to navigate", "## Missing")).toEqual({ start: 2, end: 6 });
  });

  it("only looks for the end header after the start header", () => {
    const lines = ["## Indexing", "## How to navigate", "text"];
    expect(locateRegion(lines, "## How to navigate", "## Indexing")).toEqual({ start: 1, end: 3 });
  });

  it("returns undefined when the start header is absent", () => {
    expect(locateRegion(DOC, "## Come navigare", "## Indicizzazione")).toBeUndefined();
  });
});

// ─── Body transformations ────────────────────────────────────────────────────

describe("removeMarkedBlock", () => {
  it("drops the block and the blank lines before it", () => {
    expect(removeMarkedBlock(["x", "", "", START, "generated", END, "y"])).toEqual(["x", "y"]);
  });

  it("keeps lines after the end marker", () => {
    expect(removeMarkedBlock([START, "generated", END, "", "after"])).toEqual(["", "after"]);
  });

  it("leaves unmarked content alone", () => {
    expect(removeMarkedBlock(["- `old.py`", ""])).toEqual(["- `old.py`", ""]);
  });

  it("recognizes indented markers", () => {
    expect(removeMarkedBlock(["a", `  ${START}`, "b", `${END}  `])).toEqual(["a"]);
  });
});

describe("blank line helpers", () => {
  it("strips trailing blank and whitespace-only lines", () => {
    expect(stripTrailingBlankLines(["a", "", "  ", ""])).toEqual(["a"]);
  });

  it("prepends a blank line before text", () => {
    expect(ensureLeadingBlankLine(["a"])).toEqual(["", "a"]);
  });

  it("collapses several leading blank lines into one", () => {
    expect(ensureLeadingBlankLine(["", "", "a"])).toEqual(["", "a"]);
  });

  it("turns empty content into a single blank line", () => {
    expect(ensureLeadingBlankLine([])).toEqual([""]);
  });
});

describe("rebuildRegion", () => {
  it("separates human text and the index with one blank line", () => {
    expect(rebuildRegion(["Browse by folder."], INDEX)).toEqual(["", "Browse by folder.", "", ...INDEX]);
  });

  it("puts the index right after the leading blank line of an empty body", () => {
    expect(rebuildRegion([], INDEX)).toEqual(["", ...INDEX]);
  });

  it("returns only the human text when there is no index", () => {
    expect(rebuildRegion(["", "", "x", ""], [])).toEqual(["", "x"]);
  });

  it("keeps unmarked prior index content and appends the new index", () => {
    expect(rebuildRegion(["- `old.py`"], INDEX)).toEqual(["", "- `old.py`", "", ...INDEX]);
  });
});

// ─── Replacement ─────────────────────────────────────────────────────────────

describe("replaceRegion", () => {
  it("keeps both header lines and replaces what lies between", () => {
    expect(replaceRegion(["a", "b", "c", "d"], { start: 0, end: 3 }, ["X"])).toEqual(["a", "X", "d"]);
  });

  it("appends at the end when the region runs to the end", () => {
    expect(replaceRegion(["a", "b"], { start: 0, end: 2 }, ["X"])).toEqual(["a", "X"]);
  });
});

describe("replaceSection", () => {
  it("inserts the index inside the header region", () => {
    expect(replaceSection(DOC, "## How to navigate", "## Indexing", INDEX)).toEqual([
      "# Title",
      "intro",
      "## How to navigate",
      "",
      "Browse by folder.",
      "",
      ...INDEX,
      "## Indexing",
      "footer",
    ]);
  });

  it("is idempotent", () => {
    const once = replaceSection(DOC, "## How to navigate", "## Indexing", INDEX);
    expect(once).toBeDefined();
    const twice = replaceSection(once ?? [], "## How to navigate", "## Indexing", INDEX);
    expect(twice).toEqual(once);
  });

  it("replaces a stale index instead of adding a second one", () => {
    const once = replaceSection(DOC, "## How to navigate", "## Indexing", INDEX) ?? [];
    const fresh = [START, "## Snippet index", "", "- `b.py`", END, ""];
    const updated = replaceSection(once, "## How to navigate", "## Indexing", fresh) ?? [];
    expect(updated.filter((l) => l === START)).toHaveLength(1);
    expect(updated).toContain("- `b.py`");
    expect(updated).not.toContain("- `a.py`");
  });

  it("leaves lines outside the headers untouched", () => {
    const doc = ["pre  ", "", "## How to navigate", "body", "## Indexing", "\tpost", "", ""];
    const updated = replaceSection(doc, "## How to navigate", "## Indexing", INDEX) ?? [];
    expect(updated.slice(0, 3)).toEqual(doc.slice(0, 3));
    expect(updated.slice(updated.indexOf("## Indexing"))).toEqual(doc.slice(4));
  });

  it("is idempotent without an end header", () => {
    const doc = ["## How to navigate", "text"];
    const once = replaceSection(doc, "## How to navigate", "## Indexing", INDEX) ?? [];
    expect(once).toEqual(["## How to navigate", "", "text", "", ...INDEX]);
    const reread = splitLines(joinLines(once));
    expect(replaceSection(reread, "## How to navigate", "## Indexing", INDEX)).toEqual(once);
  });

  it("returns undefined when the start header is missing", () => {
    expect(replaceSection(DOC, "## Come navigare", "## Indicizzazione", INDEX)).toBeUndefined();
  });
});

describe("splitLines / joinLines", () => {
  it("does not produce an empty line for the final terminator", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
  });

  it("recognizes CRLF line endings", () => {
    expect(splitLines("a\r\nb")).toEqual(["a", "b"]);
  });

  it("keeps intentional trailing blank lines", () => {
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
  });

  it("splits empty text into no lines", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("ends joined text with a newline", () => {
    expect(joinLines(["a", "b"])).toBe("a\nb\n");
  });

  it("joins with the given line ending", () => {
    expect(joinLines(["a", "b"], "\r\n")).toBe("a\r\nb\r\n");
  });

  it("detects CRLF documents", () => {
    expect(detectEol("a\r\nb\r\n")).toBe("\r\n");
    expect(detectEol("a\nb")).toBe("\n");
  });
});
