import { describe, it, expect } from "vitest";
import { InvalidArgumentError, MalformedInputError } from "./errors.js";
import { advanceCounters, createCounters, numberAll, numberHeadings } from "./headings.js";
import { TOC_MARKER } from "./markdown.js";
import { sourceToLines, type NotebookCell } from "./notebook.js";

function markdown(source: string): NotebookCell {
  return { cell_type: "markdown", metadata: {}, source: sourceToLines(source) };
}

function code(source: string): NotebookCell {
  return { cell_type: "code", execution_count: null, metadata: {}, outputs: [], source: sourceToLines(source) };
}

function sources(cells: NotebookCell[]): string[] {
  return cells.map((cell) => cell.source.join(""));
}

describe("numberAll", () => {
  it("numbers a title and two sections", () => {
    const cells = [markdown("# Title"), markdown("## Intro"), markdown("## Setup")];
    expect(sources(numberAll(cells, 1))).toEqual(["# 1 Title", "## 1.1 Intro", "## 1.2 Setup"]);
  });

  it("resets deeper counters on a new chapter", () => {
    const cells = [markdown("# A"), markdown("## X"), markdown("# B"), markdown("## X")];
    expect(sources(numberAll(cells, 1))).toEqual(["# 1 A", "## 1.1 X", "# 2 B", "## 2.1 X"]);
  });

  it("starts chapters at startAt", () => {
    expect(sources(numberAll([markdown("# Only")], 5))).toEqual(["# 5 Only"]);
  });

  it("allows startAt 0", () => {
    expect(sources(numberAll([markdown("# Zero\n# One")], 0))).toEqual(["# 0 Zero\n# 1 One"]);
  });

  it("numbers missing ancestors as 0", () => {
    expect(sources(numberAll([markdown("### Title")], 1))).toEqual(["### 0.0.1 Title"]);
    expect(sources(numberAll([markdown("# A\n### Deep")], 1))).toEqual(["# 1 A\n### 1.0.1 Deep"]);
  });

  it("numbers several headings within one cell", () => {
    const cells = [markdown("# A\nSome text.\n## B\n\n## C\n")];
    expect(sources(numberAll(cells, 1))).toEqual(["# 1 A\nSome text.\n## 1.1 B\n\n## 1.2 C\n"]);
  });

  it("replaces stale numbers instead of stacking them", () => {
    const cells = [markdown("# 3.2 Intro"), markdown("## 7. Setup")];
    expect(sources(numberAll(cells, 1))).toEqual(["# 1 Intro", "## 1.1 Setup"]);
  });

  it("keeps indentation and normalises the space after the hashes", () => {
    expect(sources(numberAll([markdown("  ##   Sub")], 1))).toEqual(["  ## 0.1 Sub"]);
  });

  it("leaves malformed markers and fenced code alone", () => {
    const cells = [markdown("#NoSpace\n####### Seven\n```\n# comment\n```\n# Real")];
    expect(sources(numberAll(cells, 1))).toEqual(["#NoSpace\n####### Seven\n```\n# comment\n```\n# 1 Real"]);
  });

  it("does not touch code cells or the contents cell", () => {
    const cells = [code("# a comment"), markdown(`${TOC_MARKER}\n# Not numbered`), markdown("# A")];
    expect(sources(numberAll(cells, 1))).toEqual([
      "# a comment",
      `${TOC_MARKER}\n# Not numbered`,
      "# 1 A",
    ]);
  });

  it("is idempotent", () => {
    const cells = [markdown("# A\n## B"), code("x = 1"), markdown("### C\n# D\n## E")];
    const once = numberAll(cells, 2);
    expect(numberAll(once, 2)).toEqual(once);
  });

  it("keeps numbers increasing within a level between resets", () => {
    const cells = [markdown("# A\n## a\n## b\n### i\n## c\n# B\n## d")];
    expect(sources(numberAll(cells, 1))).toEqual([
      "# 1 A\n## 1.1 a\n## 1.2 b\n### 1.2.1 i\n## 1.3 c\n# 2 B\n## 2.1 d",
    ]);
  });

  it("does not mutate its input", () => {
    const cells = [markdown("# A"), markdown("## B")];
    const before = JSON.parse(JSON.stringify(cells));
    numberAll(cells, 1);
    expect(cells).toEqual(before);
  });

  it("keeps metadata and ids", () => {
    const cell: NotebookCell = { cell_type: "markdown", id: "c1", metadata: { tags: ["intro"] }, source: ["# A"] };
    expect(numberAll([cell], 1)[0]).toEqual({ cell_type: "markdown", id: "c1", metadata: { tags: ["intro"] }, source: ["# 1 A"] });
  });

  it("rejects a negative or fractional startAt", () => {
    expect(() => numberAll([markdown("# A")], -1)).toThrow(InvalidArgumentError);
    expect(() => numberAll([markdown("# A")], 1.5)).toThrow(/non-negative integer/);
  });

  it("rejects a malformed cell list", () => {
    expect(() => numberAll(JSON.parse('[{"cell_type": "markdown", "metadata": {}}]'), 1)).toThrow(
      MalformedInputError
    );
    expect(() => numberAll(JSON.parse('[{"cell_type": "heading", "source": []}]'), 1)).toThrow(
      /Malformed cell list at 0\.cell_type/
    );
  });
});

describe("numberHeadings", () => {
  it("returns the counter state after the last heading", () => {
    const { counters } = numberHeadings([markdown("# A\n## X\n# B")], createCounters(3));
    expect(counters).toEqual({ next: 5, counts: [4, 0, 0, 0, 0, 0] });
  });

  it("continues from a previous notebook's counters", () => {
    const first = numberHeadings([markdown("# A\n## X")], createCounters(1));
    const second = numberHeadings([markdown("## Y\n# B")], first.counters);
    expect(sources(second.cells)).toEqual(["## 1.2 Y\n# 2 B"]);
  });
});

describe("advanceCounters", () => {
  it("clears deeper levels only", () => {
    const start = { next: 2, counts: [1, 3, 2, 0, 0, 0] };
    expect(advanceCounters(start, 2)).toEqual({
      counters: { next: 2, counts: [1, 4, 0, 0, 0, 0] },
      number: [1, 4],
    });
  });

  it("rejects levels outside 1-6", () => {
    expect(() => advanceCounters(createCounters(1), 7)).toThrow(InvalidArgumentError);
  });
});
