import { describe, it, expect } from "vitest";
import { TOC_MARKER } from "./contents.js";
import { InvalidArgumentError, MalformedInputError } from "./errors.js";
import { serializeNotebook } from "./notebook-fs.js";
import { createEmptyNotebook, sourceToLines, type NotebookCell, type NotebookData } from "./notebook.js";
import {
  CONTENTS_CELL_ID,
  describeOutline,
  outlineNotebook,
  uniqueCellId,
} from "./outline.js";

function markdown(source: string, id?: string): NotebookCell {
  return id === undefined
    ? { cell_type: "markdown", metadata: {}, source: sourceToLines(source) }
    : { cell_type: "markdown", id, metadata: {}, source: sourceToLines(source) };
}

function notebookOf(cells: NotebookCell[], nbformatMinor = 5): NotebookData {
  return { ...createEmptyNotebook(), cells, nbformat_minor: nbformatMinor };
}

function sources(nb: NotebookData): string[] {
  return nb.cells.map((cell) => cell.source.join(""));
}

describe("outlineNotebook", () => {
  const titled = () => notebookOf([markdown("# Title"), markdown("## Intro"), markdown("## Setup")]);

  it("numbers headings and inserts the contents after the title", () => {
    const result = outlineNotebook(titled());

    expect(sources(result.notebook)).toEqual([
      "# 1 Title",
      `${TOC_MARKER}\n- [Intro](#intro)\n- [Setup](#setup)`,
      "## 1.1 Intro",
      "## 1.2 Setup",
    ]);
    expect(result.notebook.cells[1].id).toBe(CONTENTS_CELL_ID);
    expect(result.contents).toBe("inserted");
    expect(result.contentsIndex).toBe(1);
    expect(result.nextStartAt).toBe(2);
    expect(result.headings.map((h) => h.anchor)).toEqual(["title", "intro", "setup"]);
    expect(result.changed).toBe(true);
  });

  it("gives byte-identical output when run again", () => {
    const first = outlineNotebook(titled(), { startAt: 1 });
    const second = outlineNotebook(first.notebook, { startAt: 1 });

    expect(second.changed).toBe(false);
    expect(second.contents).toBe("unchanged");
    expect(serializeNotebook(second.notebook)).toBe(serializeNotebook(first.notebook));
  });

  it("omits the cell id before nbformat 4.5", () => {
    const result = outlineNotebook(notebookOf([markdown("# A")], 4));
    expect(result.notebook.cells[1]).toEqual({
      cell_type: "markdown",
      metadata: {},
      source: [TOC_MARKER],
    });
  });

  it("picks an unused id for the contents cell", () => {
    const result = outlineNotebook(notebookOf([markdown("Intro", CONTENTS_CELL_ID), markdown("# A")]));
    expect(result.notebook.cells[0].id).toBe(`${CONTENTS_CELL_ID}-1`);
  });

  it("replaces the contents and drops duplicates", () => {
    const result = outlineNotebook(
      notebookOf([markdown("# T"), markdown(TOC_MARKER), markdown("## A"), markdown(TOC_MARKER)])
    );
    expect(sources(result.notebook)).toEqual(["# 1 T", `${TOC_MARKER}\n- [A](#a)`, "## 1.1 A"]);
    expect(result.contents).toBe("replaced");
    expect(result.removedCells).toEqual([3]);
  });

  it("can skip the contents", () => {
    const result = outlineNotebook(titled(), { contents: false });
    expect(sources(result.notebook)).toEqual(["# 1 Title", "## 1.1 Intro", "## 1.2 Setup"]);
    expect(result.contents).toBe("skipped");
    expect(result.contentsIndex).toBeUndefined();
  });

  it("passes label options through", () => {
    const result = outlineNotebook(titled(), { numberedLabels: true, includeTitle: true, startAt: 4 });
    expect(sources(result.notebook)[1]).toBe(
      `${TOC_MARKER}\n- [4 Title](#title)\n  - [4.1 Intro](#intro)\n  - [4.2 Setup](#setup)`
    );
    expect(result.nextStartAt).toBe(5);
  });

  it("numbers exercise markers on request", () => {
    const nb = notebookOf([
      markdown("# Exercises"),
      { cell_type: "code", execution_count: null, metadata: {}, outputs: [], source: ["#Code task#\n", "pass"] },
    ]);
    const result = outlineNotebook(nb, { tasks: true, contents: false });
    expect(result.notebook.cells[1].source).toEqual(["#Code task 1#\n", "pass"]);
    expect(result.taskCounts).toEqual({ tasks: 1, questions: 0 });
    expect(describeOutline(result)).toBe("1 headings, 1 tasks, 0 questions");
  });

  it("validates startAt before reading the cells", () => {
    expect(() => outlineNotebook(JSON.parse("{}"), { startAt: -2 })).toThrow(InvalidArgumentError);
  });

  it("rejects a malformed notebook", () => {
    expect(() => outlineNotebook(JSON.parse('{"cells": {}}'))).toThrow(MalformedInputError);
  });
});

describe("describeOutline", () => {
  it("summarises headings and contents", () => {
    const result = outlineNotebook(notebookOf([markdown("# Title"), markdown("## Intro"), markdown("## Setup")]));
    expect(describeOutline(result)).toBe("3 headings, contents inserted");
  });
});

describe("uniqueCellId", () => {
  it("returns the base when free", () => {
    expect(uniqueCellId([markdown("x", "a")], "b")).toBe("b");
  });

  it("counts up past taken ids", () => {
    expect(uniqueCellId([markdown("x", "b"), markdown("y", "b-1")], "b")).toBe("b-2");
  });
});
