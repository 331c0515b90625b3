/**
 * Notebook outline pipeline: number headings, optionally number exercise
 * markers, then refresh the contents cell. Pure; persistence is the caller's.
 */

import {
  applyContentsPlan,
  collectHeadings,
  planContents,
  type HeadingEntry,
} from "./contents.js";
import { createCounters, numberHeadings } from "./headings.js";
import {
  joinSource,
  parseNotebook,
  requiresCellIds,
  type NotebookCell,
  type NotebookData,
} from "./notebook.js";
import { numberTasks } from "./tasks.js";

/** Id given to an inserted contents cell in nbformat 4.5+ notebooks */
export const CONTENTS_CELL_ID = "notebook-outline-contents";

export interface OutlineOptions {
  /** Number of the first level-1 heading (default 1) */
  startAt?: number;
  /** Insert or refresh the contents cell (default true) */
  contents?: boolean;
  numberedLabels?: boolean;
  includeTitle?: boolean;
  /** Also number exercise task / answer markers */
  tasks?: boolean;
}

export type ContentsStatus = "inserted" | "replaced" | "unchanged" | "skipped";

export interface OutlineResult {
  notebook: NotebookData;
  /** `startAt` for the next notebook of a series */
  nextStartAt: number;
  headings: HeadingEntry[];
  contents: ContentsStatus;
  /** Index of the contents cell in the output */
  contentsIndex: number | undefined;
  /** Input indices of extra contents cells that were removed, ascending */
  removedCells: number[];
  taskCounts: Record<string, number>;
  /** Whether any cell differs from the input */
  changed: boolean;
}

/**
 * An id based on `base` that no cell already uses.
 */
export function uniqueCellId(cells: readonly NotebookCell[], base: string): string {
  const used = new Set(cells.map((cell) => cell.id));
  let id = base;
  let n = 1;
  while (used.has(id)) {
    id = `${base}-${n}`;
    n += 1;
  }
  return id;
}

export function outlineNotebook(
  notebook: NotebookData,
  options: OutlineOptions = {}
): OutlineResult {
  // Validate arguments before anything is computed.
  const counters = createCounters(options.startAt ?? 1);
  const input = parseNotebook(notebook);

  const numbered = numberHeadings(input.cells, counters);
  let cells = numbered.cells;

  let taskCounts: Record<string, number> = {};
  if (options.tasks) {
    const result = numberTasks(cells);
    cells = result.cells;
    taskCounts = result.counts;
  }

  let contents: ContentsStatus = "skipped";
  let contentsIndex: number | undefined;
  let removedCells: number[] = [];
  if (options.contents ?? true) {
    const contentsOptions = {
      numberedLabels: options.numberedLabels,
      includeTitle: options.includeTitle,
    };
    const plan = planContents(cells, contentsOptions);
    const cellId = requiresCellIds(input) ? uniqueCellId(cells, CONTENTS_CELL_ID) : undefined;
    const before = plan.action === "replace" ? joinSource(cells[plan.index]) : undefined;

    cells = applyContentsPlan(cells, plan, cellId);
    contentsIndex = plan.index;
    removedCells = plan.remove;
    if (plan.action === "insert") {
      contents = "inserted";
    } else {
      contents = before === plan.source.join("") && removedCells.length === 0 ? "unchanged" : "replaced";
    }
  }

  const output: NotebookData = { ...input, cells };
  return {
    notebook: output,
    nextStartAt: numbered.counters.next,
    headings: collectHeadings(cells),
    contents,
    contentsIndex,
    removedCells,
    taskCounts,
    changed: JSON.stringify(input.cells) !== JSON.stringify(cells),
  };
}

/**
 * Short comma-separated account of what a run changed.
 */
export function describeOutline(result: OutlineResult): string {
  const parts = [`${result.headings.length} headings`];
  if (result.contents !== "skipped") parts.push(`contents ${result.contents}`);
  if (result.removedCells.length > 0) {
    parts.push(`${result.removedCells.length} duplicate contents removed`);
  }
  for (const [family, count] of Object.entries(result.taskCounts)) {
    parts.push(`${count} ${family}`);
  }
  return parts.join(", ");
}
