/**
 * Hierarchical heading numbering across a notebook's Markdown cells.
 *
 * Numbering is a pure function of (cells, counters): the counter state is an
 * explicit value passed in and handed back, so a series of notebooks can
 * continue numbering where the previous one stopped.
 */

import { InvalidArgumentError } from "./errors.js";
import { isContentsCell, scanHeadings, stripNumber } from "./markdown.js";
import { isMarkdown, parseCells, type NotebookCell } from "./notebook.js";

export const MAX_HEADING_LEVEL = 6;

export interface HeadingCounters {
  /** Number the next level-1 heading receives */
  readonly next: number;
  /** Current number per level; index 0 is level 1 */
  readonly counts: readonly number[];
}

function assertStartAt(startAt: number): void {
  if (!Number.isInteger(startAt) || startAt < 0) {
    throw new InvalidArgumentError(
      `startAt must be a non-negative integer, got ${startAt}`
    );
  }
}

/**
 * Fresh counters whose first level-1 heading is numbered `startAt`.
 */
export function createCounters(startAt: number): HeadingCounters {
  assertStartAt(startAt);
  return {
    next: startAt,
    counts: new Array<number>(MAX_HEADING_LEVEL).fill(0),
  };
}

/**
 * Count one heading at `level`. Deeper levels are cleared; shallower levels
 * keep their values (0 if no heading has opened them yet).
 */
export function advanceCounters(
  counters: HeadingCounters,
  level: number
): { counters: HeadingCounters; number: number[] } {
  if (!Number.isInteger(level) || level < 1 || level > MAX_HEADING_LEVEL) {
    throw new InvalidArgumentError(`Heading level must be 1-${MAX_HEADING_LEVEL}, got ${level}`);
  }

  const counts = Array.from({ length: MAX_HEADING_LEVEL }, (_, i) => counters.counts[i] ?? 0);
  let next = counters.next;

  if (level === 1) {
    counts[0] = next;
    next += 1;
  } else {
    counts[level - 1] += 1;
  }
  for (let i = level; i < MAX_HEADING_LEVEL; i++) {
    counts[i] = 0;
  }

  return { counters: { next, counts }, number: counts.slice(0, level) };
}

export function formatNumber(number: readonly number[]): string {
  return number.join(".");
}

/**
 * Number every heading, starting from the given counter state.
 * Returns new cells plus the counter state after the last heading.
 */
export function numberHeadings(
  cells: readonly NotebookCell[],
  counters: HeadingCounters
): { cells: NotebookCell[]; counters: HeadingCounters } {
  assertStartAt(counters.next);
  const parsed = parseCells(cells);
  let state = counters;

  const numbered = parsed.map((cell) => {
    if (!isMarkdown(cell) || isContentsCell(cell)) return cell;

    const headings = scanHeadings(cell.source);
    if (headings.length === 0) return cell;

    const source = [...cell.source];
    for (const heading of headings) {
      const step = advanceCounters(state, heading.level);
      state = step.counters;
      const { text } = stripNumber(heading.text);
      source[heading.line] =
        `${heading.indent}${"#".repeat(heading.level)} ${formatNumber(step.number)} ${text}${heading.ending}`;
    }
    return { ...cell, source };
  });

  return { cells: numbered, counters: state };
}

/**
 * Number all headings so the first level-1 heading gets `startAt`.
 * Rejects a negative or fractional `startAt` before touching any cell.
 */
export function numberAll(cells: readonly NotebookCell[], startAt: number): NotebookCell[] {
  return numberHeadings(cells, createCounters(startAt)).cells;
}
