/**
 * Generated table of contents.
 *
 * The contents live in a single Markdown cell marked with TOC_MARKER. Each
 * run rebuilds the outline from the current headings and either replaces
 * that cell in place or inserts a new one near the top of the notebook.
 */

import { isContentsCell, parseHeading, scanHeadings, stripNumber, TOC_MARKER } from "./markdown.js";
import {
  isMarkdown,
  parseCells,
  sourceToLines,
  splitLineEnding,
  type MarkdownCell,
  type NotebookCell,
} from "./notebook.js";

export { TOC_MARKER } from "./markdown.js";

export interface HeadingEntry {
  level: number;
  /** Section number parsed from the heading; empty when unnumbered */
  number: number[];
  /** Heading text without its number */
  text: string;
  anchor: string;
  /** Index of the cell the heading was found in */
  cell: number;
}

export interface ContentsOptions {
  /** Prefix each link label with its section number */
  numberedLabels?: boolean;
  /** List the heading of a title cell that is the only level-1 heading */
  includeTitle?: boolean;
  /** Id for a newly inserted contents cell (nbformat 4.5+) */
  cellId?: string;
}

export interface ContentsPlan {
  /** Replace the existing contents cell, or insert a new one */
  action: "replace" | "insert";
  index: number;
  /** Extra contents cells to drop, ascending */
  remove: number[];
  source: string[];
  headings: HeadingEntry[];
}

/**
 * Anchor slug for heading text: lower-case ASCII letters and digits,
 * accents folded, other characters dropped, whitespace turned into hyphens.
 */
export function slugify(text: string): string {
  const slug = text
    .normalize("NFKD")
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "")
    .trim()
    .replace(/\s/g, "-");
  return slug || "section";
}

/**
 * Unique anchors for a list of heading texts, in order.
 * Repeats get -1, -2, etc.
 */
export function uniqueAnchors(texts: readonly string[]): string[] {
  const used = new Set<string>();
  return texts.map((text) => {
    const base = slugify(text);
    let anchor = base;
    let n = 1;
    while (used.has(anchor)) {
      anchor = `${base}-${n}`;
      n += 1;
    }
    used.add(anchor);
    return anchor;
  });
}

/**
 * A leading title cell: the first cell, Markdown, holding exactly one
 * level-1 heading and nothing else.
 */
export function isTitleCell(cell: NotebookCell | undefined): boolean {
  if (!cell || !isMarkdown(cell) || isContentsCell(cell)) return false;
  const content = cell.source.filter((line) => line.trim() !== "");
  if (content.length !== 1) return false;
  return parseHeading(splitLineEnding(content[0]).body)?.level === 1;
}

/**
 * Collect every heading in document order, contents cells excluded.
 */
export function collectHeadings(cells: readonly NotebookCell[]): HeadingEntry[] {
  const found: Omit<HeadingEntry, "anchor">[] = [];

  cells.forEach((cell, index) => {
    if (!isMarkdown(cell) || isContentsCell(cell)) return;
    for (const heading of scanHeadings(cell.source)) {
      const { number, text } = stripNumber(heading.text);
      found.push({ level: heading.level, number, text, cell: index });
    }
  });

  const anchors = uniqueAnchors(found.map((entry) => entry.text));
  return found.map((entry, i) => ({ ...entry, anchor: anchors[i] }));
}

function escapeLabel(label: string): string {
  return label.replace(/[[\]]/g, "\\$&");
}

/**
 * Render the contents cell source: the marker line, then a nested list of
 * links indented two spaces per level below the shallowest entry.
 */
export function renderContents(
  entries: readonly HeadingEntry[],
  options: Pick<ContentsOptions, "numberedLabels"> = {}
): string[] {
  const lines = [TOC_MARKER];
  if (entries.length > 0) {
    const minLevel = Math.min(...entries.map((entry) => entry.level));
    for (const entry of entries) {
      const label =
        options.numberedLabels && entry.number.length > 0
          ? `${entry.number.join(".")} ${entry.text}`
          : entry.text;
      lines.push(`${"  ".repeat(entry.level - minLevel)}- [${escapeLabel(label)}](#${entry.anchor})`);
    }
  }
  return sourceToLines(lines.join("\n"));
}

function plan(cells: readonly NotebookCell[], options: ContentsOptions): ContentsPlan {
  const hasTitle = isTitleCell(cells[0]);
  const all = collectHeadings(cells);
  // A title cell is only a document title when no other chapter follows it.
  const skipTitle =
    hasTitle && !options.includeTitle && all.filter((entry) => entry.level === 1).length === 1;
  const headings = skipTitle ? all.filter((entry) => entry.cell !== 0) : all;
  const source = renderContents(headings, options);

  const existing: number[] = [];
  cells.forEach((cell, index) => {
    if (isContentsCell(cell)) existing.push(index);
  });

  if (existing.length > 0) {
    const [index, ...remove] = existing;
    return { action: "replace", index, remove, source, headings };
  }
  return { action: "insert", index: hasTitle ? 1 : 0, remove: [], source, headings };
}

/**
 * Decide where the contents go without building the new cell list.
 */
export function planContents(
  cells: readonly NotebookCell[],
  options: ContentsOptions = {}
): ContentsPlan {
  return plan(parseCells(cells), options);
}

/**
 * Build the cell list a plan describes. `cells` must already be validated
 * (the output of parseCells or of another operation in this package).
 */
export function applyContentsPlan(
  cells: readonly NotebookCell[],
  contents: ContentsPlan,
  cellId?: string
): NotebookCell[] {
  const { action, index, remove, source } = contents;

  if (action === "replace") {
    return cells
      .map((cell, i) => (i === index ? { ...cell, source } : cell))
      .filter((_, i) => !remove.includes(i));
  }

  const contentsCell: MarkdownCell = cellId
    ? { cell_type: "markdown", id: cellId, metadata: {}, source }
    : { cell_type: "markdown", metadata: {}, source };
  return [...cells.slice(0, index), contentsCell, ...cells.slice(index)];
}

/**
 * Insert or refresh the contents cell. Duplicate contents cells (from manual
 * edits) are dropped, keeping the first. Returns new cells.
 */
export function insertContents(
  cells: readonly NotebookCell[],
  options: ContentsOptions = {}
): NotebookCell[] {
  const parsed = parseCells(cells);
  return applyContentsPlan(parsed, plan(parsed, options), options.cellId);
}
