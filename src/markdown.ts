/**
 * ATX heading detection shared by heading numbering and the contents builder.
 */

import { isMarkdown, splitLineEnding, type NotebookCell } from "./notebook.js";

/** First line of the generated table-of-contents cell */
export const TOC_MARKER = "<!-- notebook-outline:contents -->";

// Up to 3 spaces of indentation, 1-6 hashes, whitespace, non-blank text.
const HEADING_RE = /^( {0,3})(#{1,6})[ \t]+(\S.*?)[ \t]*$/;
const NUMBER_PREFIX_RE = /^(\d+(?:\.\d+)*)\.?[ \t]+/;
const FENCE_RE = /^ {0,3}(`{3,}|~{3,})/;

export interface HeadingLine {
  indent: string;
  level: number;
  /** Heading text as written, including any number prefix */
  text: string;
}

export interface LocatedHeading extends HeadingLine {
  /** Index of the line within the cell source */
  line: number;
  ending: string;
}

/**
 * Parse a single line (without its line ending) as an ATX heading.
 */
export function parseHeading(line: string): HeadingLine | undefined {
  const match = line.match(HEADING_RE);
  if (!match) return undefined;
  return {
    indent: match[1],
    level: match[2].length,
    text: match[3],
  };
}

/**
 * Split a leading section number ("1", "1.2", "1.2.") off heading text.
 */
export function stripNumber(text: string): { number: number[]; text: string } {
  const match = text.match(NUMBER_PREFIX_RE);
  if (!match) return { number: [], text };
  return {
    number: match[1].split(".").map((part) => parseInt(part, 10)),
    text: text.slice(match[0].length),
  };
}

/**
 * Find heading lines in a Markdown source, skipping fenced code blocks.
 */
export function scanHeadings(lines: readonly string[]): LocatedHeading[] {
  const found: LocatedHeading[] = [];
  let fence: { char: string; length: number } | undefined;

  lines.forEach((raw, index) => {
    const { body, ending } = splitLineEnding(raw);
    const fenceMatch = body.match(FENCE_RE);

    if (fence) {
      if (
        fenceMatch &&
        fenceMatch[1][0] === fence.char &&
        fenceMatch[1].length >= fence.length &&
        body.trim() === fenceMatch[1]
      ) {
        fence = undefined;
      }
      return;
    }

    if (fenceMatch) {
      fence = { char: fenceMatch[1][0], length: fenceMatch[1].length };
      return;
    }

    const heading = parseHeading(body);
    if (heading) {
      found.push({ ...heading, line: index, ending });
    }
  });

  return found;
}

/**
 * A Markdown cell whose first line is the contents marker.
 */
export function isContentsCell(cell: NotebookCell): boolean {
  return isMarkdown(cell) && splitLineEnding(cell.source[0] ?? "").body.trim() === TOC_MARKER;
}
