/**
 * Notebook data model (matches the nbformat 4 .ipynb JSON structure).
 *
 * Cell sources are always held as line arrays: each line except the last
 * ends with "\n". Parsing normalises string sources and unsplit arrays.
 */

import * as z from "zod";
import { MalformedInputError } from "./errors.js";

/**
 * Convert a source string to the .ipynb line array format.
 * Each line except the last ends with \n.
 * Example: "a\nb" → ["a\n", "b"]
 * Empty string → []
 */
export function sourceToLines(source: string): string[] {
  if (!source) return [];
  const lines = source.split("\n");
  const out: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    if (i < lines.length - 1) {
      out.push(lines[i] + "\n");
    } else if (lines[i] !== "") {
      out.push(lines[i]);
    }
  }
  return out;
}

const sourceSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((source) => sourceToLines(Array.isArray(source) ? source.join("") : source));

const metadataSchema = z.record(z.unknown()).default({});

// Keys are declared in sorted order; parsed objects keep that order, which is
// also the order Jupyter writes.
const markdownCellSchema = z.object({
  attachments: z.record(z.unknown()).optional(),
  cell_type: z.literal("markdown"),
  id: z.string().optional(),
  metadata: metadataSchema,
  source: sourceSchema,
});

const codeCellSchema = z.object({
  cell_type: z.literal("code"),
  execution_count: z.number().int().nullable().default(null),
  id: z.string().optional(),
  metadata: metadataSchema,
  outputs: z.array(z.unknown()).default([]),
  source: sourceSchema,
});

const rawCellSchema = z.object({
  attachments: z.record(z.unknown()).optional(),
  cell_type: z.literal("raw"),
  id: z.string().optional(),
  metadata: metadataSchema,
  source: sourceSchema,
});

export const cellSchema = z.discriminatedUnion("cell_type", [
  markdownCellSchema,
  codeCellSchema,
  rawCellSchema,
]);

export const notebookSchema = z.object({
  cells: z.array(cellSchema),
  metadata: metadataSchema,
  nbformat: z.number().int(),
  nbformat_minor: z.number().int(),
});

export type MarkdownCell = z.output<typeof markdownCellSchema>;
export type CodeCell = z.output<typeof codeCellSchema>;
export type RawCell = z.output<typeof rawCellSchema>;

/** A single notebook cell */
export type NotebookCell = z.output<typeof cellSchema>;

export type CellType = NotebookCell["cell_type"];

/** Full notebook structure */
export type NotebookData = z.output<typeof notebookSchema>;

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid notebook structure";
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

/**
 * Validate and normalise a cell list. Always returns fresh cell objects.
 */
export function parseCells(value: unknown): NotebookCell[] {
  const result = z.array(cellSchema).safeParse(value);
  if (!result.success) {
    throw new MalformedInputError(`Malformed cell list at ${describeIssue(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Validate and normalise a whole notebook document.
 */
export function parseNotebook(value: unknown): NotebookData {
  const result = notebookSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedInputError(`Malformed notebook at ${describeIssue(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function joinSource(cell: NotebookCell): string {
  return cell.source.join("");
}

export function isMarkdown(cell: NotebookCell): cell is MarkdownCell {
  return cell.cell_type === "markdown";
}

/**
 * Split a source line into its text and its line ending ("\n", "\r\n" or "").
 */
export function splitLineEnding(line: string): { body: string; ending: string } {
  if (line.endsWith("\r\n")) return { body: line.slice(0, -2), ending: "\r\n" };
  if (line.endsWith("\n")) return { body: line.slice(0, -1), ending: "\n" };
  return { body: line, ending: "" };
}

/**
 * Whether this notebook's format version requires cell ids (nbformat 4.5+).
 */
export function requiresCellIds(notebook: Pick<NotebookData, "nbformat" | "nbformat_minor">): boolean {
  return notebook.nbformat > 4 || (notebook.nbformat === 4 && notebook.nbformat_minor >= 5);
}

/**
 * Create a blank notebook structure.
 */
export function createEmptyNotebook(kernelName: string = "python3"): NotebookData {
  return {
    cells: [],
    metadata: {
      kernelspec: {
        display_name: kernelName === "python3" ? "Python 3" : kernelName,
        language: "python",
        name: kernelName,
      },
    },
    nbformat: 4,
    nbformat_minor: 5,
  };
}
