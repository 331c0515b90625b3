/**
 * Exercise and solution copies of a course notebook.
 *
 * - The exercise copy blanks written answers and drops code answer cells.
 * - The solution copy drops the code task cells that answers replace.
 * Both turn raw cells (often used to park unrun answers) into code cells.
 */

import { parseCells, type CodeCell, type NotebookCell, type NotebookData } from "./notebook.js";
import { CODE_TASKS, MarkerTemplate, QUESTIONS } from "./tasks.js";

export const ANSWER_PLACEHOLDER = " Your answer here";

export interface VariantOptions {
  /** Code-cell markers (task / answer templates) */
  code?: { task: string; answer: string };
  /** Markdown question markers */
  questions?: { task: string; answer: string };
}

function toCodeCell(cell: NotebookCell): NotebookCell {
  if (cell.cell_type !== "raw") return cell;
  const code: CodeCell = {
    cell_type: "code",
    execution_count: null,
    ...(cell.id !== undefined ? { id: cell.id } : {}),
    metadata: cell.metadata,
    outputs: [],
    source: cell.source,
  };
  return code;
}

function firstLine(cell: NotebookCell): string {
  return cell.source[0] ?? "";
}

/**
 * Copy for students: answers replaced by a placeholder, code answers removed.
 */
export function exerciseVersion(notebook: NotebookData, options: VariantOptions = {}): NotebookData {
  const writtenAnswer = new MarkerTemplate(options.questions?.answer ?? QUESTIONS.answer);
  const codeAnswer = new MarkerTemplate(options.code?.answer ?? CODE_TASKS.answer);
  const cells: NotebookCell[] = [];

  for (const cell of parseCells(notebook.cells)) {
    if (cell.cell_type === "markdown") {
      const marker = writtenAnswer.match(firstLine(cell));
      cells.push(marker === undefined ? cell : { ...cell, source: [marker + ANSWER_PLACEHOLDER] });
      continue;
    }
    if (codeAnswer.match(firstLine(cell)) !== undefined) continue;
    cells.push(toCodeCell(cell));
  }

  return { ...notebook, cells };
}

/**
 * Copy for instructors: code task stubs removed, answers kept.
 */
export function solutionVersion(notebook: NotebookData, options: VariantOptions = {}): NotebookData {
  const codeTask = new MarkerTemplate(options.code?.task ?? CODE_TASKS.task);
  const cells: NotebookCell[] = [];

  for (const cell of parseCells(notebook.cells)) {
    if (cell.cell_type !== "markdown" && codeTask.match(firstLine(cell)) !== undefined) continue;
    cells.push(toCodeCell(cell));
  }

  return { ...notebook, cells };
}
