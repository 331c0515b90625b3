/**
 * Outline a collaborative notebook held in a Yjs document.
 *
 * JupyterLab's collaboration layer keeps a notebook as `doc.getArray("cells")`
 * of Y.Map cells whose `source` is a Y.Text, plus a `meta` map carrying the
 * nbformat version. The outline is computed on a plain copy and then written
 * back in one transaction, touching only the cells that change.
 */

import * as Y from "yjs";
import { MalformedInputError } from "./errors.js";
import { joinSource, parseCells, type NotebookCell, type NotebookData } from "./notebook.js";
import { outlineNotebook, type OutlineOptions, type OutlineResult } from "./outline.js";

/**
 * Convert the shared cell array to validated plain cells.
 */
export function readYCells(cells: Y.Array<unknown>): NotebookCell[] {
  const plain = cells.toArray().map((cell, index) => {
    if (!(cell instanceof Y.Map)) {
      throw new MalformedInputError(`Cell ${index} is not a shared map`);
    }
    return cell.toJSON();
  });
  return parseCells(plain);
}

function readVersion(meta: Y.Map<unknown>, key: string, fallback: number): number {
  const value = meta.get(key);
  return typeof value === "number" ? value : fallback;
}

/**
 * Build a shared cell from a plain one.
 */
export function toYCell(cell: NotebookCell): Y.Map<unknown> {
  const yCell = new Y.Map<unknown>();
  yCell.set("cell_type", cell.cell_type);
  if (cell.id !== undefined) yCell.set("id", cell.id);
  yCell.set("source", new Y.Text(joinSource(cell)));

  const metadata = new Y.Map<unknown>();
  for (const [key, value] of Object.entries(cell.metadata)) {
    metadata.set(key, value);
  }
  yCell.set("metadata", metadata);

  if (cell.cell_type === "code") {
    yCell.set("outputs", new Y.Array<unknown>());
    yCell.set("execution_count", cell.execution_count);
  }
  return yCell;
}

function writeSource(yCell: Y.Map<unknown>, source: string): void {
  const current = yCell.get("source");
  if (current instanceof Y.Text) {
    if (current.toString() === source) return;
    current.delete(0, current.length);
    current.insert(0, source);
    return;
  }
  yCell.set("source", new Y.Text(source));
}

/**
 * Number headings and refresh the contents cell of a shared notebook.
 */
export function outlineYDoc(doc: Y.Doc, options: OutlineOptions = {}): OutlineResult {
  const yCells = doc.getArray<unknown>("cells");
  const meta = doc.getMap<unknown>("meta");

  const notebook: NotebookData = {
    cells: readYCells(yCells),
    metadata: {},
    nbformat: readVersion(meta, "nbformat", 4),
    nbformat_minor: readVersion(meta, "nbformat_minor", 5),
  };
  const result = outlineNotebook(notebook, options);
  if (!result.changed) return result;

  const cells = result.notebook.cells;
  doc.transact(() => {
    for (const index of [...result.removedCells].reverse()) {
      yCells.delete(index, 1);
    }
    if (result.contents === "inserted" && result.contentsIndex !== undefined) {
      yCells.insert(result.contentsIndex, [toYCell(cells[result.contentsIndex])]);
    }

    cells.forEach((cell, index) => {
      const yCell = yCells.get(index);
      if (yCell instanceof Y.Map) {
        writeSource(yCell, joinSource(cell));
      }
    });
  });

  return result;
}
