/**
 * Outline one notebook file, or several in order.
 *
 * Files are processed one at a time because, with `continueNumbering`, each
 * notebook's first chapter number depends on where the previous one ended.
 * A failure is recorded against its file and never undoes or stops the rest.
 */

import { createCounters } from "./headings.js";
import { readNotebook, resolveNotebookPath, writeNotebook } from "./notebook-fs.js";
import { outlineNotebook, type OutlineOptions, type OutlineResult } from "./outline.js";

export interface FileOptions extends OutlineOptions {
  /** Report what would change without writing */
  dryRun?: boolean;
  backup?: boolean;
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
}

export interface SeriesOptions extends FileOptions {
  /** Start each notebook where the previous one's numbering stopped */
  continueNumbering?: boolean;
}

export interface FileOutcome {
  path: string;
  result: OutlineResult;
  /** Whether the file on disk was replaced */
  written: boolean;
}

export type SeriesEntry =
  | ({ ok: true } & FileOutcome)
  | { ok: false; path: string; error: Error };

/**
 * Load, outline and (unless unchanged or a dry run) rewrite one notebook.
 */
export async function processNotebookFile(
  path: string,
  options: FileOptions = {}
): Promise<FileOutcome> {
  const resolved = resolveNotebookPath(path, options.cwd);
  const notebook = await readNotebook(resolved);
  const result = outlineNotebook(notebook, options);

  const written = result.changed && !options.dryRun;
  if (written) {
    await writeNotebook(resolved, result.notebook, { backup: options.backup });
  }
  return { path: resolved, result, written };
}

/**
 * Process notebooks strictly in order, isolating failures per file.
 */
export async function processSeries(
  paths: readonly string[],
  options: SeriesOptions = {}
): Promise<SeriesEntry[]> {
  let startAt = createCounters(options.startAt ?? 1).next;
  const entries: SeriesEntry[] = [];

  for (const path of paths) {
    try {
      const outcome = await processNotebookFile(path, { ...options, startAt });
      entries.push({ ok: true, ...outcome });
      if (options.continueNumbering) {
        startAt = outcome.result.nextStartAt;
      }
    } catch (error) {
      entries.push({
        ok: false,
        path: resolveNotebookPath(path, options.cwd),
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  return entries;
}
