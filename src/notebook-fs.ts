/**
 * Filesystem backend for notebook operations.
 * Reads/writes .ipynb files directly.
 */

import { randomUUID } from "node:crypto";
import { copyFile, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve, basename } from "node:path";
import { MalformedInputError, NotebookIoError } from "./errors.js";
import { parseNotebook, type NotebookData } from "./notebook.js";

export interface WriteNotebookOptions {
  /** Copy the existing file to `<path>.bak` before replacing it */
  backup?: boolean;
}

function isEnoent(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read, parse and validate a .ipynb file from disk.
 */
export async function readNotebook(path: string): Promise<NotebookData> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new NotebookIoError(path, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedInputError(`${path}: invalid JSON (${detail})`, { cause: error });
  }

  try {
    return parseNotebook(raw);
  } catch (error) {
    if (error instanceof MalformedInputError) {
      throw new MalformedInputError(`${path}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Serialize in standard .ipynb format: 1-space indent and trailing newline
 * (matches Jupyter's format).
 */
export function serializeNotebook(nb: NotebookData): string {
  return JSON.stringify(nb, null, 1) + "\n";
}

/**
 * Write a notebook to disk, replacing the target through a temporary file
 * in the same directory and a rename.
 */
export async function writeNotebook(
  path: string,
  nb: NotebookData,
  options: WriteNotebookOptions = {}
): Promise<void> {
  const json = serializeNotebook(nb);
  const tmpPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);

  try {
    if (options.backup) {
      try {
        await copyFile(path, `${path}.bak`);
      } catch (error) {
        // Nothing to back up for a new file.
        if (!isEnoent(error)) throw error;
      }
    }
    await writeFile(tmpPath, json, "utf-8");
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new NotebookIoError(path, error);
  }
}

/**
 * Resolve a notebook path relative to cwd (or return as-is if absolute).
 */
export function resolveNotebookPath(path: string, cwd: string = process.cwd()): string {
  if (isAbsolute(path)) {
    return path;
  }
  return resolve(cwd, path);
}
