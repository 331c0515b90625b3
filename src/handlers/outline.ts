import * as z from "zod";
import type { ToolHandlers } from "../handler-types.js";
import { InvalidArgumentError } from "../errors.js";
import { collectHeadings, insertContents, planContents } from "../contents.js";
import { numberAll } from "../headings.js";
import { isContentsCell } from "../markdown.js";
import { readNotebook, resolveNotebookPath, writeNotebook } from "../notebook-fs.js";
import { joinSource, requiresCellIds, type NotebookData } from "../notebook.js";
import { CONTENTS_CELL_ID, uniqueCellId } from "../outline.js";
import { processNotebookFile, processSeries } from "../series.js";
import { numberTasks } from "../tasks.js";
import { parseArgs, summarizeOutline, textResult } from "../tool-helpers.js";
import { exerciseVersion, solutionVersion } from "../variants.js";

const pathField = z.string().min(1);
const startAtField = z.number().int().min(0).default(1);
const dryRunField = z.boolean().default(false);

const numberHeadingsArgs = z.object({
  path: pathField,
  start_at: startAtField,
  dry_run: dryRunField,
});

const insertContentsArgs = z.object({
  path: pathField,
  numbered_labels: z.boolean().default(false),
  include_title: z.boolean().default(false),
  dry_run: dryRunField,
});

const outlineArgs = insertContentsArgs.extend({
  start_at: startAtField,
  tasks: z.boolean().default(false),
  backup: z.boolean().default(false),
});

const outlineSeriesArgs = outlineArgs.omit({ path: true }).extend({
  paths: z.array(pathField).min(1),
  continue_numbering: z.boolean().default(true),
});

const numberTasksArgs = z.object({
  path: pathField,
  dry_run: dryRunField,
});

const exportVariantArgs = z.object({
  path: pathField,
  variant: z.enum(["exercise", "solution"]),
  output_path: pathField,
});

const getOutlineArgs = z.object({
  path: pathField,
  numbered_labels: z.boolean().default(false),
  include_title: z.boolean().default(false),
});

function sameCells(a: NotebookData, b: NotebookData): boolean {
  return JSON.stringify(a.cells) === JSON.stringify(b.cells);
}

/**
 * Write `next` over `path` unless nothing changed or this is a dry run.
 */
async function saveIfChanged(
  path: string,
  before: NotebookData,
  next: NotebookData,
  dryRun: boolean
): Promise<"unchanged" | "written" | "dry-run"> {
  if (sameCells(before, next)) return "unchanged";
  if (dryRun) return "dry-run";
  await writeNotebook(path, next);
  return "written";
}

export const handlers: ToolHandlers = {
  "number_headings": async (args) => {
    const { path, start_at, dry_run } = parseArgs(numberHeadingsArgs, args);
    const resolved = resolveNotebookPath(path);
    const notebook = await readNotebook(resolved);

    const numbered: NotebookData = { ...notebook, cells: numberAll(notebook.cells, start_at) };
    const status = await saveIfChanged(resolved, notebook, numbered, dry_run);

    const listing = collectHeadings(numbered.cells)
      .map((h) => `${"  ".repeat(h.level - 1)}${h.number.join(".")} ${h.text}`)
      .join("\n");
    const verb = { unchanged: "Headings already numbered in", written: "Numbered headings in", "dry-run": "Would number headings in" }[status];
    return textResult(`${verb} ${resolved}:\n${listing || "(no headings)"}`);
  },

  "insert_contents": async (args) => {
    const { path, numbered_labels, include_title, dry_run } = parseArgs(insertContentsArgs, args);
    const resolved = resolveNotebookPath(path);
    const notebook = await readNotebook(resolved);

    const cellId = requiresCellIds(notebook) ? uniqueCellId(notebook.cells, CONTENTS_CELL_ID) : undefined;
    const cells = insertContents(notebook.cells, {
      numberedLabels: numbered_labels,
      includeTitle: include_title,
      cellId,
    });
    const updated: NotebookData = { ...notebook, cells };
    const status = await saveIfChanged(resolved, notebook, updated, dry_run);

    const contents = cells.find(isContentsCell);
    const verb = { unchanged: "Contents already current in", written: "Updated contents in", "dry-run": "Would update contents in" }[status];
    return textResult(`${verb} ${resolved}:\n${contents ? joinSource(contents) : ""}`);
  },

  "outline_notebook": async (args) => {
    const { path, start_at, numbered_labels, include_title, tasks, backup, dry_run } =
      parseArgs(outlineArgs, args);
    const outcome = await processNotebookFile(path, {
      startAt: start_at,
      numberedLabels: numbered_labels,
      includeTitle: include_title,
      tasks,
      backup,
      dryRun: dry_run,
    });
    return textResult(summarizeOutline(outcome.path, outcome.result, outcome.written));
  },

  "outline_series": async (args) => {
    const parsed = parseArgs(outlineSeriesArgs, args);
    const entries = await processSeries(parsed.paths, {
      startAt: parsed.start_at,
      continueNumbering: parsed.continue_numbering,
      numberedLabels: parsed.numbered_labels,
      includeTitle: parsed.include_title,
      tasks: parsed.tasks,
      backup: parsed.backup,
      dryRun: parsed.dry_run,
    });

    const lines = entries.map((entry) =>
      entry.ok
        ? summarizeOutline(entry.path, entry.result, entry.written)
        : `Failed ${entry.path}: ${entry.error.message}`
    );
    const failed = entries.filter((entry) => !entry.ok).length;
    return {
      content: [{ type: "text", text: lines.join("\n") }],
      ...(failed > 0 ? { isError: true } : {}),
    };
  },

  "number_tasks": async (args) => {
    const { path, dry_run } = parseArgs(numberTasksArgs, args);
    const resolved = resolveNotebookPath(path);
    const notebook = await readNotebook(resolved);

    const result = numberTasks(notebook.cells);
    const status = await saveIfChanged(resolved, notebook, { ...notebook, cells: result.cells }, dry_run);

    const counts = Object.entries(result.counts)
      .map(([family, count]) => `${count} ${family}`)
      .join(", ");
    const verb = { unchanged: "Markers already numbered in", written: "Numbered markers in", "dry-run": "Would number markers in" }[status];
    return textResult(`${verb} ${resolved}: ${counts}`);
  },

  "export_variant": async (args) => {
    const { path, variant, output_path } = parseArgs(exportVariantArgs, args);
    const source = resolveNotebookPath(path);
    const target = resolveNotebookPath(output_path);
    if (source === target) {
      throw new InvalidArgumentError("output_path must differ from path");
    }

    const notebook = await readNotebook(source);
    const copy = variant === "exercise" ? exerciseVersion(notebook) : solutionVersion(notebook);
    await writeNotebook(target, copy);
    return textResult(
      `Wrote ${variant} copy of ${source} to ${target} (${copy.cells.length} of ${notebook.cells.length} cells kept)`
    );
  },

  "get_outline": async (args) => {
    const { path, numbered_labels, include_title } = parseArgs(getOutlineArgs, args);
    const resolved = resolveNotebookPath(path);
    const notebook = await readNotebook(resolved);

    const plan = planContents(notebook.cells, {
      numberedLabels: numbered_labels,
      includeTitle: include_title,
    });
    return textResult(
      JSON.stringify(
        {
          path: resolved,
          headings: plan.headings,
          contents: { action: plan.action, index: plan.index, duplicates: plan.remove, source: plan.source.join("") },
        },
        null,
        2
      )
    );
  },
};
