/**
 * Exercise marker numbering.
 *
 * Course notebooks mark exercises with templates such as `#Code task<n>#`
 * and `**Q<n>:**`. Each task marker takes the next number; each answer
 * marker takes the number of the task before it.
 */

import { InvalidArgumentError } from "./errors.js";
import { parseCells, type CellType, type NotebookCell } from "./notebook.js";

export interface TaskFamily {
  name: string;
  /** Template for the task marker; `<n>` is where the number goes */
  task: string;
  answer: string;
  cellTypes: readonly CellType[];
}

export const CODE_TASKS: TaskFamily = {
  name: "tasks",
  task: "#Code task<n>#",
  answer: "#Code answer<n>#",
  cellTypes: ["code", "raw"],
};

export const QUESTIONS: TaskFamily = {
  name: "questions",
  task: "**Q<n>:**",
  answer: "**A<n>:**",
  cellTypes: ["markdown"],
};

export const DEFAULT_TASK_FAMILIES: readonly TaskFamily[] = [CODE_TASKS, QUESTIONS];

const NUMBER_SLOT = "<n>";

/**
 * Escape regex special characters so a template is matched literally.
 */
function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class MarkerTemplate {
  readonly prefix: string;
  readonly suffix: string;
  private readonly pattern: RegExp;

  constructor(template: string) {
    const slot = template.indexOf(NUMBER_SLOT);
    if (slot < 0) {
      throw new InvalidArgumentError(`Marker template must contain ${NUMBER_SLOT}: ${template}`);
    }
    this.prefix = template.slice(0, slot);
    this.suffix = template.slice(slot + NUMBER_SLOT.length);
    this.pattern = new RegExp(
      `^${escapeRegex(this.prefix)}(?:[ \\t]*\\d+)?${escapeRegex(this.suffix)}`
    );
  }

  /** The marker at the start of `line`, numbered or not */
  match(line: string): string | undefined {
    return line.match(this.pattern)?.[0];
  }

  format(n: number): string {
    return `${this.prefix} ${n}${this.suffix}`;
  }

  /** Rewrite a leading marker with number `n`; other lines pass through */
  renumber(line: string, n: number): string {
    const marker = this.match(line);
    return marker === undefined ? line : this.format(n) + line.slice(marker.length);
  }
}

function numberFamily(
  cells: NotebookCell[],
  family: TaskFamily
): { cells: NotebookCell[]; count: number } {
  const task = new MarkerTemplate(family.task);
  const answer = new MarkerTemplate(family.answer);
  let count = 0;

  const out = cells.map((cell) => {
    if (!family.cellTypes.includes(cell.cell_type)) return cell;
    let changed = false;
    const source = cell.source.map((line) => {
      let next = line;
      if (task.match(line) !== undefined) {
        count += 1;
        next = task.renumber(line, count);
      } else if (answer.match(line) !== undefined) {
        next = answer.renumber(line, count);
      }
      if (next !== line) changed = true;
      return next;
    });
    return changed ? { ...cell, source } : cell;
  });

  return { cells: out, count };
}

/**
 * Number task and answer markers for each family in turn.
 * Returns new cells and the number of tasks found per family name.
 */
export function numberTasks(
  cells: readonly NotebookCell[],
  families: readonly TaskFamily[] = DEFAULT_TASK_FAMILIES
): { cells: NotebookCell[]; counts: Record<string, number> } {
  let current = parseCells(cells);
  const counts: Record<string, number> = {};
  for (const family of families) {
    const result = numberFamily(current, family);
    current = result.cells;
    counts[family.name] = result.count;
  }
  return { cells: current, counts };
}
