/**
 * Command-line front end: number headings and refresh the contents cell of
 * each notebook given, rewriting the files in place.
 *
 * Exit status: 0 when every notebook succeeded, 1 when any failed,
 * 2 for a usage error.
 */

import { loadConfigFromArgs, PACKAGE_NAME, VERSION, type OutlineCliConfig } from "./config.js";
import { formatError } from "./errors.js";
import { describeOutline } from "./outline.js";
import { processSeries, type SeriesEntry } from "./series.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  cwd: process.cwd(),
};

export const USAGE = [
  `Usage: ${PACKAGE_NAME} [options] <notebook.ipynb>...`,
  "",
  "Number Markdown headings and insert or refresh a table of contents.",
  "",
  "Options:",
  "  --start-at <n>      Number of the first chapter (default: 1)",
  "  --continue          Continue chapter numbers across the notebooks given",
  "  --no-contents       Only number headings",
  "  --numbered-labels   Show section numbers in the contents",
  "  --include-title     List a lone title heading in the contents",
  "  --tasks             Also number exercise task and answer markers",
  "  --backup            Keep the previous file as <notebook>.bak",
  "  --dry-run           Report changes without writing",
  "  -h, --help          Show help",
  "  -v, --version       Show version",
  "",
].join("\n");

function describe(entry: SeriesEntry, dryRun: boolean): string {
  if (!entry.ok) return formatError(entry.error);
  if (!entry.result.changed) return `unchanged ${entry.path}`;
  const verb = dryRun ? "would update" : "updated";
  return `${verb} ${entry.path} (${describeOutline(entry.result)})`;
}

/**
 * Run the CLI and return its exit status.
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  let config: OutlineCliConfig;
  try {
    config = loadConfigFromArgs(argv);
  } catch (error) {
    io.stderr(`${formatError(error)}\n\n${USAGE}`);
    return 2;
  }

  if (config.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (config.version) {
    io.stdout(`${PACKAGE_NAME} ${VERSION}\n`);
    return 0;
  }

  const entries = await processSeries(config.paths, {
    startAt: config.startAt,
    continueNumbering: config.continueNumbering,
    contents: config.contents,
    numberedLabels: config.numberedLabels,
    includeTitle: config.includeTitle,
    tasks: config.tasks,
    backup: config.backup,
    dryRun: config.dryRun,
    cwd: io.cwd,
  });

  for (const entry of entries) {
    // Error messages already name the file.
    const write = entry.ok ? io.stdout : io.stderr;
    write(describe(entry, config.dryRun) + "\n");
  }

  return entries.every((entry) => entry.ok) ? 0 : 1;
}
