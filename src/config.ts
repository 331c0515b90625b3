import { InvalidArgumentError } from "./errors.js";

export const PACKAGE_NAME = "notebook-outline";
export const VERSION = "0.1.0";

/**
 * Options for one CLI run.
 */
export interface OutlineCliConfig {
  paths: string[];
  startAt: number;
  /** Continue chapter numbering from one notebook to the next */
  continueNumbering: boolean;
  contents: boolean;
  numberedLabels: boolean;
  includeTitle: boolean;
  tasks: boolean;
  backup: boolean;
  dryRun: boolean;
  help: boolean;
  version: boolean;
}

function parseStartAt(value: string | undefined): number {
  if (value === undefined) throw new InvalidArgumentError("Missing value for --start-at");
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`--start-at must be a non-negative integer, got ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Parse CLI args into an `OutlineCliConfig`.
 *
 * Flags may appear anywhere; everything else is a notebook path. `--` ends
 * flag parsing.
 */
export function loadConfigFromArgs(argv: readonly string[]): OutlineCliConfig {
  const args = [...argv];
  const config: OutlineCliConfig = {
    paths: [],
    startAt: 1,
    continueNumbering: false,
    contents: true,
    numberedLabels: false,
    includeTitle: false,
    tasks: false,
    backup: false,
    dryRun: false,
    help: false,
    version: false,
  };

  while (args.length > 0) {
    const arg = args.shift();
    if (arg === undefined) break;

    if (arg === "--") {
      config.paths.push(...args);
      break;
    }

    if (arg.startsWith("--start-at=")) {
      config.startAt = parseStartAt(arg.slice("--start-at=".length));
      continue;
    }

    switch (arg) {
      case "--start-at":
        config.startAt = parseStartAt(args.shift());
        break;
      case "--continue":
        config.continueNumbering = true;
        break;
      case "--no-contents":
        config.contents = false;
        break;
      case "--numbered-labels":
        config.numberedLabels = true;
        break;
      case "--include-title":
        config.includeTitle = true;
        break;
      case "--tasks":
        config.tasks = true;
        break;
      case "--backup":
        config.backup = true;
        break;
      case "--dry-run":
        config.dryRun = true;
        break;
      case "--help":
      case "-h":
        config.help = true;
        break;
      case "--version":
      case "-v":
        config.version = true;
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw new InvalidArgumentError(`Unknown argument: ${arg}`);
        }
        config.paths.push(arg);
    }
  }

  if (config.paths.length === 0 && !config.help && !config.version) {
    throw new InvalidArgumentError("No notebook given");
  }

  return config;
}
