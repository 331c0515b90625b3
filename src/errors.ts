/**
 * Error types shared by the library, the CLI and the MCP tools.
 */

export type NotebookOutlineErrorCode =
  | "invalid_argument"
  | "malformed_input"
  | "io_error";

/** Structured error with a stable code */
export class NotebookOutlineError extends Error {
  readonly code: NotebookOutlineErrorCode;

  constructor(code: NotebookOutlineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotebookOutlineError";
    this.code = code;
  }
}

export class InvalidArgumentError extends NotebookOutlineError {
  constructor(message: string) {
    super("invalid_argument", message);
    this.name = "InvalidArgumentError";
  }
}

export class MalformedInputError extends NotebookOutlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed_input", message, options);
    this.name = "MalformedInputError";
  }
}

export class NotebookIoError extends NotebookOutlineError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("io_error", `${path}: ${detail}`, { cause });
    this.name = "NotebookIoError";
    this.path = path;
  }
}

/**
 * Render an error for terminal output.
 */
export function formatError(error: unknown): string {
  if (error instanceof NotebookOutlineError) {
    return `error: ${error.code}\n${error.message}`;
  }
  if (error instanceof Error) {
    return `error: ${error.message}`;
  }
  return `error: ${String(error)}`;
}
