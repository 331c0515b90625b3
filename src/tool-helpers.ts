/**
 * Shared helper functions for MCP tool handlers.
 */

import * as z from "zod";
import { InvalidArgumentError } from "./errors.js";
import type { ToolResult } from "./handler-types.js";
import { describeOutline, type OutlineResult } from "./outline.js";

/**
 * Validate tool arguments; a bad argument names the offending field.
 */
export function parseArgs<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  args: Record<string, unknown>
): Output {
  const result = schema.safeParse(args);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? `'${issue.path.join(".")}'` : "arguments";
    throw new InvalidArgumentError(`Invalid ${field}: ${issue?.message ?? "invalid input"}`);
  }
  return result.data;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

export function errorResult(error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
}

/**
 * One-line summary of an outline run.
 */
export function summarizeOutline(path: string, result: OutlineResult, written: boolean): string {
  if (!result.changed) {
    return `No changes to ${path}`;
  }
  const verb = written ? "Updated" : "Would update";
  return `${verb} ${path}: ${describeOutline(result)}. Next chapter number: ${result.nextStartAt}`;
}
