/**
 * Shared types for tool handler functions.
 */

export type ToolContent = { type: "text"; text: string };

export type ToolResult = {
  content: ToolContent[];
  isError?: boolean;
};

export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

export type ToolHandlers = Record<string, ToolHandler>;
