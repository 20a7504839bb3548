/** Standard MCP tool result; the index signature keeps it assignable to the SDK's result type */
export interface ToolResult {
  content: { type: "text"; text: string }[];
  isError?: boolean;
  [key: string]: unknown;
}

/** MCP tool definition (JSON Schema for input) */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
  [key: string]: unknown;
}

/** Per-call values the host passes alongside the arguments */
export interface ToolCallMeta {
  authToken?: string;
  signal?: AbortSignal;
}

/**
 * A self-contained tool plugin that bundles its definition and handler.
 * Each plugin validates its own input with Zod and throws on bad input.
 */
export interface ToolPlugin {
  definition: ToolDefinition;
  handler(args: Record<string, unknown> | undefined, meta?: ToolCallMeta): Promise<ToolResult>;
}
