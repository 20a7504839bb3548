export { ToolRegistry } from "./registry.js";
export { createResolveQueryPlugin, createAnswerQueryPlugin } from "./seller-query.plugin.js";
export type { ToolCallMeta, ToolDefinition, ToolPlugin, ToolResult } from "./types.js";
