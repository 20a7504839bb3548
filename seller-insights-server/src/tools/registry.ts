import { z } from "zod";
import { logger } from "../../../shared/observability/src/logger.js";
import type { ToolCallMeta, ToolDefinition, ToolPlugin, ToolResult } from "./types.js";

export class ToolRegistry {
  private readonly plugins = new Map<string, ToolPlugin>();

  /** Register one or more tool plugins */
  register(...pluginList: ToolPlugin[]): this {
    for (const plugin of pluginList) {
      if (this.plugins.has(plugin.definition.name)) {
        logger.warn(`Overwriting existing tool plugin: ${plugin.definition.name}`);
      }
      this.plugins.set(plugin.definition.name, plugin);
    }
    logger.info(`Registered ${pluginList.length} tool plugin(s)`, {
      tools: pluginList.map((p) => p.definition.name).join(", "),
    });
    return this;
  }

  /** All registered tool definitions (for MCP ListTools) */
  definitions(): ToolDefinition[] {
    return [...this.plugins.values()].map((p) => p.definition);
  }

  /** Dispatch a tool call to its plugin; failures come back as isError results */
  async handleToolCall(
    name: string,
    args: Record<string, unknown> | undefined,
    meta?: ToolCallMeta
  ): Promise<ToolResult> {
    try {
      const plugin = this.plugins.get(name);
      if (!plugin) {
        throw new Error(`Unknown tool: ${name}`);
      }
      return await plugin.handler(args, meta);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return {
          content: [{
            type: "text",
            text: `Validation error: ${error.issues.map((e) => e.message).join(", ")}`,
          }],
          isError: true,
        };
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Tool "${name}" failed`, { error: message, tool: name });
      return {
        content: [{ type: "text", text: `Error: ${message}` }],
        isError: true,
      };
    }
  }
}
