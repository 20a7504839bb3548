import "dotenv/config";
// OTel must initialize before any instrumented module loads
import { shutdownTracing } from "../../shared/observability/src/tracing.js";

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { logger, logError, setLogLevel } from "../../shared/observability/src/index.js";
import { loadAppConfig } from "./config.js";
import { loadClassifierRules } from "./classifier/index.js";
import { AnthropicLlmClient } from "./llm/index.js";
import { QueryPipeline } from "./pipeline/index.js";
import { HandlerRegistry, createBuiltinHandlers } from "./handlers/index.js";
import { ToolRegistry, createAnswerQueryPlugin, createResolveQueryPlugin } from "./tools/index.js";

const config = loadAppConfig();
setLogLevel(config.logLevel);

const rules = loadClassifierRules(config.classifierRulesPath);
const llm = new AnthropicLlmClient(config.llm);
const pipeline = QueryPipeline.create(config, llm, rules);
const handlers = new HandlerRegistry().register(...createBuiltinHandlers(rules, llm));
const tools = new ToolRegistry().register(
  createResolveQueryPlugin(pipeline),
  createAnswerQueryPlugin(pipeline, handlers)
);

const server = new Server(
  {
    name: "seller-insights",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: tools.definitions() };
});

server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
  const { name, arguments: args, _meta } = request.params;
  const token = _meta?.auth_token;
  return tools.handleToolCall(name, args, {
    authToken: typeof token === "string" ? token : undefined,
    signal: extra.signal,
  });
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down`);
  await server.close();
  await shutdownTracing();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logError("Shutdown failed", error);
      process.exit(1);
    });
  });
}

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Seller insights MCP server running on stdio", {
    model: config.llm.model,
    timezone: config.reportingTimezone,
  });
}

main().catch((error: unknown) => {
  logError("Server error", error);
  process.exit(1);
});
