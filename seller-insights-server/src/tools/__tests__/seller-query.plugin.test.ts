import { describe, it, expect } from "vitest";
import { ToolRegistry } from "../registry.js";
import { createAnswerQueryPlugin, createResolveQueryPlugin } from "../seller-query.plugin.js";
import { QueryPipeline } from "../../pipeline/index.js";
import { HandlerRegistry, createBuiltinHandlers, DASHBOARD_GREETING } from "../../handlers/index.js";
import { LabelExtractor, ExtractionValidator, RetryController } from "../../extraction/index.js";
import { IntentClassifier, loadClassifierRules } from "../../classifier/index.js";
import { FakeLlmClient } from "../../llm/__tests__/fake-llm-client.js";

const rules = loadClassifierRules("config/classifier-rules.yml");

function setup() {
  const llm = new FakeLlmClient();
  const pipeline = new QueryPipeline({
    retryController: new RetryController(new LabelExtractor(llm), new ExtractionValidator(llm)),
    classifier: new IntentClassifier(rules, llm),
    today: () => "2025-12-22",
  });
  const handlers = new HandlerRegistry().register(...createBuiltinHandlers(rules, llm));
  const tools = new ToolRegistry().register(
    createResolveQueryPlugin(pipeline),
    createAnswerQueryPlugin(pipeline, handlers)
  );
  return { llm, tools };
}

function parseText(text: string): unknown {
  return JSON.parse(text);
}

describe("seller query tools", () => {
  it("lists both tools with session_id required", () => {
    const { tools } = setup();
    const defs = tools.definitions();
    expect(defs.map((d) => d.name)).toEqual(["resolve_seller_query", "answer_seller_query"]);
    expect(defs[0]?.inputSchema.required).toEqual(["session_id"]);
  });

  it("maps snake_case arguments onto the pipeline request", async () => {
    const { llm, tools } = setup();
    llm.queueCompletion("intent_classifier", "metrics_query");

    const result = await tools.handleToolCall("resolve_seller_query", {
      message: "how are sales?",
      session_id: "s-9",
      date_start: "2025-10-01",
      date_end: "2025-10-31",
    });
    expect(result.isError).toBeUndefined();
    expect(parseText(result.content[0]?.text ?? "")).toMatchObject({
      sessionId: "s-9",
      dateStart: "2025-10-01",
      dateEnd: "2025-10-31",
      rangeSource: "override",
      handler: "metrics_query_handler",
    });
  });

  it("answers a dashboard load with the greeting", async () => {
    const { tools } = setup();

    const result = await tools.handleToolCall("answer_seller_query", {
      session_id: "s-9",
      interaction_type: "dashboard_load",
    });
    expect(parseText(result.content[0]?.text ?? "")).toMatchObject({
      reply: { handler: "dashboard_load_handler", text: DASHBOARD_GREETING },
      resolution: { questionType: "dashboard_load", dateStart: "2025-12-16", dateEnd: "2025-12-22" },
    });
  });

  it("reports a missing session id as a validation error", async () => {
    const { tools } = setup();

    const result = await tools.handleToolCall("resolve_seller_query", { message: "hi" });
    expect(result).toEqual({
      content: [{ type: "text", text: "Validation error: session_id is required" }],
      isError: true,
    });
  });

  it("reports an empty message without an event as a validation error", async () => {
    const { tools } = setup();

    const result = await tools.handleToolCall("resolve_seller_query", { session_id: "s-9", message: "  " });
    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toBe(
      "Validation error: message is required unless an interaction type is given"
    );
  });

  it("reports an unknown tool", async () => {
    const { tools } = setup();

    const result = await tools.handleToolCall("drop_tables", {});
    expect(result).toEqual({ content: [{ type: "text", text: "Error: Unknown tool: drop_tables" }], isError: true });
  });
});
