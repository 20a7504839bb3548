import { z } from "zod";
import type { RequestContext } from "../context.js";
import type { HandlerRegistry } from "../handlers/index.js";
import type { PipelineRequest, QueryPipeline } from "../pipeline/index.js";
import type { ToolCallMeta, ToolDefinition, ToolPlugin, ToolResult } from "./types.js";

// ── Input schema ────────────────────────────────────────────────────────────

const SellerQueryInputSchema = z.object({
  message: z.string().optional(),
  session_id: z.string({ required_error: "session_id is required" }),
  interaction_type: z.string().optional(),
  date_start: z.string().optional(),
  date_end: z.string().optional(),
  compare_date_start: z.string().optional(),
  compare_date_end: z.string().optional(),
  asin: z.string().optional(),
});

type SellerQueryInput = z.infer<typeof SellerQueryInputSchema>;

const inputSchema: ToolDefinition["inputSchema"] = {
  type: "object" as const,
  properties: {
    message: {
      type: "string",
      description: "The seller's question. May be empty for dashboard_load and goal events.",
    },
    session_id: { type: "string", description: "Conversation session identifier." },
    interaction_type: {
      type: "string",
      enum: ["dashboard_load", "goal_created", "goal_created_failed"],
      description: "Optional UI event that triggered the request.",
    },
    date_start: { type: "string", description: "Optional primary range start (YYYY-MM-DD)." },
    date_end: { type: "string", description: "Optional primary range end (YYYY-MM-DD)." },
    compare_date_start: { type: "string", description: "Optional comparison range start (YYYY-MM-DD)." },
    compare_date_end: { type: "string", description: "Optional comparison range end (YYYY-MM-DD)." },
    asin: { type: "string", description: "Optional product identifier; wins over one found in the message." },
  },
  required: ["session_id"],
};

function toPipelineRequest(input: SellerQueryInput): PipelineRequest {
  return {
    message: input.message ?? "",
    sessionId: input.session_id,
    interactionType: input.interaction_type,
    dateStart: input.date_start,
    dateEnd: input.date_end,
    compareDateStart: input.compare_date_start,
    compareDateEnd: input.compare_date_end,
    asin: input.asin,
  };
}

function toContext(input: SellerQueryInput, meta?: ToolCallMeta): RequestContext {
  return { sessionId: input.session_id.trim(), authToken: meta?.authToken, signal: meta?.signal };
}

function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}

// ── Plugins ─────────────────────────────────────────────────────────────────

export function createResolveQueryPlugin(pipeline: QueryPipeline): ToolPlugin {
  return {
    definition: {
      name: "resolve_seller_query",
      description:
        `Resolves a seller's analytics question into a concrete date range, an optional comparison range, ` +
        `an optional product identifier (ASIN), a question category and the handler that should answer it. ` +
        `Explicit date and ASIN overrides take precedence over what is inferred from the message.`,
      inputSchema,
    },
    async handler(args, meta) {
      const input = SellerQueryInputSchema.parse(args ?? {});
      const result = await pipeline.resolve(toPipelineRequest(input), toContext(input, meta));
      return jsonResult(result);
    },
  };
}

export function createAnswerQueryPlugin(pipeline: QueryPipeline, handlers: HandlerRegistry): ToolPlugin {
  return {
    definition: {
      name: "answer_seller_query",
      description:
        `Resolves a seller's question like resolve_seller_query, then runs the routed handler and returns its reply ` +
        `together with the resolution. Routes without a registered handler are answered by the general assistant.`,
      inputSchema,
    },
    async handler(args, meta) {
      const input = SellerQueryInputSchema.parse(args ?? {});
      const context = toContext(input, meta);
      const resolution = await pipeline.resolve(toPipelineRequest(input), context);
      const reply = await handlers.dispatch(resolution, context);
      return jsonResult({ reply, resolution });
    },
  };
}
