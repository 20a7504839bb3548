import Anthropic from "@anthropic-ai/sdk";
import { withLlmSpan, logError } from "../../../shared/observability/src/index.js";
import { CircuitBreaker, CircuitOpenError } from "../../../shared/circuit-breaker/src/index.js";
import type { LlmSettings } from "../config.js";
import type { RequestContext } from "../context.js";
import {
  LlmCallError,
  MalformedOutputError,
  type CompletionRequest,
  type LlmClient,
  type StructuredRequest,
} from "./types.js";

const DEFAULT_MAX_TOKENS = 1024;

/** Overload and rate-limit responses should not trip the breaker. */
export function isTransientApiError(err: unknown): boolean {
  const msg = err instanceof Error ? err.message : String(err);
  return /overloaded_error|rate_limit_error|529/.test(msg);
}

export function createClaudeCircuitBreaker(): CircuitBreaker {
  return new CircuitBreaker({
    name: "claude-api",
    failureThreshold: 3,
    resetTimeoutMs: 60_000,
    isTransient: isTransientApiError,
  });
}

type ClaudeResponse = Anthropic.Messages.Message;

export class AnthropicLlmClient implements LlmClient {
  private readonly client: Anthropic;
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly settings: LlmSettings,
    deps: { client?: Anthropic; breaker?: CircuitBreaker } = {}
  ) {
    this.client =
      deps.client ??
      new Anthropic({
        apiKey: settings.apiKey,
        maxRetries: settings.maxRetries,
        timeout: settings.timeoutMs,
      });
    this.breaker = deps.breaker ?? createClaudeCircuitBreaker();
  }

  async generateStructured<T>(request: StructuredRequest<T>, context: RequestContext): Promise<T> {
    const response = await this.send(
      request.stage,
      context,
      {
        model: this.settings.model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        system: request.system,
        messages: [{ role: "user", content: request.prompt }],
        tools: [
          {
            name: request.toolName,
            description: request.toolDescription,
            input_schema: request.inputSchema,
          },
        ],
        tool_choice: { type: "tool", name: request.toolName },
      },
      request.attempt
    );

    const toolUse = response.content.find(
      (block): block is Anthropic.Messages.ToolUseBlock =>
        block.type === "tool_use" && block.name === request.toolName
    );
    if (!toolUse) {
      throw new LlmCallError(request.stage, `model returned no ${request.toolName} call`);
    }

    const parsed = request.schema.safeParse(toolUse.input);
    if (!parsed.success) {
      throw new MalformedOutputError(request.stage, request.toolName, parsed.error);
    }
    return parsed.data;
  }

  async complete(request: CompletionRequest, context: RequestContext): Promise<string> {
    const response = await this.send(request.stage, context, {
      model: this.settings.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      system: request.system,
      messages: [{ role: "user", content: request.prompt }],
    });

    const text = response.content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("\n")
      .trim();
    if (!text) {
      throw new LlmCallError(request.stage, "model returned no text");
    }
    return text;
  }

  private async send(
    stage: string,
    context: RequestContext,
    body: Anthropic.Messages.MessageCreateParamsNonStreaming,
    attempt?: number
  ): Promise<ClaudeResponse> {
    try {
      return await this.breaker.execute(() =>
        withLlmSpan({ model: this.settings.model, stage, sessionId: context.sessionId, attempt }, async (span) => {
          const resp = await this.client.messages.create(body, {
            signal: context.signal,
            timeout: this.settings.timeoutMs,
          });
          span.setAttribute("llm.stop_reason", resp.stop_reason ?? "unknown");
          span.setAttribute("llm.usage.input_tokens", resp.usage.input_tokens);
          span.setAttribute("llm.usage.output_tokens", resp.usage.output_tokens);
          return resp;
        })
      );
    } catch (err) {
      if (err instanceof CircuitOpenError) throw err;
      logError(`Claude API call failed (${stage})`, err, { sessionId: context.sessionId });
      throw new LlmCallError(stage, err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}
