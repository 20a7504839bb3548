import type { RequestContext } from "../../context.js";
import {
  LlmCallError,
  MalformedOutputError,
  type CompletionRequest,
  type LlmClient,
  type StructuredRequest,
} from "../types.js";

/** Raw tool input (validated by the request schema), or an Error to throw */
export type FakeReply = unknown;

export interface RecordedCall {
  kind: "structured" | "complete";
  stage: string;
  prompt: string;
  attempt?: number;
}

/**
 * In-process LlmClient. Replies are queued per stage and consumed in order;
 * an exhausted queue throws LlmCallError.
 */
export class FakeLlmClient implements LlmClient {
  readonly calls: RecordedCall[] = [];
  private readonly structured = new Map<string, FakeReply[]>();
  private readonly completions = new Map<string, Array<string | Error>>();

  queueStructured(stage: string, ...replies: FakeReply[]): this {
    this.structured.set(stage, [...(this.structured.get(stage) ?? []), ...replies]);
    return this;
  }

  queueCompletion(stage: string, ...replies: Array<string | Error>): this {
    this.completions.set(stage, [...(this.completions.get(stage) ?? []), ...replies]);
    return this;
  }

  callsFor(stage: string): RecordedCall[] {
    return this.calls.filter((c) => c.stage === stage);
  }

  async generateStructured<T>(request: StructuredRequest<T>, _context: RequestContext): Promise<T> {
    this.calls.push({ kind: "structured", stage: request.stage, prompt: request.prompt, attempt: request.attempt });
    const reply = this.structured.get(request.stage)?.shift();
    if (reply === undefined) {
      throw new LlmCallError(request.stage, "no scripted reply");
    }
    if (reply instanceof Error) throw reply;

    const parsed = request.schema.safeParse(reply);
    if (!parsed.success) {
      throw new MalformedOutputError(request.stage, request.toolName, parsed.error);
    }
    return parsed.data;
  }

  async complete(request: CompletionRequest, _context: RequestContext): Promise<string> {
    this.calls.push({ kind: "complete", stage: request.stage, prompt: request.prompt });
    const reply = this.completions.get(request.stage)?.shift();
    if (reply === undefined) {
      throw new LlmCallError(request.stage, "no scripted reply");
    }
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export const testContext: RequestContext = { sessionId: "test-session" };
