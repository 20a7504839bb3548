import type { RequestContext } from "../context.js";
import type { HandlerName, PipelineResult } from "../pipeline/index.js";

export interface HandlerReply {
  /** Handler that produced the text */
  handler: HandlerName;
  text: string;
  /** Set when the routed handler was not registered and other_handler answered */
  fallback?: boolean;
}

/**
 * A handler bundled with the router name it serves. Metric-backed handlers
 * are registered by the host; the built-ins are deterministic or prompt-only.
 */
export interface QueryHandler {
  name: HandlerName;
  description: string;
  handle(result: PipelineResult, context: RequestContext): Promise<string>;
}
