import { logger } from "../../../shared/observability/src/logger.js";
import { withSpan } from "../../../shared/observability/src/spans.js";
import type { RequestContext } from "../context.js";
import { FALLBACK_HANDLER, type HandlerName, type PipelineResult } from "../pipeline/index.js";
import type { HandlerReply, QueryHandler } from "./types.js";

export class HandlerRegistry {
  private readonly handlers = new Map<HandlerName, QueryHandler>();

  /** Register one or more handlers; a later registration replaces an earlier one */
  register(...handlerList: QueryHandler[]): this {
    for (const handler of handlerList) {
      if (this.handlers.has(handler.name)) {
        logger.warn(`Overwriting existing handler: ${handler.name}`);
      }
      this.handlers.set(handler.name, handler);
    }
    logger.info(`Registered ${handlerList.length} handler(s)`, {
      handlers: handlerList.map((h) => h.name).join(", "),
    });
    return this;
  }

  has(name: HandlerName): boolean {
    return this.handlers.has(name);
  }

  registeredNames(): HandlerName[] {
    return [...this.handlers.keys()];
  }

  /** Run the routed handler, or other_handler when it is not registered. */
  async dispatch(result: PipelineResult, context: RequestContext): Promise<HandlerReply> {
    const routed = this.handlers.get(result.handler);
    const handler = routed ?? this.handlers.get(FALLBACK_HANDLER);
    if (!handler) {
      throw new Error(`No handler registered for "${result.handler}" and no ${FALLBACK_HANDLER} fallback`);
    }

    if (!routed) {
      logger.warn(`Handler "${result.handler}" not registered, falling back to ${FALLBACK_HANDLER}`, {
        sessionId: context.sessionId,
      });
    }

    const text = await withSpan(
      `handler.${handler.name}`,
      { "session.id": context.sessionId, "handler.routed": result.handler },
      () => handler.handle(result, context)
    );
    return routed ? { handler: handler.name, text } : { handler: handler.name, text, fallback: true };
  }
}
