import { trace, SpanStatusCode, type Attributes, type Span } from "@opentelemetry/api";

const tracer = trace.getTracer("seller-insights");

/**
 * Run `fn` inside an active span. Errors are recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      throw err;
    } finally {
      span.end();
    }
  });
}

export interface LlmSpanInfo {
  model: string;
  /** Pipeline stage issuing the call, e.g. "label_extractor" */
  stage: string;
  sessionId: string;
  attempt?: number;
}

/** Span around a single language-model request. */
export function withLlmSpan<T>(info: LlmSpanInfo, fn: (span: Span) => Promise<T>): Promise<T> {
  return withSpan(
    `llm.${info.stage}`,
    {
      "llm.model": info.model,
      "llm.stage": info.stage,
      "session.id": info.sessionId,
      "llm.attempt": info.attempt ?? 0,
    },
    fn
  );
}
