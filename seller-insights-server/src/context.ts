/**
 * Per-request values threaded through every pipeline stage and model call.
 */
export interface RequestContext {
  sessionId: string;
  /** Forwarded to downstream metric services; never sent to the model */
  authToken?: string;
  signal?: AbortSignal;
}
