export { AnthropicLlmClient, createClaudeCircuitBreaker, isTransientApiError } from "./anthropic-client.js";
export { LlmCallError, MalformedOutputError, formatZodIssues } from "./types.js";
export type { LlmClient, StructuredRequest, CompletionRequest, ToolInputSchema } from "./types.js";
