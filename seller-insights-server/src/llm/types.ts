import type { z } from "zod";
import type { RequestContext } from "../context.js";

/** JSON Schema for a forced tool call's input */
export interface ToolInputSchema {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

export interface StructuredRequest<T> {
  /** Pipeline stage, used for spans and logs */
  stage: string;
  system: string;
  prompt: string;
  toolName: string;
  toolDescription: string;
  inputSchema: ToolInputSchema;
  /** Parses the tool input the model produced */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  attempt?: number;
  maxTokens?: number;
}

export interface CompletionRequest {
  stage: string;
  system: string;
  prompt: string;
  maxTokens?: number;
}

/**
 * Language-model boundary used by the extractor, validator and classifier.
 * Implementations throw LlmCallError (or CircuitOpenError) on failure.
 */
export interface LlmClient {
  generateStructured<T>(request: StructuredRequest<T>, context: RequestContext): Promise<T>;
  complete(request: CompletionRequest, context: RequestContext): Promise<string>;
}

export class LlmCallError extends Error {
  readonly stage: string;

  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super(`[${stage}] ${message}`, options);
    this.name = "LlmCallError";
    this.stage = stage;
  }
}

/** One `path: message` entry per issue, joined with "; " */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

/** The model answered, but its tool input failed the request schema */
export class MalformedOutputError extends LlmCallError {
  readonly issues: z.ZodIssue[];

  constructor(stage: string, toolName: string, error: z.ZodError) {
    super(stage, `malformed ${toolName} output: ${formatZodIssues(error)}`, { cause: error });
    this.name = "MalformedOutputError";
    this.issues = error.issues;
  }
}
