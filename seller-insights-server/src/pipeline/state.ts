import { z } from "zod";
import { isIsoDate, type ExtractionRecord, type ResolvedDateRange } from "../date-labels/index.js";
import type { TerminalState, ValidationVerdict } from "../extraction/index.js";
import { parseInteractionType, type InteractionType, type QuestionCategory } from "../classifier/index.js";
import type { HandlerName } from "./router.js";

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

/** Malformed date overrides are dropped rather than rejected */
const optionalIsoDate = optionalText.transform((v) => (v !== undefined && isIsoDate(v) ? v : undefined));

export const pipelineRequestSchema = z
  .object({
    message: z.string().default(""),
    sessionId: z.string().trim().min(1, "sessionId is required"),
    interactionType: z.unknown().optional().transform(parseInteractionType),
    dateStart: optionalIsoDate,
    dateEnd: optionalIsoDate,
    compareDateStart: optionalIsoDate,
    compareDateEnd: optionalIsoDate,
    asin: optionalText.transform((v) => v?.toUpperCase()),
  })
  .refine((r) => r.interactionType !== undefined || r.message.trim() !== "", {
    message: "message is required unless an interaction type is given",
    path: ["message"],
  });

export type PipelineRequest = z.input<typeof pipelineRequestSchema>;
export type ParsedRequest = z.output<typeof pipelineRequestSchema>;

/** Where the final date range came from */
export type RangeSource = "extracted" | "override" | "default";

/**
 * Everything the pipeline knows about one utterance. Stages return partial
 * updates that the orchestrator merges in order.
 */
export interface PipelineState {
  request: ParsedRequest;
  today: string;
  record?: ExtractionRecord;
  range?: ResolvedDateRange;
  rangeSource?: RangeSource;
  asin?: string;
  verdict?: ValidationVerdict;
  terminalState?: TerminalState;
  diagnostics?: string;
  questionType?: QuestionCategory;
  handler?: HandlerName;
}

/** Outbound result handed to the handler layer and returned over MCP */
export interface PipelineResult {
  sessionId: string;
  question: string;
  interactionType?: InteractionType;
  questionType: QuestionCategory;
  handler: HandlerName;
  dateStart: string;
  dateEnd: string;
  compareDateStart?: string;
  compareDateEnd?: string;
  asin?: string;
  isValid: boolean;
  retryCount: number;
  feedback?: string;
  terminalState: TerminalState;
  rangeSource: RangeSource;
  /** Labels behind the range, absent when extraction was skipped */
  labels?: ExtractionRecord;
  diagnostics?: string;
}

export function hasOverridePair(start: string | undefined, end: string | undefined): boolean {
  return start !== undefined && end !== undefined && start <= end;
}
