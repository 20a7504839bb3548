import type { z } from "zod";
import { logInfo, logWarn } from "../../../shared/observability/src/index.js";
import {
  DEFAULT_EXTRACTION,
  formatIsoDate,
  getDaysInMonth,
  makeDate,
  parseIsoDate,
  type ExtractionRecord,
} from "../date-labels/index.js";
import type { RequestContext } from "../context.js";
import { MalformedOutputError, type LlmClient } from "../llm/types.js";
import { LABEL_EXTRACTOR_SYSTEM, buildExtractionPrompt } from "./prompt.js";
import { EXTRACTION_TOOL_NAME, extractionInputSchema, extractionWireSchema } from "./schema.js";
import { reconcileProductId } from "./product-id.js";

export type ExtractionOutcome =
  | { kind: "extracted"; record: ExtractionRecord }
  /** The model answered outside the schema; the attempt is retried with `feedback` */
  | { kind: "invalid"; record: ExtractionRecord; feedback: string }
  /** The model call failed; carries the default record and the failure text */
  | { kind: "fallback"; record: ExtractionRecord; error: string };

export interface ExtractOptions {
  today: string;
  context: RequestContext;
  /** Validator feedback from the previous attempt, embedded verbatim */
  feedback?: string;
  attempt?: number;
}

function shiftBackOneYear(date: Date): string {
  const year = date.getUTCFullYear() - 1;
  const month = date.getUTCMonth() + 1;
  return formatIsoDate(makeDate(year, month, Math.min(date.getUTCDate(), getDaysInMonth(year, month))));
}

/**
 * Shift an explicit date back one year when it lies after `today` and the
 * utterance never wrote its year.
 */
export function normalizeExplicitYear(date: string, today: string, utterance: string): string {
  const parsed = parseIsoDate(date);
  if (!parsed || date <= today) return date;
  if (utterance.includes(String(parsed.getUTCFullYear()))) return date;
  return shiftBackOneYear(parsed);
}

/**
 * Normalise a start/end pair together. When only the end moves back a year,
 * a start in the same year moves with it so the pair keeps its order.
 */
export function normalizeExplicitPair(
  start: string | undefined,
  end: string | undefined,
  today: string,
  utterance: string
): [string | undefined, string | undefined] {
  const newStart = start === undefined ? undefined : normalizeExplicitYear(start, today, utterance);
  const newEnd = end === undefined ? undefined : normalizeExplicitYear(end, today, utterance);
  if (start === undefined || end === undefined || newEnd === end || newStart !== start) {
    return [newStart, newEnd];
  }

  const parsedStart = parseIsoDate(start);
  if (parsedStart && start.slice(0, 4) === end.slice(0, 4)) {
    return [shiftBackOneYear(parsedStart), newEnd];
  }
  return [newStart, newEnd];
}

function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.join(".");
  if (issue.code === "invalid_enum_value") {
    return `${field} '${String(issue.received)}' is not a known label, use one from the label list`;
  }
  return `${field}: ${issue.message}`;
}

export class LabelExtractor {
  constructor(private readonly llm: LlmClient) {}

  async extract(utterance: string, options: ExtractOptions): Promise<ExtractionOutcome> {
    const { today, context, feedback, attempt } = options;

    let raw: ExtractionRecord;
    try {
      raw = await this.llm.generateStructured(
        {
          stage: "label_extractor",
          system: LABEL_EXTRACTOR_SYSTEM,
          prompt: buildExtractionPrompt(utterance, today, feedback),
          toolName: EXTRACTION_TOOL_NAME,
          toolDescription: "Record the date labels and product identifier found in the question",
          inputSchema: extractionInputSchema,
          schema: extractionWireSchema,
          attempt,
        },
        context
      );
    } catch (err) {
      if (err instanceof MalformedOutputError) {
        const feedback = err.issues.map(describeIssue).join("; ");
        logWarn("Label extraction returned invalid output", { sessionId: context.sessionId, feedback });
        return { kind: "invalid", record: { ...DEFAULT_EXTRACTION }, feedback };
      }
      const error = err instanceof Error ? err.message : String(err);
      logWarn("Label extraction failed, using default labels", { sessionId: context.sessionId, error });
      return { kind: "fallback", record: { ...DEFAULT_EXTRACTION }, error };
    }

    const [explicitDateStart, explicitDateEnd] = normalizeExplicitPair(
      raw.explicitDateStart,
      raw.explicitDateEnd,
      today,
      utterance
    );
    const [explicitCompareStart, explicitCompareEnd] = normalizeExplicitPair(
      raw.explicitCompareStart,
      raw.explicitCompareEnd,
      today,
      utterance
    );
    const record: ExtractionRecord = { ...raw, asin: reconcileProductId(utterance, raw.asin) };
    if (explicitDateStart !== undefined) record.explicitDateStart = explicitDateStart;
    if (explicitDateEnd !== undefined) record.explicitDateEnd = explicitDateEnd;
    if (explicitCompareStart !== undefined) record.explicitCompareStart = explicitCompareStart;
    if (explicitCompareEnd !== undefined) record.explicitCompareEnd = explicitCompareEnd;

    logInfo("Labels extracted", {
      sessionId: context.sessionId,
      attempt: attempt ?? 0,
      dateStartLabel: record.dateStartLabel,
      dateEndLabel: record.dateEndLabel,
      compareDateStartLabel: record.compareDateStartLabel,
      asin: record.asin,
    });
    return { kind: "extracted", record };
  }
}
