/**
 * Extraction Validator
 *
 * Two layers: deterministic structural checks on the record and its computed
 * dates, then a single model call judging faithfulness to the question.
 * The model layer fails open.
 */

import { z } from "zod";
import { logWarn } from "../../../shared/observability/src/index.js";
import {
  isDateLabel,
  isIsoDate,
  type DateLabel,
  type ExtractionRecord,
  type ResolvedDateRange,
} from "../date-labels/index.js";
import type { RequestContext } from "../context.js";
import type { LlmClient, ToolInputSchema } from "../llm/types.js";
import { toWireRecord } from "./schema.js";

export interface ValidationResult {
  isValid: boolean;
  feedback?: string;
}

export interface ValidateOptions {
  context: RequestContext;
  today: string;
  /** Retries already spent, shown to the model */
  retryCount: number;
}

interface PeriodFields {
  name: "primary" | "comparison";
  prefix: string;
  startLabel?: DateLabel;
  endLabel?: DateLabel;
  explicitStart?: string;
  explicitEnd?: string;
  count?: number;
  countField: string;
  explicitStartField: string;
  explicitEndField: string;
}

function checkPeriod(p: PeriodFields, problems: string[]): void {
  const { startLabel, endLabel } = p;
  if (startLabel === undefined || endLabel === undefined) return;

  if (!isDateLabel(startLabel)) problems.push(`${p.prefix}date_start_label '${startLabel}' is not a known label`);
  if (!isDateLabel(endLabel)) problems.push(`${p.prefix}date_end_label '${endLabel}' is not a known label`);

  if (startLabel === "past_days" || endLabel === "past_days") {
    if (p.count === undefined || !Number.isInteger(p.count) || p.count <= 0) {
      problems.push(`${p.countField} must be a positive integer when the ${p.name} labels are past_days`);
    }
  }

  if (startLabel === "explicit_date" && !(p.explicitStart && isIsoDate(p.explicitStart))) {
    problems.push(`${p.explicitStartField} must be a YYYY-MM-DD date when ${p.prefix}date_start_label is explicit_date`);
  }
  if (endLabel === "explicit_date" && !(p.explicitEnd && isIsoDate(p.explicitEnd))) {
    problems.push(`${p.explicitEndField} must be a YYYY-MM-DD date when ${p.prefix}date_end_label is explicit_date`);
  }

  if (startLabel !== endLabel && startLabel !== "explicit_date" && endLabel !== "explicit_date") {
    problems.push(
      `${p.prefix}date_start_label '${startLabel}' and ${p.prefix}date_end_label '${endLabel}' must be the same label`
    );
  }
}

function checkDatePair(label: string, start: string | undefined, end: string | undefined, problems: string[]): void {
  if (start === undefined || end === undefined) return;
  if (!isIsoDate(start) || !isIsoDate(end)) {
    problems.push(`${label} dates must be YYYY-MM-DD (got ${start} to ${end})`);
  } else if (start > end) {
    problems.push(`${label} start ${start} is after its end ${end}`);
  }
}

/**
 * Deterministic checks. Returns one message per problem, naming the field and
 * the expected correction. `range` is checked when given.
 */
export function checkStructure(record: ExtractionRecord, range?: ResolvedDateRange): string[] {
  const problems: string[] = [];

  checkPeriod(
    {
      name: "primary",
      prefix: "",
      startLabel: record.dateStartLabel,
      endLabel: record.dateEndLabel,
      explicitStart: record.explicitDateStart,
      explicitEnd: record.explicitDateEnd,
      count: record.customDaysCount,
      countField: "custom_days_count",
      explicitStartField: "explicit_date_start",
      explicitEndField: "explicit_date_end",
    },
    problems
  );

  const hasCompareStart = record.compareDateStartLabel !== undefined;
  const hasCompareEnd = record.compareDateEndLabel !== undefined;
  if (hasCompareStart !== hasCompareEnd) {
    problems.push("compare_date_start_label and compare_date_end_label must both be set or both be null");
  }

  checkPeriod(
    {
      name: "comparison",
      prefix: "compare_",
      startLabel: record.compareDateStartLabel,
      endLabel: record.compareDateEndLabel,
      explicitStart: record.explicitCompareStart,
      explicitEnd: record.explicitCompareEnd,
      count: record.customCompareDaysCount,
      countField: "custom_compare_days_count",
      explicitStartField: "explicit_compare_start",
      explicitEndField: "explicit_compare_end",
    },
    problems
  );

  if (range) {
    checkDatePair("Primary period", range.dateStart, range.dateEnd, problems);
    checkDatePair("Comparison period", range.compareDateStart, range.compareDateEnd, problems);
    if (range.compareDateStart !== undefined && range.dateStart < range.compareDateStart) {
      problems.push(
        `Primary period ${range.dateStart} to ${range.dateEnd} is older than the comparison period ` +
          `${range.compareDateStart} to ${range.compareDateEnd ?? range.compareDateStart}; ` +
          "the more recent period must be primary, swap the primary and comparison labels"
      );
    }
  }

  return problems;
}

export const VERDICT_TOOL_NAME = "record_verdict";

const verdictSchema = z
  .object({
    is_valid: z.boolean(),
    feedback: z.string().nullish(),
  })
  .transform((v): ValidationResult => ({ isValid: v.is_valid, feedback: v.feedback ?? undefined }));

const verdictInputSchema: ToolInputSchema = {
  type: "object",
  properties: {
    is_valid: { type: "boolean", description: "True when labels and dates match the question" },
    feedback: {
      anyOf: [{ type: "string" }, { type: "null" }],
      description: "When invalid: exactly what is wrong and the correct labels or values",
    },
  },
  required: ["is_valid"],
};

const VALIDATOR_SYSTEM = `You check whether date labels extracted from a seller's analytics question, and the dates calculated from them, match what the seller asked.
Always answer by calling the record_verdict tool.`;

function buildValidatorPrompt(
  utterance: string,
  record: ExtractionRecord,
  range: ResolvedDateRange,
  today: string,
  retryCount: number
): string {
  return `**Today's date: ${today}**

## Question
${utterance}

## Extracted labels
${JSON.stringify(toWireRecord(record), null, 2)}

## Calculated dates
- date_start: ${range.dateStart}
- date_end: ${range.dateEnd}
- compare_date_start: ${range.compareDateStart ?? "null"}
- compare_date_end: ${range.compareDateEnd ?? "null"}

## Attempt
${retryCount + 1} of 4

## What to check
1. Label accuracy: "today" must be today, not yesterday; "this week" must be this_week, not last_week; "past 17 days" must be past_days with custom_days_count=17; spans between specific days must use explicit_date.
2. Comparison: if the question compares two periods, both periods must be present, the more recent one as the primary period.
3. Product: if the question names an ASIN it must be extracted.
4. Coherence: nothing the question asks for is missing.

Mark is_valid=false only for a concrete mismatch, and say precisely what to change.`;
}

export class ExtractionValidator {
  constructor(private readonly llm: LlmClient) {}

  async validate(
    utterance: string,
    record: ExtractionRecord,
    range: ResolvedDateRange | null,
    options: ValidateOptions
  ): Promise<ValidationResult> {
    const problems = checkStructure(record, range ?? undefined);
    if (problems.length === 0 && range === null) {
      problems.push("Dates could not be calculated from the extracted labels");
    }
    if (problems.length > 0 || range === null) {
      return { isValid: false, feedback: problems.join("; ") };
    }

    try {
      return await this.llm.generateStructured(
        {
          stage: "extraction_validator",
          system: VALIDATOR_SYSTEM,
          prompt: buildValidatorPrompt(utterance, record, range, options.today, options.retryCount),
          toolName: VERDICT_TOOL_NAME,
          toolDescription: "Record whether the extraction is valid",
          inputSchema: verdictInputSchema,
          schema: verdictSchema,
          attempt: options.retryCount,
        },
        options.context
      );
    } catch (err) {
      logWarn("Semantic validation unavailable, accepting extraction", {
        sessionId: options.context.sessionId,
        error: err instanceof Error ? err.message : String(err),
      });
      return { isValid: true };
    }
  }
}
