import { z } from "zod";
import { DATE_LABELS, type ExtractionRecord } from "../date-labels/index.js";
import type { ToolInputSchema } from "../llm/types.js";

export const EXTRACTION_TOOL_NAME = "record_date_labels";

const label = z.enum(DATE_LABELS);
const optionalText = z.string().trim().nullish().transform((v) => (v ? v : undefined));
const optionalCount = z.number().int().nullish().transform((v) => v ?? undefined);

/**
 * Tool input produced by the model, in wire (snake_case) form.
 * Labels outside the vocabulary fail the parse. Companion-field consistency
 * is left to the validator.
 */
export const extractionWireSchema = z
  .object({
    date_start_label: label,
    date_end_label: label,
    compare_date_start_label: label.nullish(),
    compare_date_end_label: label.nullish(),
    explicit_date_start: optionalText,
    explicit_date_end: optionalText,
    explicit_compare_start: optionalText,
    explicit_compare_end: optionalText,
    custom_days_count: optionalCount,
    custom_compare_days_count: optionalCount,
    asin: optionalText,
  })
  .transform(
    (w): ExtractionRecord => ({
      dateStartLabel: w.date_start_label,
      dateEndLabel: w.date_end_label,
      compareDateStartLabel: w.compare_date_start_label ?? undefined,
      compareDateEndLabel: w.compare_date_end_label ?? undefined,
      explicitDateStart: w.explicit_date_start,
      explicitDateEnd: w.explicit_date_end,
      explicitCompareStart: w.explicit_compare_start,
      explicitCompareEnd: w.explicit_compare_end,
      customDaysCount: w.custom_days_count,
      customCompareDaysCount: w.custom_compare_days_count,
      asin: w.asin,
    })
  );

const nullableLabel = { anyOf: [{ type: "string", enum: [...DATE_LABELS] }, { type: "null" }] };
const nullableDate = {
  anyOf: [{ type: "string", pattern: "^\\d{4}-\\d{2}-\\d{2}$" }, { type: "null" }],
};
const nullableCount = { anyOf: [{ type: "integer", minimum: 1 }, { type: "null" }] };

export const extractionInputSchema: ToolInputSchema = {
  type: "object",
  properties: {
    date_start_label: { type: "string", enum: [...DATE_LABELS], description: "Label for the primary period start" },
    date_end_label: { type: "string", enum: [...DATE_LABELS], description: "Label for the primary period end" },
    compare_date_start_label: { ...nullableLabel, description: "Label for the comparison period start" },
    compare_date_end_label: { ...nullableLabel, description: "Label for the comparison period end" },
    explicit_date_start: { ...nullableDate, description: "YYYY-MM-DD when date_start_label is explicit_date" },
    explicit_date_end: { ...nullableDate, description: "YYYY-MM-DD when date_end_label is explicit_date" },
    explicit_compare_start: { ...nullableDate, description: "YYYY-MM-DD when compare_date_start_label is explicit_date" },
    explicit_compare_end: { ...nullableDate, description: "YYYY-MM-DD when compare_date_end_label is explicit_date" },
    custom_days_count: { ...nullableCount, description: "Day count when the primary labels are past_days" },
    custom_compare_days_count: { ...nullableCount, description: "Day count when the comparison labels are past_days" },
    asin: {
      anyOf: [{ type: "string" }, { type: "null" }],
      description: "10-character Amazon product identifier mentioned in the question",
    },
  },
  required: ["date_start_label", "date_end_label"],
};

/** Wire form of a record, for prompts and outbound payloads. */
export function toWireRecord(record: ExtractionRecord): Record<string, string | number | null> {
  return {
    date_start_label: record.dateStartLabel,
    date_end_label: record.dateEndLabel,
    compare_date_start_label: record.compareDateStartLabel ?? null,
    compare_date_end_label: record.compareDateEndLabel ?? null,
    explicit_date_start: record.explicitDateStart ?? null,
    explicit_date_end: record.explicitDateEnd ?? null,
    explicit_compare_start: record.explicitCompareStart ?? null,
    explicit_compare_end: record.explicitCompareEnd ?? null,
    custom_days_count: record.customDaysCount ?? null,
    custom_compare_days_count: record.customCompareDaysCount ?? null,
    asin: record.asin ?? null,
  };
}
