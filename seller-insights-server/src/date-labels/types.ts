/**
 * Date Label Vocabulary
 *
 * Closed set of symbolic date expressions the label extractor may emit.
 * Downstream routing and evaluation datasets key on these exact spellings.
 */

/**
 * Relative periods anchored to the current date
 */
export const RELATIVE_LABELS = [
  "today",
  "yesterday",
  "this_week",
  "last_week",
  "this_month",
  "mtd",
  "last_month",
  "this_year",
  "last_year",
  "ytd",
] as const;

/**
 * Trailing windows with a baked-in day count
 */
export const FIXED_WINDOW_LABELS = [
  "past_7_days",
  "past_14_days",
  "past_30_days",
  "past_60_days",
  "past_90_days",
  "past_180_days",
] as const;

export const MONTH_LABELS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

export const QUARTER_LABELS = ["q1", "q2", "q3", "q4"] as const;

export const DATE_LABELS = [
  ...RELATIVE_LABELS,
  ...FIXED_WINDOW_LABELS,
  "past_days",       // requires a custom day count
  ...MONTH_LABELS,
  ...QUARTER_LABELS,
  "explicit_date",   // requires an ISO date
  "default",         // nothing expressed; same as past_7_days
] as const;

export type RelativeLabel = (typeof RELATIVE_LABELS)[number];
export type FixedWindowLabel = (typeof FIXED_WINDOW_LABELS)[number];
export type MonthLabel = (typeof MONTH_LABELS)[number];
export type QuarterLabel = (typeof QUARTER_LABELS)[number];
export type DateLabel = (typeof DATE_LABELS)[number];

export const FIXED_WINDOW_DAYS: Record<FixedWindowLabel, number> = {
  past_7_days: 7,
  past_14_days: 14,
  past_30_days: 30,
  past_60_days: 60,
  past_90_days: 90,
  past_180_days: 180,
};

const LABEL_SET: ReadonlySet<string> = new Set(DATE_LABELS);

export function isDateLabel(value: unknown): value is DateLabel {
  return typeof value === "string" && LABEL_SET.has(value);
}

export function isFixedWindowLabel(label: DateLabel): label is FixedWindowLabel {
  return label in FIXED_WINDOW_DAYS;
}

export function isMonthLabel(label: DateLabel): label is MonthLabel {
  return MONTH_LABELS.some((m) => m === label);
}

export function isQuarterLabel(label: DateLabel): label is QuarterLabel {
  return QUARTER_LABELS.some((q) => q === label);
}

export function labelRequiresExplicitDate(label: DateLabel): boolean {
  return label === "explicit_date";
}

export function labelRequiresDayCount(label: DateLabel): boolean {
  return label === "past_days";
}

/**
 * Inclusive ISO date span (YYYY-MM-DD)
 */
export interface DateSpan {
  start: string;
  end: string;
}

/**
 * Output of the Label Extractor, before any calendar arithmetic.
 *
 * Start/end labels are equal for every family except `explicit_date`.
 * Comparison labels are both present or both absent.
 */
export interface ExtractionRecord {
  dateStartLabel: DateLabel;
  dateEndLabel: DateLabel;
  compareDateStartLabel?: DateLabel;
  compareDateEndLabel?: DateLabel;
  explicitDateStart?: string;
  explicitDateEnd?: string;
  explicitCompareStart?: string;
  explicitCompareEnd?: string;
  customDaysCount?: number;
  customCompareDaysCount?: number;
  /** 10-character Amazon product identifier */
  asin?: string;
}

/**
 * Concrete dates computed from an ExtractionRecord
 */
export interface ResolvedDateRange {
  dateStart: string;
  dateEnd: string;
  compareDateStart?: string;
  compareDateEnd?: string;
}

/** The record used whenever nothing usable was extracted. */
export const DEFAULT_EXTRACTION: ExtractionRecord = {
  dateStartLabel: "default",
  dateEndLabel: "default",
};
