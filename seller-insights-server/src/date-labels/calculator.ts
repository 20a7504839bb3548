/**
 * Date Calculator
 *
 * Deterministic conversion of DateLabel values into inclusive ISO date spans,
 * anchored to an injected "current date" rather than the wall clock.
 */

import {
  DateLabel,
  DateSpan,
  ExtractionRecord,
  ResolvedDateRange,
  FIXED_WINDOW_DAYS,
  MONTH_LABELS,
  QUARTER_LABELS,
  isFixedWindowLabel,
  isMonthLabel,
  isQuarterLabel,
} from "./types.js";
import * as utils from "./utils.js";

/**
 * A required companion value (explicit date, day count) was missing or bad.
 * Callers are expected to check records before calculating.
 */
export class DateCalculatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DateCalculatorError";
  }
}

export class DateCalculator {
  private readonly current: Date;

  constructor(currentDate: string) {
    const parsed = utils.parseIsoDate(currentDate);
    if (!parsed) {
      throw new DateCalculatorError(`Invalid anchor date: ${currentDate}`);
    }
    this.current = parsed;
  }

  /** The anchor date as YYYY-MM-DD */
  get currentDate(): string {
    return utils.formatIsoDate(this.current);
  }

  calculate(label: DateLabel, explicitDate?: string, customDays?: number): DateSpan {
    if (label === "explicit_date") {
      if (!explicitDate) {
        throw new DateCalculatorError("Label 'explicit_date' requires an explicit date");
      }
      const parsed = utils.parseIsoDate(explicitDate);
      if (!parsed) {
        throw new DateCalculatorError(`Label 'explicit_date' got a malformed date: ${explicitDate}`);
      }
      const iso = utils.formatIsoDate(parsed);
      return { start: iso, end: iso };
    }

    if (label === "past_days") {
      if (customDays === undefined || !Number.isInteger(customDays) || customDays <= 0) {
        throw new DateCalculatorError("Label 'past_days' requires a positive integer day count");
      }
      return this.pastDays(customDays);
    }

    if (label === "default") {
      return this.pastDays(FIXED_WINDOW_DAYS.past_7_days);
    }
    if (isFixedWindowLabel(label)) {
      return this.pastDays(FIXED_WINDOW_DAYS[label]);
    }
    if (isMonthLabel(label)) {
      return this.monthOfCurrentYear(MONTH_LABELS.indexOf(label) + 1);
    }
    if (isQuarterLabel(label)) {
      return this.quarterOfCurrentYear(QUARTER_LABELS.indexOf(label) + 1);
    }

    switch (label) {
      case "today":
        return this.singleDay(0);
      case "yesterday":
        return this.singleDay(-1);
      case "this_week":
        return this.isoWeek(0);
      case "last_week":
        return this.isoWeek(-1);
      case "this_month":
        return this.span(utils.startOfMonth(this.current), utils.endOfMonth(this.current));
      case "mtd":
        return this.span(utils.startOfMonth(this.current), this.current);
      case "last_month": {
        const lastDayPrev = utils.addDays(utils.startOfMonth(this.current), -1);
        return this.span(utils.startOfMonth(lastDayPrev), lastDayPrev);
      }
      case "this_year":
      case "ytd":
        return this.span(utils.makeDate(this.current.getUTCFullYear(), 1, 1), this.current);
      case "last_year": {
        const year = this.current.getUTCFullYear() - 1;
        return this.span(utils.makeDate(year, 1, 1), utils.makeDate(year, 12, 31));
      }
      default: {
        const unknown: never = label;
        throw new DateCalculatorError(`Unknown date label: ${String(unknown)}`);
      }
    }
  }

  private span(start: Date, end: Date): DateSpan {
    return { start: utils.formatIsoDate(start), end: utils.formatIsoDate(end) };
  }

  private singleDay(offset: number): DateSpan {
    const day = utils.addDays(this.current, offset);
    return this.span(day, day);
  }

  private pastDays(days: number): DateSpan {
    return this.span(utils.addDays(this.current, -(days - 1)), this.current);
  }

  // Monday–Sunday, full week even when it extends past today
  private isoWeek(weekOffset: number): DateSpan {
    const monday = utils.addDays(utils.startOfIsoWeek(this.current), weekOffset * 7);
    return this.span(monday, utils.addDays(monday, 6));
  }

  private monthOfCurrentYear(month: number): DateSpan {
    const year = this.current.getUTCFullYear();
    return this.span(
      utils.makeDate(year, month, 1),
      utils.makeDate(year, month, utils.getDaysInMonth(year, month))
    );
  }

  private quarterOfCurrentYear(quarter: number): DateSpan {
    const year = this.current.getUTCFullYear();
    const firstMonth = (quarter - 1) * 3 + 1;
    const lastMonth = firstMonth + 2;
    return this.span(
      utils.makeDate(year, firstMonth, 1),
      utils.makeDate(year, lastMonth, utils.getDaysInMonth(year, lastMonth))
    );
  }
}

/**
 * Resolve a structurally valid record into concrete dates. The primary start
 * comes from the start label's span and the end from the end label's span;
 * the comparison pair is derived the same way from its own metadata.
 */
export function resolveDateRange(record: ExtractionRecord, calculator: DateCalculator): ResolvedDateRange {
  const start = calculator.calculate(record.dateStartLabel, record.explicitDateStart, record.customDaysCount);
  const end = calculator.calculate(record.dateEndLabel, record.explicitDateEnd, record.customDaysCount);
  const range: ResolvedDateRange = { dateStart: start.start, dateEnd: end.end };

  if (record.compareDateStartLabel && record.compareDateEndLabel) {
    const compareStart = calculator.calculate(
      record.compareDateStartLabel,
      record.explicitCompareStart,
      record.customCompareDaysCount
    );
    const compareEnd = calculator.calculate(
      record.compareDateEndLabel,
      record.explicitCompareEnd,
      record.customCompareDaysCount
    );
    range.compareDateStart = compareStart.start;
    range.compareDateEnd = compareEnd.end;
  }

  return range;
}
