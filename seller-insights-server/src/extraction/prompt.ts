import {
  FIXED_WINDOW_LABELS,
  MONTH_LABELS,
  QUARTER_LABELS,
  RELATIVE_LABELS,
} from "../date-labels/index.js";

export const LABEL_EXTRACTOR_SYSTEM = `You extract date labels and Amazon product identifiers from questions asked by Amazon sellers about their store analytics.
Return LABELS only, never calculated date ranges. Always answer by calling the record_date_labels tool.`;

export function buildExtractionPrompt(question: string, today: string, feedback?: string): string {
  const year = today.slice(0, 4);

  const sections = [
    `**Today's date: ${today}**`,
    `## Available labels
- Relative: ${RELATIVE_LABELS.join(", ")}
- Trailing windows: ${FIXED_WINDOW_LABELS.join(", ")}
- past_days: ONLY for other day counts; requires custom_days_count (or custom_compare_days_count)
- Months: ${MONTH_LABELS.join(", ")}
- Quarters: ${QUARTER_LABELS.join(", ")} (calendar quarters)
- explicit_date: a specific day such as "October 15" or "2025-10-15"; requires the matching explicit_* field in YYYY-MM-DD
- default: no date mentioned`,
    `## Rules
1. Prefer a predefined window: "past 7 days" is past_7_days, never past_days with 7.
2. date_start_label and date_end_label are the same label unless either is explicit_date.
3. A range between two specific days ("from Oct 1 to Dec 15") uses explicit_date for both bounds.
4. Any day-level reference inside a month phrase ("October 1 to 15", "first week of March") forces explicit_date.
5. For comparisons put the MORE RECENT period in date_start/end and the EARLIER period in compare_date_start/end. Use custom_days_count for the primary period and custom_compare_days_count for the comparison.
6. Dates without a year belong to ${year}. If that puts the date after ${today}, use the previous year.
7. If the question names an ASIN (10 characters, usually starting with B), return it in asin. Otherwise leave asin null.
8. Leave every field that does not apply null.`,
    `## Examples
- "Show me yesterday's sales" → date_start_label=yesterday, date_end_label=yesterday
- "Past 23 days performance" → past_days / past_days, custom_days_count=23
- "Compare past 9 days vs past 30 days" → past_days / past_days, custom_days_count=9, compare past_days / past_days, custom_compare_days_count=30
- "From Oct 1 to Dec 15" → explicit_date / explicit_date, explicit_date_start=${year}-10-01, explicit_date_end=${year}-12-15
- "How is B08XYZ1234 doing?" → default / default, asin=B08XYZ1234`,
    `## Question
${question}`,
  ];

  if (feedback) {
    sections.push(`## Feedback on your previous attempt
${feedback}

Correct these issues in this attempt.`);
  }

  return sections.join("\n\n");
}
