import { describe, it, expect } from "vitest";
import { LabelExtractor, normalizeExplicitPair, normalizeExplicitYear } from "../label-extractor.js";
import { FakeLlmClient, testContext } from "../../llm/__tests__/fake-llm-client.js";
import { LlmCallError } from "../../llm/types.js";

const TODAY = "2025-12-22";

function setup() {
  const llm = new FakeLlmClient();
  return { llm, extractor: new LabelExtractor(llm) };
}

describe("LabelExtractor", () => {
  it("maps the wire output to a camelCase record", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", {
      date_start_label: "past_days",
      date_end_label: "past_days",
      custom_days_count: 23,
      compare_date_start_label: null,
      asin: null,
    });

    const outcome = await extractor.extract("Past 23 days performance", { today: TODAY, context: testContext });
    expect(outcome).toEqual({
      kind: "extracted",
      record: { dateStartLabel: "past_days", dateEndLabel: "past_days", customDaysCount: 23 },
    });
  });

  it("replaces the model's identifier with the one written in the question", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", {
      date_start_label: "last_week",
      date_end_label: "last_week",
      asin: "B000000001",
    });

    const outcome = await extractor.extract("sales for b08xyz1234 last week", { today: TODAY, context: testContext });
    expect(outcome.record.asin).toBe("B08XYZ1234");
  });

  it("drops an identifier that does not validate", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", { date_start_label: "default", date_end_label: "default", asin: "12345" });

    const outcome = await extractor.extract("how is my product doing", { today: TODAY, context: testContext });
    expect(outcome.kind).toBe("extracted");
    expect(outcome.record.asin).toBeUndefined();
  });

  it("shifts a future explicit date back a year when no year was written", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", {
      date_start_label: "explicit_date",
      date_end_label: "explicit_date",
      explicit_date_start: "2026-01-05",
      explicit_date_end: "2026-01-10",
    });

    const outcome = await extractor.extract("Jan 5 to Jan 10", { today: TODAY, context: testContext });
    expect(outcome.record.explicitDateStart).toBe("2025-01-05");
    expect(outcome.record.explicitDateEnd).toBe("2025-01-10");
  });

  it("embeds the previous feedback verbatim", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", { date_start_label: "today", date_end_label: "today" });

    await extractor.extract("today's sales", {
      today: TODAY,
      context: testContext,
      feedback: "Labels should be 'today', not 'yesterday'",
      attempt: 1,
    });
    expect(llm.calls[0].prompt).toContain("## Feedback on your previous attempt\nLabels should be 'today', not 'yesterday'");
    expect(llm.calls[0].attempt).toBe(1);
  });

  it("does not enforce label-pair discipline", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", { date_start_label: "today", date_end_label: "yesterday" });

    const outcome = await extractor.extract("today", { today: TODAY, context: testContext });
    expect(outcome).toEqual({ kind: "extracted", record: { dateStartLabel: "today", dateEndLabel: "yesterday" } });
  });

  it("reports an unknown label as invalid with feedback naming the field", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", { date_start_label: "past_8_days", date_end_label: "past_days", custom_days_count: 8 });

    const outcome = await extractor.extract("past 8 days", { today: TODAY, context: testContext });
    expect(outcome).toEqual({
      kind: "invalid",
      record: { dateStartLabel: "default", dateEndLabel: "default" },
      feedback: "date_start_label 'past_8_days' is not a known label, use one from the label list",
    });
  });

  it("reports other schema problems with the issue text", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", { date_start_label: "past_days", date_end_label: "past_days", custom_days_count: 2.5 });

    const outcome = await extractor.extract("past few days", { today: TODAY, context: testContext });
    expect(outcome).toEqual({
      kind: "invalid",
      record: { dateStartLabel: "default", dateEndLabel: "default" },
      feedback: "custom_days_count: Expected integer, received float",
    });
  });

  it("moves a same-year start back with a future end", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", {
      date_start_label: "explicit_date",
      date_end_label: "explicit_date",
      explicit_date_start: "2025-12-15",
      explicit_date_end: "2025-12-28",
    });

    const outcome = await extractor.extract("from Dec 15 to Dec 28", { today: TODAY, context: testContext });
    expect(outcome.record.explicitDateStart).toBe("2024-12-15");
    expect(outcome.record.explicitDateEnd).toBe("2024-12-28");
  });

  it("normalises the comparison pair on its own", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", {
      date_start_label: "this_month",
      date_end_label: "this_month",
      compare_date_start_label: "explicit_date",
      compare_date_end_label: "explicit_date",
      explicit_compare_start: "2025-12-20",
      explicit_compare_end: "2025-12-24",
    });

    const outcome = await extractor.extract("this month vs Dec 20 to Dec 24", { today: TODAY, context: testContext });
    expect(outcome.record.explicitCompareStart).toBe("2024-12-20");
    expect(outcome.record.explicitCompareEnd).toBe("2024-12-24");
    expect(outcome.record.explicitDateStart).toBeUndefined();
  });

  it("falls back with the failure text when the model call fails", async () => {
    const { llm, extractor } = setup();
    llm.queueStructured("label_extractor", new LlmCallError("label_extractor", "timeout"));

    const outcome = await extractor.extract("sales for B08XYZ1234", { today: TODAY, context: testContext });
    expect(outcome).toEqual({
      kind: "fallback",
      record: { dateStartLabel: "default", dateEndLabel: "default" },
      error: "[label_extractor] timeout",
    });
  });
});

describe("normalizeExplicitYear", () => {
  it("leaves past and current dates alone", () => {
    expect(normalizeExplicitYear("2025-10-15", TODAY, "October 15")).toBe("2025-10-15");
    expect(normalizeExplicitYear("2025-12-22", TODAY, "December 22")).toBe("2025-12-22");
  });

  it("keeps a future date whose year was written", () => {
    expect(normalizeExplicitYear("2026-01-05", TODAY, "January 5 2026")).toBe("2026-01-05");
  });

  it("clamps Feb 29 when shifting into a non-leap year", () => {
    expect(normalizeExplicitYear("2024-02-29", "2024-01-10", "Feb 29")).toBe("2023-02-28");
  });
});

describe("normalizeExplicitPair", () => {
  it("shifts the start with the end when both share a year", () => {
    expect(normalizeExplicitPair("2025-12-15", "2025-12-28", TODAY, "Dec 15 to Dec 28")).toEqual([
      "2024-12-15",
      "2024-12-28",
    ]);
  });

  it("leaves a pair that already crosses the year boundary in order", () => {
    expect(normalizeExplicitPair("2026-12-28", "2026-01-03", "2026-01-05", "Dec 28 to Jan 3")).toEqual([
      "2025-12-28",
      "2026-01-03",
    ]);
  });

  it("keeps both dates when the end year was written", () => {
    expect(normalizeExplicitPair("2025-12-15", "2025-12-28", TODAY, "Dec 15 to Dec 28 2025")).toEqual([
      "2025-12-15",
      "2025-12-28",
    ]);
  });

  it("handles a single bound", () => {
    expect(normalizeExplicitPair(undefined, "2026-01-10", TODAY, "until Jan 10")).toEqual([undefined, "2025-01-10"]);
  });
});
