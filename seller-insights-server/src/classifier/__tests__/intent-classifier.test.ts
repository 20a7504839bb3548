import { describe, it, expect } from "vitest";
import { IntentClassifier, compileKeywords, parseBinaryCategory } from "../intent-classifier.js";
import { loadClassifierRules } from "../rules.js";
import type { ClassificationInput } from "../types.js";
import { FakeLlmClient, testContext } from "../../llm/__tests__/fake-llm-client.js";
import { LlmCallError } from "../../llm/types.js";

const rules = loadClassifierRules("config/classifier-rules.yml");

function setup() {
  const llm = new FakeLlmClient();
  return { llm, classifier: new IntentClassifier(rules, llm) };
}

function input(utterance: string, extra: Partial<ClassificationInput> = {}): ClassificationInput {
  return { utterance, hasComparison: false, ...extra };
}

describe("IntentClassifier", () => {
  describe("deterministic rules", () => {
    it("classifies goal events and goal vocabulary as goal_query", async () => {
      const { llm, classifier } = setup();
      await expect(classifier.classify(input("", { interactionType: "goal_created" }), testContext)).resolves.toEqual({
        category: "goal_query",
        rule: "goal",
      });
      await expect(
        classifier.classify(input("anything", { interactionType: "goal_created_failed" }), testContext)
      ).resolves.toEqual({ category: "goal_query", rule: "goal" });
      await expect(classifier.classify(input("Set a monthly sales goal"), testContext)).resolves.toEqual({
        category: "goal_query",
        rule: "goal",
      });
      expect(llm.calls).toHaveLength(0);
    });

    it("puts goal vocabulary ahead of a product identifier", async () => {
      const { classifier } = setup();
      const result = await classifier.classify(
        input("Set a sales target for B08XYZ1234", { asin: "B08XYZ1234" }),
        testContext
      );
      expect(result.category).toBe("goal_query");
    });

    it("classifies a dashboard load event", async () => {
      const { classifier } = setup();
      const result = await classifier.classify(input("", { interactionType: "dashboard_load" }), testContext);
      expect(result).toEqual({ category: "dashboard_load", rule: "dashboard" });
    });

    it("matches hardcoded questions after normalising case and whitespace", async () => {
      const { llm, classifier } = setup();
      const result = await classifier.classify(input("  Show me   PERFORMANCE insights "), testContext);
      expect(result).toEqual({ category: "hardcoded", rule: "hardcoded" });
      expect(llm.calls).toHaveLength(0);
    });

    it("does not treat a longer question as hardcoded", () => {
      const { classifier } = setup();
      expect(classifier.findHardcoded("show me performance insights for last week")).toBeUndefined();
    });

    it("classifies a resolved product identifier or the word asin as asin_product", async () => {
      const { classifier } = setup();
      await expect(
        classifier.classify(input("How is B08XYZ1234 doing?", { asin: "B08XYZ1234" }), testContext)
      ).resolves.toEqual({ category: "asin_product", rule: "product" });
      await expect(classifier.classify(input("List my top ASINs"), testContext)).resolves.toEqual({
        category: "asin_product",
        rule: "product",
      });
    });

    it("classifies comparisons and trend vocabulary as insight_query", async () => {
      const { classifier } = setup();
      await expect(classifier.classify(input("sales", { hasComparison: true }), testContext)).resolves.toEqual({
        category: "insight_query",
        rule: "insight",
      });
      expect((await classifier.classify(input("Why did my sales drop?"), testContext)).category).toBe("insight_query");
      expect((await classifier.classify(input("Revenue week  over week"), testContext)).category).toBe(
        "insight_query"
      );
    });

    it("classifies inventory vocabulary as inventory_query", async () => {
      const { classifier } = setup();
      expect((await classifier.classify(input("How much did I pay in storage fees?"), testContext)).category).toBe(
        "inventory_query"
      );
      expect((await classifier.classify(input("What's my FBA in-stock rate?"), testContext)).category).toBe(
        "inventory_query"
      );
    });
  });

  describe("model fallback", () => {
    it("asks the model only when no rule applies", async () => {
      const { llm, classifier } = setup();
      llm.queueCompletion("intent_classifier", "metrics_query");

      const result = await classifier.classify(input("What is my ACOS?"), testContext);
      expect(result).toEqual({ category: "metrics_query", rule: "model" });
      expect(llm.callsFor("intent_classifier")).toHaveLength(1);
      expect(llm.calls[0].prompt).toContain("Question: What is my ACOS?");
    });

    it("matches keywords on word boundaries only", async () => {
      const { llm, classifier } = setup();
      llm.queueCompletion("intent_classifier", "metrics_query", "metrics_query");

      expect((await classifier.classify(input("Show me sales in Stockholm"), testContext)).rule).toBe("model");
      expect((await classifier.classify(input("How did my targeted ads do?"), testContext)).rule).toBe("model");
    });

    it("accepts other_query from the model", async () => {
      const { llm, classifier } = setup();
      llm.queueCompletion("intent_classifier", "other_query");

      const result = await classifier.classify(input("What does ACOS mean?"), testContext);
      expect(result.category).toBe("other_query");
    });

    it("defaults to metrics_query when the model fails", async () => {
      const { llm, classifier } = setup();
      llm.queueCompletion("intent_classifier", new LlmCallError("intent_classifier", "timeout"));

      const result = await classifier.classify(input("Hello there"), testContext);
      expect(result).toEqual({ category: "metrics_query", rule: "model" });
    });
  });
});

describe("parseBinaryCategory", () => {
  it("reads a clean or decorated category name", () => {
    expect(parseBinaryCategory("other_query")).toBe("other_query");
    expect(parseBinaryCategory("`other_query`.")).toBe("other_query");
    expect(parseBinaryCategory("metrics_query")).toBe("metrics_query");
  });

  it("defaults to metrics_query for anything ambiguous", () => {
    expect(parseBinaryCategory("other")).toBe("metrics_query");
    expect(parseBinaryCategory("metrics_query or other_query")).toBe("metrics_query");
    expect(parseBinaryCategory("")).toBe("metrics_query");
  });
});

describe("compileKeywords", () => {
  it("matches phrases across whitespace and punctuation boundaries", () => {
    const pattern = compileKeywords(["stock out", "vs"]);
    expect(pattern.test("any stock\tout risk?")).toBe(true);
    expect(pattern.test("Sept vs. Aug")).toBe(true);
    expect(pattern.test("invest more")).toBe(false);
  });
});
