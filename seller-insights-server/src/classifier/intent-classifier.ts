/**
 * Intent Classifier
 *
 * Priority ladder of deterministic rules; only the residual case reaches the
 * model, and that call only chooses between metrics_query and other_query.
 */

import { logInfo, logWarn } from "../../../shared/observability/src/index.js";
import type { RequestContext } from "../context.js";
import type { LlmClient } from "../llm/types.js";
import { METRICS_VS_OTHER_SYSTEM, buildMetricsVsOtherPrompt } from "./prompt.js";
import { normalizeQuestion, type ClassifierRules, type HardcodedEntry } from "./rules.js";
import type { ClassificationInput, QuestionCategory } from "./types.js";

export type ClassificationRule =
  | "goal"
  | "dashboard"
  | "hardcoded"
  | "product"
  | "insight"
  | "inventory"
  | "model";

export interface Classification {
  category: QuestionCategory;
  /** Which rung of the ladder decided */
  rule: ClassificationRule;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * One case-insensitive pattern matching any keyword on word boundaries.
 * Spaces inside a phrase match any run of whitespace.
 */
export function compileKeywords(keywords: string[]): RegExp {
  const alternatives = [...keywords]
    .sort((a, b) => b.length - a.length)
    .map((k) => escapeRegExp(k.trim()).replace(/\s+/g, "\\s+"));
  return new RegExp(`(?<![a-z0-9])(?:${alternatives.join("|")})(?![a-z0-9])`, "i");
}

/** Read a category out of a free-text model reply; anything unclear is metrics_query. */
export function parseBinaryCategory(reply: string): "metrics_query" | "other_query" {
  const cleaned = reply.toLowerCase().replace(/[^a-z_]/g, " ").trim();
  const words = cleaned.split(/\s+/);
  if (words.includes("other_query") && !words.includes("metrics_query")) return "other_query";
  return "metrics_query";
}

export class IntentClassifier {
  private readonly goalPattern: RegExp;
  private readonly productPattern: RegExp;
  private readonly insightPattern: RegExp;
  private readonly inventoryPattern: RegExp;

  constructor(
    private readonly rules: ClassifierRules,
    private readonly llm: LlmClient
  ) {
    this.goalPattern = compileKeywords(rules.goalKeywords);
    this.productPattern = compileKeywords(rules.productKeywords);
    this.insightPattern = compileKeywords(rules.insightKeywords);
    this.inventoryPattern = compileKeywords(rules.inventoryKeywords);
  }

  findHardcoded(utterance: string): HardcodedEntry | undefined {
    return this.rules.hardcoded.get(normalizeQuestion(utterance));
  }

  /** Rungs 1-6. Returns undefined when only the model can decide. */
  classifyByRules(input: ClassificationInput): Classification | undefined {
    const { utterance, interactionType } = input;

    if (
      interactionType === "goal_created" ||
      interactionType === "goal_created_failed" ||
      this.goalPattern.test(utterance)
    ) {
      return { category: "goal_query", rule: "goal" };
    }
    if (interactionType === "dashboard_load") {
      return { category: "dashboard_load", rule: "dashboard" };
    }
    if (this.findHardcoded(utterance)) {
      return { category: "hardcoded", rule: "hardcoded" };
    }
    if (input.asin || this.productPattern.test(utterance)) {
      return { category: "asin_product", rule: "product" };
    }
    if (input.hasComparison || this.insightPattern.test(utterance)) {
      return { category: "insight_query", rule: "insight" };
    }
    if (this.inventoryPattern.test(utterance)) {
      return { category: "inventory_query", rule: "inventory" };
    }
    return undefined;
  }

  async classify(input: ClassificationInput, context: RequestContext): Promise<Classification> {
    const byRule = this.classifyByRules(input);
    if (byRule) {
      logInfo("Question classified", { sessionId: context.sessionId, ...byRule });
      return byRule;
    }

    let category: QuestionCategory = "metrics_query";
    try {
      const reply = await this.llm.complete(
        {
          stage: "intent_classifier",
          system: METRICS_VS_OTHER_SYSTEM,
          prompt: buildMetricsVsOtherPrompt(input.utterance),
          maxTokens: 16,
        },
        context
      );
      category = parseBinaryCategory(reply);
    } catch (err) {
      logWarn("Classifier model call failed, defaulting to metrics_query", {
        sessionId: context.sessionId,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    logInfo("Question classified", { sessionId: context.sessionId, category, rule: "model" });
    return { category, rule: "model" };
  }
}
