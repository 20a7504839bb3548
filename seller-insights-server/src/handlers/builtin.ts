import { logWarn } from "../../../shared/observability/src/index.js";
import type { ClassifierRules } from "../classifier/index.js";
import { normalizeQuestion } from "../classifier/index.js";
import type { RequestContext } from "../context.js";
import type { LlmClient } from "../llm/types.js";
import type { PipelineResult } from "../pipeline/index.js";
import type { QueryHandler } from "./types.js";

export const DASHBOARD_GREETING = "Your products dashboard is ready! Ask me anything about your products.";
export const GOAL_CREATED_CONFIRMATION = "Your goal has been successfully created and saved.";
export const GOAL_CREATION_FAILED_MESSAGE =
  "Sorry, we couldn't create your goal at this time. Please try again or contact support if the problem persists.";
export const REPHRASE_MESSAGE = "I'm not sure how to answer that question. Please try rephrasing.";

export const GOAL_FALLBACK_MESSAGE =
  "I can help you create and track goals for your store. Tell me the metric, the target value and the time frame, for example: \"Reach $50,000 in sales by the end of March.\"";

export const CAPABILITIES_MESSAGE = `I can help you understand your Amazon store's performance. Try asking about:

- Metrics such as sales, profit, ACOS or ROI for any period
- Comparisons and trends, e.g. "Compare last week vs the week before"
- A specific product by its ASIN
- Inventory, stock levels and storage fees
- Setting and tracking goals`;

const GOAL_SYSTEM = "You are a goal management assistant helping Amazon sellers create, track and manage business goals.";

function buildGoalPrompt(question: string): string {
  return `User message: ${question}

Help with the goal-related request: creating a goal, tracking progress, updating a goal or listing goals.
A well-formed goal has a clear objective, a measurable metric, a time frame and success criteria. Ask for whichever is missing.
Keep the reply short and encouraging.`;
}

const OTHER_SYSTEM = "You are a helpful assistant for an Amazon seller analytics product.";

function buildOtherPrompt(question: string): string {
  return `The seller asked something outside metrics, comparisons, product or inventory questions.

Question: ${question}

Reply helpfully and concisely. Greet back if greeted. Explain a term if asked for a definition. If the question is outside your scope, say what you can help with: metrics, comparisons and trends, product (ASIN) performance, inventory and goals.`;
}

async function completeOr(
  llm: LlmClient,
  stage: string,
  system: string,
  prompt: string,
  fallback: string,
  context: RequestContext
): Promise<string> {
  try {
    return await llm.complete({ stage, system, prompt, maxTokens: 512 }, context);
  } catch (err) {
    logWarn(`${stage} model call failed, using canned reply`, {
      sessionId: context.sessionId,
      error: err instanceof Error ? err.message : String(err),
    });
    return fallback;
  }
}

export function createHardcodedResponseHandler(rules: ClassifierRules): QueryHandler {
  return {
    name: "hardcoded_response",
    description: "Canned answers for the fixed demo questions",
    async handle(result: PipelineResult) {
      const entry = rules.hardcoded.get(normalizeQuestion(result.question));
      return entry?.response ?? REPHRASE_MESSAGE;
    },
  };
}

export const dashboardLoadHandler: QueryHandler = {
  name: "dashboard_load_handler",
  description: "Greeting shown when the products dashboard opens",
  async handle() {
    return DASHBOARD_GREETING;
  },
};

export function createGoalHandler(llm: LlmClient): QueryHandler {
  return {
    name: "goal_handler",
    description: "Goal creation events and goal-related questions",
    async handle(result: PipelineResult, context: RequestContext) {
      if (result.interactionType === "goal_created") return GOAL_CREATED_CONFIRMATION;
      if (result.interactionType === "goal_created_failed") return GOAL_CREATION_FAILED_MESSAGE;
      return completeOr(llm, "goal_handler", GOAL_SYSTEM, buildGoalPrompt(result.question), GOAL_FALLBACK_MESSAGE, context);
    },
  };
}

export function createOtherHandler(llm: LlmClient): QueryHandler {
  return {
    name: "other_handler",
    description: "Greetings, definitions and anything no other handler serves",
    async handle(result: PipelineResult, context: RequestContext) {
      if (result.question.trim() === "") return CAPABILITIES_MESSAGE;
      return completeOr(llm, "other_handler", OTHER_SYSTEM, buildOtherPrompt(result.question), CAPABILITIES_MESSAGE, context);
    },
  };
}

/** The handlers this server can run without a metrics backend */
export function createBuiltinHandlers(rules: ClassifierRules, llm: LlmClient): QueryHandler[] {
  return [
    createHardcodedResponseHandler(rules),
    dashboardLoadHandler,
    createGoalHandler(llm),
    createOtherHandler(llm),
  ];
}
