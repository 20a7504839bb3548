import type { QuestionCategory } from "../classifier/index.js";

export const HANDLER_NAMES = [
  "metrics_query_handler",
  "insight_query_handler",
  "asin_product_handler",
  "dashboard_load_handler",
  "hardcoded_response",
  "goal_handler",
  "inventory_handler",
  "other_handler",
] as const;

export type HandlerName = (typeof HANDLER_NAMES)[number];

export const FALLBACK_HANDLER: HandlerName = "other_handler";

export const ROUTES: Readonly<Record<QuestionCategory, HandlerName>> = {
  metrics_query: "metrics_query_handler",
  insight_query: "insight_query_handler",
  asin_product: "asin_product_handler",
  dashboard_load: "dashboard_load_handler",
  hardcoded: "hardcoded_response",
  goal_query: "goal_handler",
  inventory_query: "inventory_handler",
  other_query: "other_handler",
};

/** Map a category to its handler; anything unrecognised goes to other_handler. */
export function routeByQuestionType(category: string | undefined): HandlerName {
  if (category === undefined) return FALLBACK_HANDLER;
  const route = Object.entries(ROUTES).find(([key]) => key === category);
  return route ? route[1] : FALLBACK_HANDLER;
}
