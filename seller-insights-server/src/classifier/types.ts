export const QUESTION_CATEGORIES = [
  "metrics_query",
  "insight_query",
  "asin_product",
  "dashboard_load",
  "hardcoded",
  "goal_query",
  "inventory_query",
  "other_query",
] as const;

export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

export function isQuestionCategory(value: unknown): value is QuestionCategory {
  return QUESTION_CATEGORIES.some((c) => c === value);
}

/** Out-of-band flags sent by the UI alongside (or instead of) a question */
export const INTERACTION_TYPES = ["dashboard_load", "goal_created", "goal_created_failed"] as const;

export type InteractionType = (typeof INTERACTION_TYPES)[number];

/** Unknown flags are treated as absent rather than rejected. */
export function parseInteractionType(value: unknown): InteractionType | undefined {
  return INTERACTION_TYPES.find((t) => t === value);
}

/** Signals the classifier reads besides the utterance */
export interface ClassificationInput {
  utterance: string;
  interactionType?: InteractionType;
  /** Identifier supplied by the caller or resolved from the utterance */
  asin?: string;
  /** True when a comparison range was supplied or resolved */
  hasComparison: boolean;
}
