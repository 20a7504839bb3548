export { IntentClassifier, compileKeywords, parseBinaryCategory } from "./intent-classifier.js";
export type { Classification, ClassificationRule } from "./intent-classifier.js";
export { loadClassifierRules, parseClassifierRules, normalizeQuestion, SERVER_ROOT } from "./rules.js";
export type { ClassifierRules, HardcodedEntry } from "./rules.js";
export { QUESTION_CATEGORIES, INTERACTION_TYPES, isQuestionCategory, parseInteractionType } from "./types.js";
export type { QuestionCategory, InteractionType, ClassificationInput } from "./types.js";
