export { LabelExtractor, normalizeExplicitPair, normalizeExplicitYear } from "./label-extractor.js";
export type { ExtractionOutcome, ExtractOptions } from "./label-extractor.js";
export { ExtractionValidator, checkStructure } from "./validator.js";
export type { ValidationResult, ValidateOptions } from "./validator.js";
export { RetryController, MAX_RETRIES } from "./retry-controller.js";
export type { ResolutionResult, TerminalState, ValidationVerdict } from "./retry-controller.js";
export { extractProductIdFromText, reconcileProductId, validateProductId } from "./product-id.js";
export { toWireRecord } from "./schema.js";
