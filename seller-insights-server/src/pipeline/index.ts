export { QueryPipeline } from "./orchestrator.js";
export type { QueryPipelineDeps } from "./orchestrator.js";
export { HANDLER_NAMES, ROUTES, FALLBACK_HANDLER, routeByQuestionType } from "./router.js";
export type { HandlerName } from "./router.js";
export { pipelineRequestSchema } from "./state.js";
export type { PipelineRequest, ParsedRequest, PipelineResult, PipelineState, RangeSource } from "./state.js";
