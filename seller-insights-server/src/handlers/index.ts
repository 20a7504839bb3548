export { HandlerRegistry } from "./registry.js";
export {
  createBuiltinHandlers,
  createGoalHandler,
  createHardcodedResponseHandler,
  createOtherHandler,
  dashboardLoadHandler,
  CAPABILITIES_MESSAGE,
  DASHBOARD_GREETING,
  GOAL_CREATED_CONFIRMATION,
  GOAL_CREATION_FAILED_MESSAGE,
  GOAL_FALLBACK_MESSAGE,
  REPHRASE_MESSAGE,
} from "./builtin.js";
export type { HandlerReply, QueryHandler } from "./types.js";
