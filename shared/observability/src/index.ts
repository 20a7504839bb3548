export { logger, logInfo, logWarn, logError, setLogLevel } from "./logger.js";
export type { LogLevel, LogAttributes } from "./logger.js";
export { withSpan, withLlmSpan } from "./spans.js";
export type { LlmSpanInfo } from "./spans.js";
