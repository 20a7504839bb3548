import { logs, SeverityNumber } from "@opentelemetry/api-logs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogAttributes = Record<string, string | number | boolean | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SEVERITY: Record<LogLevel, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

let minLevel: LogLevel = "info";

/** Override the console threshold (OTel records are always emitted). */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function toOtelAttributes(attributes?: LogAttributes): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  if (!attributes) return out;
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function write(level: LogLevel, message: string, attributes?: LogAttributes): void {
  logs.getLogger("seller-insights").emit({
    severityNumber: SEVERITY[level],
    severityText: level.toUpperCase(),
    body: message,
    attributes: toOtelAttributes(attributes),
  });

  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  // stdout is reserved for the MCP stdio transport
  const attrs = toOtelAttributes(attributes);
  const suffix = Object.keys(attrs).length > 0 ? ` ${JSON.stringify(attrs)}` : "";
  console.error(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${suffix}`);
}

export const logger = {
  debug(message: string, attributes?: LogAttributes): void {
    write("debug", message, attributes);
  },
  info(message: string, attributes?: LogAttributes): void {
    write("info", message, attributes);
  },
  warn(message: string, attributes?: LogAttributes): void {
    write("warn", message, attributes);
  },
  error(message: string, attributes?: LogAttributes): void {
    write("error", message, attributes);
  },
};

export function logInfo(message: string, attributes?: LogAttributes): void {
  logger.info(message, attributes);
}

export function logWarn(message: string, attributes?: LogAttributes): void {
  logger.warn(message, attributes);
}

export function logError(message: string, error?: unknown, attributes?: LogAttributes): void {
  logger.error(message, {
    ...attributes,
    "error.type": error instanceof Error ? error.name : undefined,
    "error.message": error instanceof Error ? error.message : error === undefined ? undefined : String(error),
  });
}
