import { z } from "zod";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1, "ANTHROPIC_API_KEY is required"),
  CLAUDE_MODEL: z.string().min(1).default("claude-sonnet-4-5-20250929"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  REPORTING_TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isKnownTimeZone, (tz) => ({ message: `Unknown timezone: ${tz}` })),
  CLASSIFIER_RULES_PATH: z.string().min(1).default("config/classifier-rules.yml"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface LlmSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  llm: LlmSettings;
  /** IANA timezone used to derive "today" for date resolution */
  reportingTimezone: string;
  classifierRulesPath: string;
  logLevel: (typeof LOG_LEVELS)[number];
}

function isKnownTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the application config from environment variables.
 * Throws a readable error listing every invalid variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings as unset so defaults apply
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.CLAUDE_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxRetries: e.LLM_MAX_RETRIES,
    },
    reportingTimezone: e.REPORTING_TIMEZONE,
    classifierRulesPath: e.CLASSIFIER_RULES_PATH,
    logLevel: e.LOG_LEVEL,
  };
}
