import { withSpan, logInfo, logWarn } from "../../../shared/observability/src/index.js";
import {
  DEFAULT_EXTRACTION,
  DateCalculator,
  resolveDateRange,
  type ExtractionRecord,
  type ResolvedDateRange,
} from "../date-labels/index.js";
import type { RequestContext } from "../context.js";
import type { LabelExtractor } from "./label-extractor.js";
import { checkStructure, type ExtractionValidator } from "./validator.js";

/** Retries after the first attempt; at most MAX_RETRIES + 1 extractions */
export const MAX_RETRIES = 3;

export type TerminalState = "accepted" | "forced_accept";

export interface ValidationVerdict {
  isValid: boolean;
  feedback?: string;
  retryCount: number;
}

export interface ResolutionResult {
  record: ExtractionRecord;
  range: ResolvedDateRange;
  verdict: ValidationVerdict;
  terminalState: TerminalState;
  /** Extraction failure text when the default labels were substituted */
  diagnostics?: string;
}

const GENERIC_FEEDBACK = "Extraction did not match the question, please try again.";

export class RetryController {
  constructor(
    private readonly extractor: LabelExtractor,
    private readonly validator: ExtractionValidator
  ) {}

  async run(utterance: string, options: { today: string; context: RequestContext }): Promise<ResolutionResult> {
    const { today, context } = options;
    const calculator = new DateCalculator(today);

    return withSpan<ResolutionResult>("pipeline.resolve_dates", { "session.id": context.sessionId }, async (span) => {
      let feedback: string | undefined;

      for (let retryCount = 0; ; retryCount++) {
        const outcome = await this.extractor.extract(utterance, { today, context, feedback, attempt: retryCount });

        if (outcome.kind === "fallback") {
          span.setAttribute("extraction.fallback", true);
          return {
            record: outcome.record,
            range: resolveDateRange(outcome.record, calculator),
            verdict: { isValid: true, retryCount },
            terminalState: "accepted",
            diagnostics: outcome.error,
          };
        }

        let record = outcome.record;
        let range: ResolvedDateRange | null = null;
        if (outcome.kind === "invalid") {
          feedback = outcome.feedback;
        } else {
          range = this.tryResolve(record, calculator);
          const result = await this.validator.validate(utterance, record, range, { context, today, retryCount });

          if (result.isValid && range) {
            span.setAttribute("extraction.retries", retryCount);
            logInfo("Extraction accepted", { sessionId: context.sessionId, retryCount });
            return {
              record,
              range,
              verdict: { isValid: true, feedback: result.feedback, retryCount },
              terminalState: "accepted",
            };
          }
          feedback = result.feedback ?? GENERIC_FEEDBACK;
        }

        if (retryCount >= MAX_RETRIES) {
          span.setAttribute("extraction.retries", retryCount);
          span.setAttribute("extraction.forced", true);
          logWarn("Retry budget exhausted, forcing acceptance", { sessionId: context.sessionId, feedback });
          // An unusable final record is replaced by the default labels and range together
          if (!range || checkStructure(record, range).length > 0) {
            record = { ...DEFAULT_EXTRACTION, asin: record.asin };
            range = resolveDateRange(record, calculator);
          }
          return {
            record,
            range,
            verdict: { isValid: true, feedback, retryCount },
            terminalState: "forced_accept",
          };
        }

        logInfo("Extraction rejected, retrying", { sessionId: context.sessionId, retryCount, feedback });
      }
    });
  }

  /** Only structurally sound records reach the calculator */
  private tryResolve(record: ExtractionRecord, calculator: DateCalculator): ResolvedDateRange | null {
    if (checkStructure(record).length > 0) return null;
    return resolveDateRange(record, calculator);
  }
}
