/**
 * Query Pipeline
 *
 * resolve dates → classify → route, one sequential pass per utterance.
 * Model failures degrade inside each stage; only a malformed request throws.
 */

import { withSpan, logInfo } from "../../../shared/observability/src/index.js";
import type { AppConfig } from "../config.js";
import type { RequestContext } from "../context.js";
import {
  DEFAULT_EXTRACTION,
  DateCalculator,
  resolveDateRange,
  todayInTimeZone,
  type ResolvedDateRange,
} from "../date-labels/index.js";
import {
  ExtractionValidator,
  LabelExtractor,
  RetryController,
  extractProductIdFromText,
} from "../extraction/index.js";
import { IntentClassifier, type ClassifierRules } from "../classifier/index.js";
import type { LlmClient } from "../llm/types.js";
import { routeByQuestionType } from "./router.js";
import {
  hasOverridePair,
  pipelineRequestSchema,
  type ParsedRequest,
  type PipelineRequest,
  type PipelineResult,
  type PipelineState,
} from "./state.js";

type Stage = (state: PipelineState, context: RequestContext) => Promise<Partial<PipelineState>>;

export interface QueryPipelineDeps {
  retryController: RetryController;
  classifier: IntentClassifier;
  /** Returns the reporting-calendar date (YYYY-MM-DD) */
  today: () => string;
}

function overrideRange(request: ParsedRequest): ResolvedDateRange | undefined {
  const { dateStart, dateEnd } = request;
  if (dateStart === undefined || dateEnd === undefined || dateStart > dateEnd) return undefined;
  const range: ResolvedDateRange = { dateStart, dateEnd };
  applyCompareOverride(range, request);
  return range;
}

function applyCompareOverride(range: ResolvedDateRange, request: ParsedRequest): void {
  const { compareDateStart, compareDateEnd } = request;
  if (hasOverridePair(compareDateStart, compareDateEnd)) {
    range.compareDateStart = compareDateStart;
    range.compareDateEnd = compareDateEnd;
  }
}

export class QueryPipeline {
  private readonly stages: Array<[string, Stage]>;

  constructor(private readonly deps: QueryPipelineDeps) {
    this.stages = [
      ["resolve_dates", (s, c) => this.resolveDates(s, c)],
      ["classify", (s, c) => this.classify(s, c)],
      ["route", async (s) => ({ handler: routeByQuestionType(s.questionType) })],
    ];
  }

  /** Wire up the default components from config. */
  static create(config: AppConfig, llm: LlmClient, rules: ClassifierRules, clock: () => Date = () => new Date()): QueryPipeline {
    return new QueryPipeline({
      retryController: new RetryController(new LabelExtractor(llm), new ExtractionValidator(llm)),
      classifier: new IntentClassifier(rules, llm),
      today: () => todayInTimeZone(config.reportingTimezone, clock()),
    });
  }

  async resolve(request: PipelineRequest, context: RequestContext): Promise<PipelineResult> {
    const parsed = pipelineRequestSchema.parse(request);

    return withSpan<PipelineResult>("pipeline.resolve", { "session.id": context.sessionId }, async (span) => {
      let state: PipelineState = { request: parsed, today: this.deps.today() };

      for (const [name, stage] of this.stages) {
        const update = await stage(state, context);
        state = { ...state, ...update };
        span.addEvent(`stage.${name}`);
      }

      const result = this.toResult(state);
      span.setAttribute("pipeline.question_type", result.questionType);
      span.setAttribute("pipeline.handler", result.handler);
      logInfo("Query resolved", {
        sessionId: context.sessionId,
        questionType: result.questionType,
        handler: result.handler,
        dateStart: result.dateStart,
        dateEnd: result.dateEnd,
        retryCount: result.retryCount,
        terminalState: result.terminalState,
      });
      return result;
    });
  }

  private async resolveDates(state: PipelineState, context: RequestContext): Promise<Partial<PipelineState>> {
    const { request, today } = state;
    const override = overrideRange(request);

    // No text to analyse, or the caller already fixed the dates
    if (request.interactionType === "dashboard_load" || request.message.trim() === "" || override) {
      const range = override ?? resolveDateRange(DEFAULT_EXTRACTION, new DateCalculator(today));
      return {
        range,
        rangeSource: override ? "override" : "default",
        asin: request.asin ?? extractProductIdFromText(request.message),
        verdict: { isValid: true, retryCount: 0 },
        terminalState: "accepted",
      };
    }

    const resolution = await this.deps.retryController.run(request.message, { today, context });
    const range = { ...resolution.range };
    applyCompareOverride(range, request);

    return {
      record: resolution.record,
      range,
      rangeSource: "extracted",
      asin: request.asin ?? resolution.record.asin,
      verdict: resolution.verdict,
      terminalState: resolution.terminalState,
      diagnostics: resolution.diagnostics,
    };
  }

  private async classify(state: PipelineState, context: RequestContext): Promise<Partial<PipelineState>> {
    const classification = await this.deps.classifier.classify(
      {
        utterance: state.request.message,
        interactionType: state.request.interactionType,
        asin: state.asin,
        hasComparison: state.range?.compareDateStart !== undefined,
      },
      context
    );
    return { questionType: classification.category };
  }

  private toResult(state: PipelineState): PipelineResult {
    const { request, range, verdict } = state;
    const fallbackRange = range ?? resolveDateRange(DEFAULT_EXTRACTION, new DateCalculator(state.today));
    const questionType = state.questionType ?? "other_query";

    return {
      sessionId: request.sessionId,
      question: request.message,
      interactionType: request.interactionType,
      questionType,
      handler: state.handler ?? routeByQuestionType(questionType),
      dateStart: fallbackRange.dateStart,
      dateEnd: fallbackRange.dateEnd,
      compareDateStart: fallbackRange.compareDateStart,
      compareDateEnd: fallbackRange.compareDateEnd,
      asin: state.asin,
      isValid: verdict?.isValid ?? true,
      retryCount: verdict?.retryCount ?? 0,
      feedback: verdict?.feedback,
      terminalState: state.terminalState ?? "accepted",
      rangeSource: state.rangeSource ?? "extracted",
      labels: state.record,
      diagnostics: state.diagnostics,
    };
  }
}
