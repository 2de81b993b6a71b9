/**
 * Answer Pipeline - Main Orchestrator
 * One request runs sequentially: Enhance → Retrieve → Synthesize
 *
 * PIPELINE STAGES:
 * ================
 * Stage 1: ENHANCE
 *   - Expand abbreviations, extract amounts/ages/dates/tickers, tag an intent
 *   - Pure; never fails
 *
 * Stage 2: RETRIEVE
 *   - Vector search with min-score cutoff and metadata filters
 *   - IndexUnavailableError propagates to the caller
 *
 * Stage 3: SYNTHESIZE
 *   - Calculator (when the intent maps to one and a profile is given)
 *   - Generation with citation validation; backend failures become an unanswerable answer
 *
 * Requests share no mutable state, so any number may run concurrently.
 */

import { logger } from "../core/logger.js";
import { parseProfile, type UserProfile } from "../schemas/profile.js";
import type { EnhancedQuery, RetrievalResult, SynthesizedAnswer } from "../schemas/answer.js";
import type { QueryEnhancer } from "../query/query-enhancer.js";
import type { Retriever } from "../retrieval/retriever.js";
import type { RetrievalFilter } from "../retrieval/types.js";
import type { AnswerSynthesizer } from "../synthesis/answer-synthesizer.js";

export interface PipelineSettings {
  topK: number;
  minScore: number;
}

export interface AskOptions {
  /** Unvalidated profile input; rejected with InvalidProfileError before any stage runs */
  profile?: unknown;
  filter?: RetrievalFilter;
  requestId?: string;
  caseId?: string;
}

export interface StageTimings {
  enhanceMs: number;
  retrieveMs: number;
  synthesizeMs: number;
  totalMs: number;
}

export interface PipelineResult {
  requestId: string;
  enhanced: EnhancedQuery;
  retrieval: RetrievalResult;
  answer: SynthesizedAnswer;
  timings: StageTimings;
}

export class AnswerPipeline {
  private log = logger.child({ component: "pipeline" });

  constructor(
    private readonly enhancer: QueryEnhancer,
    private readonly retriever: Retriever,
    private readonly synthesizer: AnswerSynthesizer,
    private readonly settings: PipelineSettings
  ) {}

  async ask(rawQuery: string, options: AskOptions = {}): Promise<PipelineResult> {
    const requestId = options.requestId ?? crypto.randomUUID();
    const context = options.caseId ? { requestId, caseId: options.caseId } : { requestId };
    const profile: UserProfile | undefined =
      options.profile === undefined ? undefined : parseProfile(options.profile);

    const startTime = performance.now();
    this.log.debug("Request started", { ...context, chars: rawQuery.length });

    try {
      // Stage 1: enhance
      const enhanced = this.enhancer.enhance(rawQuery);
      const enhancedAt = performance.now();

      // Stage 2: retrieve
      const retrieval = await this.retriever.retrieve(
        enhanced,
        this.settings.topK,
        this.settings.minScore,
        options.filter,
        context
      );
      const retrievedAt = performance.now();

      // Stage 3: synthesize
      const answer = await this.synthesizer.synthesize(enhanced, enhanced.intent, retrieval, profile, context);
      const finishedAt = performance.now();

      const timings: StageTimings = {
        enhanceMs: enhancedAt - startTime,
        retrieveMs: retrievedAt - enhancedAt,
        synthesizeMs: finishedAt - retrievedAt,
        totalMs: finishedAt - startTime,
      };

      this.log.info("Request complete", {
        ...context,
        intent: enhanced.intent,
        confidence: answer.confidence,
        hits: retrieval.hits.length,
        citations: answer.citations.length,
        totalMs: Math.round(timings.totalMs),
      });

      return { requestId, enhanced, retrieval, answer, timings };
    } catch (error) {
      this.log.error("Request failed", error, context);
      throw error;
    }
  }
}
