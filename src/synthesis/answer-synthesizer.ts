/**
 * Answer Synthesizer
 * Fuses retrieved passages with calculator output, calls the generation backend
 * and post-processes the completion into a SynthesizedAnswer.
 *
 * Backend failures never escape: a retryable one gets one more try with half the
 * passages, then an unanswerable answer carrying a note. Invalid profiles do escape.
 */

import { BackendFailureError, errorMessage, isFinRagError, isRetryableError } from "../core/errors.js";
import { logger, type ChildLogger, type LogContext } from "../core/logger.js";
import { withTimeout } from "../core/timeout.js";
import type { FinancialCalculator } from "../calculator/financial-calculator.js";
import type { EnhancedQuery, RetrievalHit, RetrievalResult, SynthesizedAnswer } from "../schemas/answer.js";
import type { CalculationResult } from "../schemas/calculation.js";
import type { Intent } from "../schemas/lexicon.js";
import type { UserProfile } from "../schemas/profile.js";
import { validateCitations } from "./citations.js";
import { buildContext } from "./context-builder.js";
import { keyFiguresFooter, missingFigures } from "./key-figures.js";
import { UNANSWERABLE_MESSAGE } from "./prompts.js";
import type { GenerationBackend } from "./types.js";

// ============================================
// INTENT DISPATCH
// ============================================

type CalculationHandler = (
  calculator: FinancialCalculator,
  profile: UserProfile,
  query: EnhancedQuery
) => CalculationResult;

/** Income and other amounts in the question are never read as the sacrifice */
function sacrificeAmount(query: EnhancedQuery): number | undefined {
  for (const entity of query.entities) {
    if (entity.kind === "amount" && entity.role === "sacrifice") return entity.value;
  }
  return undefined;
}

const CALCULATIONS = {
  "emergency-fund": (calculator, profile) => calculator.emergencyFund(profile),
  super: (calculator, profile, query) =>
    calculator.superOptimisation(profile, sacrificeAmount(query) ?? calculator.defaultSacrifice(profile)),
  allocation: (calculator, profile) => calculator.allocationStrategy(profile),
  metals: null,
  stocks: null,
  general: null,
} satisfies Record<Intent, CalculationHandler | null>;

// ============================================
// GENERATION STEPS
// ============================================

export type GenerationStep =
  | { status: "success"; completion: string; passageIds: string[] }
  | { status: "retry"; hits: RetrievalHit[]; error: unknown }
  | { status: "fallback"; error: unknown };

export interface SynthesizerOptions {
  maxContextChars: number;
  /** Best retrieval score needed to answer from passages alone */
  answerabilityThreshold: number;
  backendTimeoutMs: number;
}

export class AnswerSynthesizer {
  constructor(
    private readonly calculator: FinancialCalculator,
    private readonly backend: GenerationBackend,
    private readonly options: SynthesizerOptions
  ) {}

  /**
   * Run the calculation mapped to `intent`, if any
   */
  calculate(intent: Intent, profile: UserProfile | undefined, query: EnhancedQuery): CalculationResult | undefined {
    const handler: CalculationHandler | null = CALCULATIONS[intent];
    if (!handler || !profile) return undefined;
    return handler(this.calculator, profile, query);
  }

  async synthesize(
    query: EnhancedQuery,
    intent: Intent,
    retrieval: RetrievalResult,
    profile?: UserProfile,
    context: LogContext = {}
  ): Promise<SynthesizedAnswer> {
    const log = logger.child({ component: "synthesizer", intent, ...context });
    const calculation = this.calculate(intent, profile, query);
    const best = retrieval.hits[0]?.score ?? 0;

    if (!calculation && retrieval.hits.length === 0) {
      log.info("No passages and no calculation; answering unanswerable");
      return this.unanswerable({ note: "No relevant passages were retrieved", attempts: 0 });
    }
    if (!calculation && best < this.options.answerabilityThreshold) {
      log.info("Best passage below answerability threshold", { best });
      return this.unanswerable({
        note: `Best passage score ${best.toFixed(3)} is below the answerability threshold ${this.options.answerabilityThreshold}`,
        attempts: 0,
      });
    }

    let hits = retrieval.hits;
    let attempts = 0;

    for (;;) {
      attempts++;
      const step = await this.attempt(query, hits, calculation, attempts);

      if (step.status === "success") {
        return this.finish(step.completion, step.passageIds, calculation, attempts, log);
      }

      if (step.status === "retry") {
        log.warn("Generation failed, retrying with fewer passages", {
          attempt: attempts,
          passages: step.hits.length,
          reason: errorMessage(step.error),
        });
        hits = step.hits;
        continue;
      }

      log.error("Generation failed; answering unanswerable", step.error, { attempts });
      return this.unanswerable({
        note: `Generation backend failed: ${errorMessage(step.error)}`,
        attempts,
        calculation,
      });
    }
  }

  private async attempt(
    query: EnhancedQuery,
    hits: readonly RetrievalHit[],
    calculation: CalculationResult | undefined,
    attempt: number
  ): Promise<GenerationStep> {
    const built = buildContext(hits, calculation, this.options.maxContextChars);

    try {
      const completion = await withTimeout(`${this.backend.name} generation`, this.options.backendTimeoutMs, (signal) =>
        this.backend.complete({
          context: built.text,
          query: query.original,
          signal,
          sources: built.sources,
          calculation,
        })
      );

      if (completion.trim().length === 0) {
        throw new BackendFailureError("Generation backend returned an empty completion", this.backend.name);
      }

      return { status: "success", completion, passageIds: built.passageIds };
    } catch (error) {
      const failure = isFinRagError(error)
        ? error
        : new BackendFailureError(errorMessage(error), this.backend.name, { cause: error });

      if (attempt === 1 && isRetryableError(failure)) {
        return { status: "retry", hits: hits.slice(0, Math.max(1, Math.floor(hits.length / 2))), error: failure };
      }
      return { status: "fallback", error: failure };
    }
  }

  private finish(
    completion: string,
    passageIds: string[],
    calculation: CalculationResult | undefined,
    attempts: number,
    log: ChildLogger
  ): SynthesizedAnswer {
    const checked = validateCitations(completion, new Set(passageIds));
    if (checked.rejected.length > 0) {
      log.warn("Stripped citation markers outside the context", { rejected: checked.rejected });
    }

    let text = checked.text;
    if (calculation) {
      const missing = missingFigures(text, calculation);
      if (missing.length > 0) text = `${text}\n\n${keyFiguresFooter(missing)}`;
    }

    return {
      text,
      citations: checked.citations,
      confidence: "answerable",
      calculation,
      contextPassageIds: passageIds,
      rejectedCitations: checked.rejected,
      attempts,
    };
  }

  private unanswerable(details: {
    note: string;
    attempts: number;
    calculation?: CalculationResult;
  }): SynthesizedAnswer {
    return {
      text: UNANSWERABLE_MESSAGE,
      citations: [],
      confidence: "unanswerable",
      calculation: details.calculation,
      contextPassageIds: [],
      rejectedCitations: [],
      note: details.note,
      attempts: details.attempts,
    };
  }
}
