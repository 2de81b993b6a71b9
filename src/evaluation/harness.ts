/**
 * Evaluation Harness
 * Replays a benchmark suite through the answer pipeline and scores every case
 */

import { errorMessage, isFinRagError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { withTimeout } from "../core/timeout.js";
import type { AnswerPipeline } from "../pipeline/answer-pipeline.js";
import type { EmbeddingBackend } from "../retrieval/types.js";
import type { BenchmarkCase, BenchmarkSuite } from "../schemas/benchmark.js";
import {
  hasRelevant,
  mean,
  ndcgAtK,
  recallAtK,
  reciprocalRank,
  rouge1,
  rougeL,
  semanticSimilarity,
} from "./metrics.js";
import {
  RANKING_METRICS,
  type CaseResult,
  type EvaluationRunConfig,
  type MetricName,
  type MetricReport,
  type MetricScores,
  type RankingMetric,
} from "./types.js";

export interface HarnessOptions {
  concurrency?: number;
  /** Per embedding call while scoring semantic similarity */
  embeddingTimeoutMs?: number;
}

type AnswerRunner = Pick<AnswerPipeline, "ask">;

export class EvaluationHarness {
  private log = logger.child({ component: "harness" });
  private readonly concurrency: number;
  private readonly embeddingTimeoutMs: number;

  constructor(
    private readonly pipeline: AnswerRunner,
    private readonly embedder: EmbeddingBackend,
    options: HarnessOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.embeddingTimeoutMs = options.embeddingTimeoutMs ?? 10_000;
  }

  /**
   * Run a suite. Failures in one case are recorded and never abort the run.
   */
  async run(suite: BenchmarkSuite, config: EvaluationRunConfig = {}): Promise<MetricReport> {
    const runId = config.runId ?? `run_${Date.now()}`;
    const startedAt = new Date().toISOString();
    const startTime = Date.now();

    let cases = suite.cases;
    if (config.caseIds?.length) {
      const wanted = new Set(config.caseIds);
      cases = cases.filter((c) => wanted.has(c.id));
    }
    if (config.tags?.length) {
      const tags = new Set(config.tags);
      cases = cases.filter((c) => c.tags?.some((t) => tags.has(t)));
    }

    this.log.info(`Starting suite: ${suite.name}`, { runId, caseCount: cases.length });

    // Slots are filled by index so the report keeps benchmark order
    const results = new Array<CaseResult>(cases.length);
    const concurrency = Math.max(1, config.concurrency ?? this.concurrency);

    for (let i = 0; i < cases.length; i += concurrency) {
      const batch = cases.slice(i, i + concurrency);
      const settled = await Promise.allSettled(batch.map((c) => this.runCase(c, runId)));

      settled.forEach((res, j) => {
        results[i + j] =
          res.status === "fulfilled" ? res.value : failedResult(batch[j], res.reason, 0);
      });
    }

    const report = buildReport(runId, suite, results, startedAt, startTime);

    this.log.info(`Suite completed: ${suite.name}`, {
      runId,
      completed: report.stats.completed,
      failed: report.stats.failed,
      ndcg5: report.aggregate["ndcg@5"],
      unanswered: report.aggregate.unanswered,
    });

    return report;
  }

  async runCase(benchmarkCase: BenchmarkCase, runId: string): Promise<CaseResult> {
    const startTime = Date.now();
    const log = this.log.child({ runId, caseId: benchmarkCase.id });

    let pipelineResult: Awaited<ReturnType<AnswerRunner["ask"]>>;
    try {
      pipelineResult = await this.pipeline.ask(benchmarkCase.query, {
        profile: benchmarkCase.profile,
        caseId: benchmarkCase.id,
      });
    } catch (error) {
      log.warn("Case failed", { error: errorMessage(error) });
      return failedResult(benchmarkCase, error, Date.now() - startTime);
    }

    const { answer, retrieval, enhanced } = pipelineResult;
    const retrievedIds = retrieval.hits.map((h) => h.passage.id);
    const warnings: string[] = [];

    const scores: MetricScores = {
      ...rankingScores(retrievedIds, benchmarkCase),
      rouge1: rouge1(answer.text, benchmarkCase.referenceAnswer),
      rougeL: rougeL(answer.text, benchmarkCase.referenceAnswer),
      semantic: 0,
      unanswered: answer.confidence === "unanswerable" ? 1 : 0,
    };

    try {
      const [a, r] = await Promise.all([this.embed(answer.text), this.embed(benchmarkCase.referenceAnswer)]);
      scores.semantic = semanticSimilarity(a, r);
    } catch (error) {
      warnings.push(`semantic similarity unavailable: ${errorMessage(error)}`);
      log.warn("Embedding failed; semantic score set to 0", { error: errorMessage(error) });
    }

    return {
      case: benchmarkCase,
      status: "completed",
      answer,
      intent: enhanced.intent,
      retrievedIds,
      scores,
      warnings,
      durationMs: Date.now() - startTime,
    };
  }

  private embed(text: string): Promise<number[]> {
    return withTimeout("semantic embedding", this.embeddingTimeoutMs, (signal) => this.embedder.embed(text, signal));
  }
}

/**
 * A case with no relevant passage scores 0 here and is left out of the aggregate in buildReport
 */
function rankingScores(retrievedIds: string[], benchmarkCase: BenchmarkCase): Record<RankingMetric, number> {
  const judged = benchmarkCase.relevant;
  return {
    "ndcg@1": ndcgAtK(retrievedIds, judged, 1) ?? 0,
    "ndcg@3": ndcgAtK(retrievedIds, judged, 3) ?? 0,
    "ndcg@5": ndcgAtK(retrievedIds, judged, 5) ?? 0,
    mrr: reciprocalRank(retrievedIds, judged) ?? 0,
    "recall@5": recallAtK(retrievedIds, judged, 5) ?? 0,
  };
}

/**
 * A case whose pipeline threw: nothing retrieved, counted as unanswered
 */
function failedResult(benchmarkCase: BenchmarkCase, error: unknown, durationMs: number): CaseResult {
  return {
    case: benchmarkCase,
    status: "failed",
    error: {
      code: isFinRagError(error) ? error.code : "UNKNOWN_ERROR",
      message: errorMessage(error),
    },
    retrievedIds: [],
    scores: {
      ...rankingScores([], benchmarkCase),
      rouge1: 0,
      rougeL: 0,
      semantic: 0,
      unanswered: 1,
    },
    warnings: [],
    durationMs,
  };
}

function buildReport(
  runId: string,
  suite: BenchmarkSuite,
  cases: CaseResult[],
  startedAt: string,
  startTime: number
): MetricReport {
  const judged = cases.filter((c) => hasRelevant(c.case.relevant));
  const unjudgedIds = cases.filter((c) => !hasRelevant(c.case.relevant)).map((c) => c.case.id);

  const average = (metric: MetricName) => {
    const contributing = isRankingMetric(metric) ? judged : cases;
    return mean(
      contributing.flatMap((c) => {
        const value = c.scores[metric];
        return value === undefined ? [] : [value];
      })
    );
  };
  const aggregate: Record<MetricName, number | null> = {
    "ndcg@1": average("ndcg@1"),
    "ndcg@3": average("ndcg@3"),
    "ndcg@5": average("ndcg@5"),
    mrr: average("mrr"),
    "recall@5": average("recall@5"),
    rouge1: average("rouge1"),
    rougeL: average("rougeL"),
    semantic: average("semantic"),
    unanswered: average("unanswered"),
  };

  const exclusions: Record<RankingMetric, string[]> = {
    "ndcg@1": [...unjudgedIds],
    "ndcg@3": [...unjudgedIds],
    "ndcg@5": [...unjudgedIds],
    mrr: [...unjudgedIds],
    "recall@5": [...unjudgedIds],
  };

  const completed = cases.filter((c) => c.status === "completed").length;

  return {
    runId,
    suite: { id: suite.id, name: suite.name, version: suite.version },
    cases,
    aggregate,
    exclusions,
    stats: {
      totalCases: cases.length,
      completed,
      failed: cases.length - completed,
      avgDurationMs: mean(cases.map((c) => c.durationMs)) ?? 0,
    },
    startedAt,
    completedAt: new Date().toISOString(),
    totalDurationMs: Date.now() - startTime,
  };
}

function isRankingMetric(metric: MetricName): metric is RankingMetric {
  return RANKING_METRICS.some((m) => m === metric);
}
