/**
 * Evaluation Types
 */

import type { BenchmarkCase } from "../schemas/benchmark.js";
import type { SynthesizedAnswer } from "../schemas/answer.js";

export const RANKING_METRICS = ["ndcg@1", "ndcg@3", "ndcg@5", "mrr", "recall@5"] as const;
export const ANSWER_METRICS = ["rouge1", "rougeL", "semantic", "unanswered"] as const;
export const METRICS = [...RANKING_METRICS, ...ANSWER_METRICS] as const;

export type RankingMetric = (typeof RANKING_METRICS)[number];
export type MetricName = (typeof METRICS)[number];

export type MetricScores = Partial<Record<MetricName, number>>;

// ============================================
// CASE RESULT
// ============================================

export interface CaseResult {
  /** The benchmark case exactly as loaded */
  case: BenchmarkCase;

  status: "completed" | "failed";

  /** Pipeline failure, recorded instead of aborting the run */
  error?: {
    code: string;
    message: string;
  };

  answer?: SynthesizedAnswer;
  intent?: string;
  retrievedIds: string[];

  /** Ranking metrics are 0 when the case has no relevant passage; see MetricReport.exclusions */
  scores: MetricScores;
  warnings: string[];
  durationMs: number;
}

// ============================================
// RUN
// ============================================

export interface EvaluationRunConfig {
  runId?: string;
  /** Cases to run (all if empty) */
  caseIds?: string[];
  /** Tags to filter cases */
  tags?: string[];
  /** Overrides the harness concurrency */
  concurrency?: number;
}

export interface MetricReport {
  runId: string;
  suite: {
    id: string;
    name: string;
    version: string;
  };

  /** Per-case results in benchmark order */
  cases: CaseResult[];

  /** Arithmetic mean over contributing cases; null when none contributed */
  aggregate: Record<MetricName, number | null>;

  /** Case ids left out of each ranking metric's denominator */
  exclusions: Record<RankingMetric, string[]>;

  stats: {
    totalCases: number;
    completed: number;
    failed: number;
    avgDurationMs: number;
  };

  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
}
