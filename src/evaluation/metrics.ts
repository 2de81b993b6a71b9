/**
 * Evaluation Metrics
 * Ranking quality (NDCG, MRR, recall) and answer quality (ROUGE, cosine)
 */

import { tokenize } from "../core/text.js";
import { cosineSimilarity } from "../retrieval/similarity.js";
import type { RelevanceJudgement } from "../schemas/benchmark.js";

// ============================================
// RANKING
// ============================================

function gradeMap(judgements: readonly RelevanceJudgement[]): Map<string, number> {
  const grades = new Map<string, number>();
  for (const j of judgements) {
    grades.set(j.passageId, Math.max(grades.get(j.passageId) ?? 0, j.grade));
  }
  return grades;
}

export function hasRelevant(judgements: readonly RelevanceJudgement[]): boolean {
  return judgements.some((j) => j.grade > 0);
}

/**
 * NDCG@k with linear gain and log2(rank + 1) discount.
 * Null when no passage is relevant: the case is excluded from aggregates.
 */
export function ndcgAtK(rankedIds: readonly string[], judgements: readonly RelevanceJudgement[], k: number): number | null {
  if (!hasRelevant(judgements)) return null;
  const grades = gradeMap(judgements);

  let dcg = 0;
  rankedIds.slice(0, k).forEach((id, i) => {
    dcg += (grades.get(id) ?? 0) / Math.log2(i + 2);
  });

  const ideal = [...grades.values()].sort((a, b) => b - a).slice(0, k);
  let idcg = 0;
  ideal.forEach((grade, i) => {
    idcg += grade / Math.log2(i + 2);
  });

  return idcg > 0 ? dcg / idcg : 0;
}

/**
 * 1 / rank of the first relevant passage; 0 when none was retrieved
 */
export function reciprocalRank(rankedIds: readonly string[], judgements: readonly RelevanceJudgement[]): number | null {
  if (!hasRelevant(judgements)) return null;
  const grades = gradeMap(judgements);
  const index = rankedIds.findIndex((id) => (grades.get(id) ?? 0) > 0);
  return index === -1 ? 0 : 1 / (index + 1);
}

export function recallAtK(rankedIds: readonly string[], judgements: readonly RelevanceJudgement[], k: number): number | null {
  if (!hasRelevant(judgements)) return null;
  const relevant = new Set(judgements.filter((j) => j.grade > 0).map((j) => j.passageId));
  const found = new Set(rankedIds.slice(0, k).filter((id) => relevant.has(id)));
  return found.size / relevant.size;
}

// ============================================
// TEXT OVERLAP
// ============================================

function f1(overlap: number, candidateLength: number, referenceLength: number): number {
  if (overlap === 0 || candidateLength === 0 || referenceLength === 0) return 0;
  const precision = overlap / candidateLength;
  const recall = overlap / referenceLength;
  return (2 * precision * recall) / (precision + recall);
}

/**
 * ROUGE-1 F1: clipped unigram overlap
 */
export function rouge1(candidate: string, reference: string): number {
  const cand = tokenize(candidate);
  const ref = tokenize(reference);

  const counts = new Map<string, number>();
  for (const t of ref) counts.set(t, (counts.get(t) ?? 0) + 1);

  let overlap = 0;
  for (const t of cand) {
    const left = counts.get(t) ?? 0;
    if (left > 0) {
      overlap++;
      counts.set(t, left - 1);
    }
  }

  return f1(overlap, cand.length, ref.length);
}

export function longestCommonSubsequence(a: readonly string[], b: readonly string[]): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * ROUGE-L F1: longest common subsequence of tokens
 */
export function rougeL(candidate: string, reference: string): number {
  const cand = tokenize(candidate);
  const ref = tokenize(reference);
  return f1(longestCommonSubsequence(cand, ref), cand.length, ref.length);
}

// ============================================
// SEMANTIC
// ============================================

export function semanticSimilarity(answerEmbedding: number[], referenceEmbedding: number[]): number {
  return cosineSimilarity(answerEmbedding, referenceEmbedding);
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
