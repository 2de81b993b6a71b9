/**
 * Retrieval and Answer Types
 */

import type { Passage } from "./passage.js";
import type { CalculationResult } from "./calculation.js";
import type { Intent } from "./lexicon.js";

// ============================================
// QUERY ENHANCEMENT
// ============================================

/** What an amount refers to, judged from the words around it */
export type AmountRole = "sacrifice" | "income" | "other";

export type QueryEntity =
  | { kind: "amount"; value: number; text: string; role: AmountRole }
  | { kind: "age"; value: number; text: string }
  | { kind: "date"; value: string; text: string }
  | { kind: "ticker"; symbol: string; name: string; text: string };

export interface EnhancedQuery {
  /** The question exactly as asked */
  original: string;
  /** Retrieval-optimised rewrite */
  query: string;
  /** Advisory only; downstream code must work on "general" */
  intent: Intent;
  entities: QueryEntity[];
}

// ============================================
// RETRIEVAL
// ============================================

export interface RetrievalHit {
  passage: Passage;
  /** Similarity in [0, 1] */
  score: number;
}

export interface RetrievalResult {
  query: string;
  /** Ordered: score desc, newer publishedAt, then id asc */
  hits: RetrievalHit[];
  /** Hits returned by the index before filtering and truncation */
  candidates: number;
  elapsedMs: number;
}

// ============================================
// SYNTHESIS
// ============================================

export type Confidence = "answerable" | "unanswerable";

export interface SynthesizedAnswer {
  text: string;
  /** Passage ids actually cited, in first-use order */
  citations: string[];
  confidence: Confidence;
  calculation?: CalculationResult;
  /** Passage ids placed in the generation context */
  contextPassageIds: string[];
  /** Citation markers removed because they named passages outside the context */
  rejectedCitations: string[];
  /** Why the answer is unanswerable, or what degraded */
  note?: string;
  /** Generation backend calls made (0 when short-circuited) */
  attempts: number;
}
