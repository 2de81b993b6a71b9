/**
 * Retriever
 * Ranked, filtered passages from the vector index for an enhanced query
 */

import { IndexUnavailableError, ValidationError, errorMessage } from "../core/errors.js";
import { logger, type LogContext } from "../core/logger.js";
import { withTimeout } from "../core/timeout.js";
import type { EnhancedQuery, RetrievalHit, RetrievalResult } from "../schemas/answer.js";
import type { Passage } from "../schemas/passage.js";
import type { IndexHit, RetrievalFilter, VectorIndex } from "./types.js";

export interface RetrieverOptions {
  /** Minimum candidates requested from the index, before filtering */
  fetchK?: number;
  timeoutMs: number;
}

/**
 * Score descending, then newer publishedAt (undated last), then id ascending
 */
export function compareHits(a: RetrievalHit, b: RetrievalHit): number {
  if (b.score !== a.score) return b.score - a.score;

  const da = a.passage.metadata.publishedAt;
  const db = b.passage.metadata.publishedAt;
  if (da !== db) {
    if (!da) return 1;
    if (!db) return -1;
    return da < db ? 1 : -1;
  }

  return a.passage.id < b.passage.id ? -1 : a.passage.id > b.passage.id ? 1 : 0;
}

export function matchesFilter(passage: Passage, filter: RetrievalFilter | undefined): boolean {
  if (!filter) return true;
  const { documentTypes, authorities, publishedAfter } = filter;

  if (documentTypes && documentTypes.length > 0 && !documentTypes.includes(passage.metadata.documentType)) {
    return false;
  }
  if (authorities && authorities.length > 0) {
    const allow = new Set(authorities.map((a) => a.toLowerCase()));
    if (!allow.has(passage.metadata.authority.toLowerCase())) return false;
  }
  if (publishedAfter) {
    const published = passage.metadata.publishedAt;
    if (!published || published < publishedAfter) return false;
  }
  return true;
}

export class Retriever {
  private readonly fetchK: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly index: VectorIndex,
    options: RetrieverOptions
  ) {
    this.fetchK = options.fetchK ?? 0;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Empty hits (not an error) when nothing clears minScore.
   * Throws IndexUnavailableError only when the index itself fails or times out.
   */
  async retrieve(
    query: EnhancedQuery,
    topK: number,
    minScore: number,
    filter?: RetrievalFilter,
    context: LogContext = {}
  ): Promise<RetrievalResult> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`, { field: "topK" });
    }
    if (!Number.isFinite(minScore)) {
      throw new ValidationError(`minScore must be a finite number, got ${minScore}`, { field: "minScore" });
    }

    const log = logger.child({ component: "retriever", index: this.index.name, ...context });
    const t0 = performance.now();
    const requested = Math.max(topK * 4, this.fetchK);

    const raw = await this.callIndex("search", (signal) => this.index.search(query.query, requested, signal));
    const candidates = dedupe(raw).filter((h) => h.score >= minScore);

    const fetched = await this.callIndex("fetch", (signal) =>
      Promise.all(candidates.map(async (h) => ({ hit: h, passage: await this.index.fetch(h.passageId, signal) })))
    );

    const hits: RetrievalHit[] = [];
    for (const { hit, passage } of fetched) {
      if (!passage) {
        log.warn("Index returned a hit whose passage cannot be fetched", { passageId: hit.passageId });
        continue;
      }
      if (matchesFilter(passage, filter)) {
        hits.push({ passage, score: hit.score });
      }
    }

    hits.sort(compareHits);
    const elapsedMs = performance.now() - t0;

    log.debug("Retrieved passages", {
      candidates: raw.length,
      kept: Math.min(hits.length, topK),
      topScore: hits[0]?.score,
    });
    log.metric("retrieval_ms", Math.round(elapsedMs));

    return {
      query: query.query,
      hits: hits.slice(0, topK),
      candidates: raw.length,
      elapsedMs,
    };
  }

  private async callIndex<T>(operation: string, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`${this.index.name} ${operation}`, this.timeoutMs, task);
    } catch (error) {
      throw new IndexUnavailableError(`Vector index ${operation} failed: ${errorMessage(error)}`, {
        cause: error,
        context: { index: this.index.name, operation },
      });
    }
  }
}

/**
 * Clamp scores into [0, 1], drop non-finite ones and keep the best score per passage id
 */
function dedupe(hits: IndexHit[]): IndexHit[] {
  const best = new Map<string, number>();
  for (const { passageId, score } of hits) {
    if (!Number.isFinite(score)) continue;
    const clamped = Math.min(1, Math.max(0, score));
    const previous = best.get(passageId);
    if (previous === undefined || clamped > previous) best.set(passageId, clamped);
  }
  return [...best].map(([passageId, score]) => ({ passageId, score }));
}
