/**
 * Retrieval Interfaces
 * Seams to the external vector index and embedding model
 */

import type { DocumentType, Passage } from "../schemas/passage.js";

export interface IndexHit {
  passageId: string;
  /** Higher = more similar */
  score: number;
}

/**
 * The index owns embedding: callers hand it query text, never vectors
 */
export interface VectorIndex {
  readonly name: string;
  search(queryText: string, topK: number, signal?: AbortSignal): Promise<IndexHit[]>;
  fetch(passageId: string, signal?: AbortSignal): Promise<Passage | null>;
}

export interface EmbeddingBackend {
  readonly name: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface RetrievalFilter {
  documentTypes?: DocumentType[];
  authorities?: string[];
  /** Keep passages published on or after this ISO date; undated passages are dropped */
  publishedAfter?: string;
}
