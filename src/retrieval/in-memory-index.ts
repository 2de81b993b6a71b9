/**
 * In-Memory Vector Index
 * Brute-force cosine search over a passages file; the offline stand-in for pgvector
 */

import { ConfigError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { PassageCollectionSchema, type Passage } from "../schemas/passage.js";
import { formatIssues, readJsonFile } from "../schemas/rules.js";
import { cosineSimilarity, toUnitScore } from "./similarity.js";
import type { EmbeddingBackend, IndexHit, VectorIndex } from "./types.js";

const log = logger.child({ component: "in-memory-index" });

export class InMemoryVectorIndex implements VectorIndex {
  readonly name = "in-memory";
  private readonly passages: Map<string, Passage>;
  private vectors: Promise<Array<{ id: string; vector: number[] }>> | null = null;

  constructor(
    passages: readonly Passage[],
    private readonly embedder: EmbeddingBackend
  ) {
    this.passages = new Map();
    for (const passage of passages) {
      if (this.passages.has(passage.id)) {
        throw new ConfigError(`Duplicate passage id "${passage.id}"`, { source: "passages" });
      }
      this.passages.set(passage.id, passage);
    }
  }

  /**
   * Load and validate a `{ version, passages }` file
   */
  static async fromFile(filePath: string, embedder: EmbeddingBackend): Promise<InMemoryVectorIndex> {
    const result = PassageCollectionSchema.safeParse(await readJsonFile(filePath));
    if (!result.success) {
      throw new ConfigError(`Invalid passages file:\n${formatIssues(result.error)}`, { source: filePath });
    }
    log.debug("Loaded passages", { path: filePath, count: result.data.passages.length });
    return new InMemoryVectorIndex(result.data.passages, embedder);
  }

  get size(): number {
    return this.passages.size;
  }

  async search(queryText: string, topK: number, signal?: AbortSignal): Promise<IndexHit[]> {
    const vectors = await this.ensureVectors(signal);
    const query = await this.embedder.embed(queryText, signal);

    return vectors
      .map(({ id, vector }) => ({ passageId: id, score: toUnitScore(cosineSimilarity(query, vector)) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  async fetch(passageId: string): Promise<Passage | null> {
    return this.passages.get(passageId) ?? null;
  }

  private ensureVectors(signal?: AbortSignal): Promise<Array<{ id: string; vector: number[] }>> {
    if (!this.vectors) {
      const pending = Promise.all(
        [...this.passages.values()].map(async (p) => ({
          id: p.id,
          vector: await this.embedder.embed(embeddingText(p), signal),
        }))
      );
      // A failed build is retried on the next search
      pending.catch(() => {
        this.vectors = null;
      });
      this.vectors = pending;
    }
    return this.vectors;
  }
}

function embeddingText(passage: Passage): string {
  return passage.metadata.title ? `${passage.metadata.title}\n${passage.text}` : passage.text;
}
