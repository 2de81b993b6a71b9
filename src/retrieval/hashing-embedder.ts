/**
 * Hashing Embedder
 * Offline embedding backend: feature-hashed, L2-normalised term frequencies.
 * Used by the in-memory index and by evaluation runs that have no embedding server.
 */

import { fnv1a, tokenize } from "../core/text.js";
import { l2Normalize } from "./similarity.js";
import type { EmbeddingBackend } from "./types.js";

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "can", "do", "for", "how", "i", "if",
  "in", "is", "it", "my", "of", "on", "or", "should", "that", "the", "to", "what", "when",
  "which", "with", "you", "your",
]);

export interface HashingEmbeddingOptions {
  dimensions?: number;
}

export class HashingEmbeddingBackend implements EmbeddingBackend {
  readonly name = "hashing";
  private readonly dimensions: number;

  constructor(options: HashingEmbeddingOptions = {}) {
    this.dimensions = options.dimensions ?? 512;
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vec = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      if (STOPWORDS.has(token)) continue;
      vec[fnv1a(token) % this.dimensions] += 1;
    }
    return l2Normalize(vec);
  }
}
