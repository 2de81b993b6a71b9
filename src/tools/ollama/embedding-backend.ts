/**
 * Ollama Embedding Backend
 * Sentence embeddings from a local Ollama server (`POST /api/embeddings`)
 */

import { z } from "zod";
import { BackendFailureError, ValidationError, errorMessage } from "../../core/errors.js";
import { logger, type ChildLogger } from "../../core/logger.js";
import type { EmbeddingBackend } from "../../retrieval/types.js";

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  model: string;
}

export class OllamaEmbeddingBackend implements EmbeddingBackend {
  readonly name = "ollama";
  private log: ChildLogger;

  constructor(private readonly options: OllamaEmbeddingOptions) {
    this.log = logger.child({ component: "ollama", model: options.model });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}/api/embeddings`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({ model: this.options.model, prompt: text }),
        signal,
      });
    } catch (error) {
      throw new BackendFailureError(`Failed to reach Ollama: ${errorMessage(error)}`, this.name, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new BackendFailureError(`Ollama embeddings error (${response.status}): ${errorText}`, this.name, {
        context: { statusCode: response.status },
        retryable: response.status >= 500 || response.status === 429,
      });
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ValidationError("Malformed Ollama embeddings response", {
        field: "embedding",
        cause: parsed.error,
      });
    }

    this.log.debug("Embedded text", { chars: text.length, dimensions: parsed.data.embedding.length });
    return parsed.data.embedding;
  }
}
