/**
 * Supabase Vector Index
 * pgvector similarity search through the `match_passages` RPC (see sql/passages.sql).
 * Embeds the query with the configured embedding backend before the RPC.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { IndexUnavailableError, ValidationError } from "../../core/errors.js";
import { logger, type ChildLogger } from "../../core/logger.js";
import { PassageSchema, type Passage } from "../../schemas/passage.js";
import type { EmbeddingBackend, IndexHit, VectorIndex } from "../../retrieval/types.js";

const MatchRowsSchema = z.array(
  z.object({
    id: z.string(),
    similarity: z.number(),
  })
);

export class SupabaseVectorIndex implements VectorIndex {
  readonly name = "supabase";
  private log: ChildLogger;

  constructor(
    private readonly client: SupabaseClient,
    private readonly embedder: EmbeddingBackend,
    private readonly table = "passages"
  ) {
    this.log = logger.child({ component: "supabase-index" });
  }

  async search(queryText: string, topK: number, signal?: AbortSignal): Promise<IndexHit[]> {
    const embedding = await this.embedder.embed(queryText, signal);

    let request = this.client.rpc("match_passages", {
      query_embedding: embedding,
      match_count: topK,
    });
    if (signal) request = request.abortSignal(signal);

    const { data, error } = await request;
    if (error) {
      throw new IndexUnavailableError(`match_passages failed: ${error.message}`, {
        cause: error,
        context: { code: error.code },
      });
    }

    const rows = MatchRowsSchema.safeParse(data ?? []);
    if (!rows.success) {
      throw new ValidationError("Malformed match_passages response", { cause: rows.error });
    }

    this.log.debug("Vector search", { requested: topK, returned: rows.data.length });
    return rows.data.map((r) => ({ passageId: r.id, score: r.similarity }));
  }

  async fetch(passageId: string, signal?: AbortSignal): Promise<Passage | null> {
    let request = this.client.from(this.table).select("id, text, metadata").eq("id", passageId);
    if (signal) request = request.abortSignal(signal);

    const { data, error } = await request.maybeSingle();
    if (error) {
      throw new IndexUnavailableError(`Failed to fetch passage ${passageId}: ${error.message}`, {
        cause: error,
        context: { passageId },
      });
    }
    if (!data) return null;

    const parsed = PassageSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`Stored passage ${passageId} is malformed`, { field: "passage", cause: parsed.error });
    }
    return parsed.data;
  }
}
