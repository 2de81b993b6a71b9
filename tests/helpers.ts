import type { EnhancedQuery, RetrievalHit, RetrievalResult } from "../src/schemas/answer.js";
import type { Intent } from "../src/schemas/lexicon.js";
import type { DocumentType, Passage } from "../src/schemas/passage.js";
import type { IndexHit, VectorIndex } from "../src/retrieval/types.js";
import type { GenerationBackend, GenerationRequest } from "../src/synthesis/types.js";

export function passage(
  id: string,
  text = `Passage ${id}.`,
  metadata: { documentType?: DocumentType; authority?: string; publishedAt?: string; title?: string } = {}
): Passage {
  return {
    id,
    text,
    metadata: {
      documentType: metadata.documentType ?? "guide",
      authority: metadata.authority ?? "ATO",
      publishedAt: metadata.publishedAt,
      title: metadata.title,
    },
  };
}

export function enhanced(query: string, intent: Intent = "general", entities: EnhancedQuery["entities"] = []): EnhancedQuery {
  return { original: query, query, intent, entities };
}

export function retrieval(hits: RetrievalHit[]): RetrievalResult {
  return { query: "q", hits, candidates: hits.length, elapsedMs: 0 };
}

/**
 * Index with canned hits; records every search
 */
export class StubIndex implements VectorIndex {
  readonly name = "stub";
  readonly searches: Array<{ text: string; topK: number }> = [];
  private readonly passages = new Map<string, Passage>();

  constructor(
    passages: Passage[],
    private readonly hits: IndexHit[]
  ) {
    for (const p of passages) this.passages.set(p.id, p);
  }

  async search(text: string, topK: number): Promise<IndexHit[]> {
    this.searches.push({ text, topK });
    return this.hits.slice(0, topK);
  }

  async fetch(passageId: string): Promise<Passage | null> {
    return this.passages.get(passageId) ?? null;
  }
}

/**
 * Generation backend that replays scripted outcomes, one per call
 */
export class ScriptedBackend implements GenerationBackend {
  readonly name = "scripted";
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly outcomes: Array<string | Error>) {}

  async complete(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    const outcome = this.outcomes[Math.min(this.requests.length - 1, this.outcomes.length - 1)];
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}
