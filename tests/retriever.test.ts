import { describe, expect, it } from "vitest";
import { IndexUnavailableError, TimeoutError, ValidationError } from "../src/core/errors.js";
import { Retriever } from "../src/retrieval/retriever.js";
import type { IndexHit, VectorIndex } from "../src/retrieval/types.js";
import type { Passage } from "../src/schemas/passage.js";
import { StubIndex, enhanced, passage } from "./helpers.js";

const ids = (hits: Array<{ passage: Passage }>) => hits.map((h) => h.passage.id);

function retrieverFor(passages: Passage[], hits: IndexHit[], fetchK = 0) {
  const index = new StubIndex(passages, hits);
  return { index, retriever: new Retriever(index, { fetchK, timeoutMs: 1000 }) };
}

describe("Retriever", () => {
  it("orders by score, then newer date, then id", async () => {
    const passages = [
      passage("a", "a", { publishedAt: "2024-01-01" }),
      passage("b", "b", { publishedAt: "2025-01-01" }),
      passage("c", "c"),
      passage("d", "d", { publishedAt: "2020-01-01" }),
      passage("e", "e", { publishedAt: "2025-01-01" }),
    ];
    const { retriever } = retrieverFor(passages, [
      { passageId: "a", score: 0.8 },
      { passageId: "c", score: 0.8 },
      { passageId: "e", score: 0.8 },
      { passageId: "b", score: 0.8 },
      { passageId: "d", score: 0.9 },
    ]);

    const result = await retriever.retrieve(enhanced("q"), 5, 0);
    expect(ids(result.hits)).toEqual(["d", "b", "e", "a", "c"]);
    expect(result.candidates).toBe(5);
  });

  it("drops hits below the minimum score", async () => {
    const { retriever } = retrieverFor(
      [passage("a"), passage("b")],
      [
        { passageId: "a", score: 0.5 },
        { passageId: "b", score: 0.1 },
      ]
    );
    expect(ids((await retriever.retrieve(enhanced("q"), 5, 0.2)).hits)).toEqual(["a"]);
    expect((await retriever.retrieve(enhanced("q"), 5, 0.9)).hits).toEqual([]);
  });

  it("keeps the best score per passage and clamps into [0, 1]", async () => {
    const { retriever } = retrieverFor(
      [passage("a"), passage("b")],
      [
        { passageId: "a", score: 0.4 },
        { passageId: "b", score: 1.3 },
        { passageId: "a", score: 0.7 },
      ]
    );
    const result = await retriever.retrieve(enhanced("q"), 5, 0);
    expect(result.hits.map((h) => [h.passage.id, h.score])).toEqual([
      ["b", 1],
      ["a", 0.7],
    ]);
  });

  it("truncates to topK after filtering", async () => {
    const passages = [
      passage("reg", "r", { documentType: "regulation", authority: "ATO", publishedAt: "2025-07-01" }),
      passage("guide", "g", { documentType: "guide", authority: "ATO", publishedAt: "2025-07-01" }),
      passage("abs", "s", { documentType: "regulation", authority: "ABS", publishedAt: "2025-07-01" }),
      passage("old", "o", { documentType: "regulation", authority: "ATO", publishedAt: "2019-01-01" }),
      passage("undated", "u", { documentType: "regulation", authority: "ATO" }),
    ];
    const hits = passages.map((p, i) => ({ passageId: p.id, score: 0.9 - i * 0.1 }));
    const { retriever } = retrieverFor(passages, hits);

    const result = await retriever.retrieve(enhanced("q"), 1, 0, {
      documentTypes: ["regulation"],
      authorities: ["ato"],
      publishedAfter: "2020-01-01",
    });
    expect(ids(result.hits)).toEqual(["reg"]);

    const all = await retriever.retrieve(enhanced("q"), 10, 0, { documentTypes: ["regulation"], authorities: ["ATO"] });
    expect(ids(all.hits)).toEqual(["reg", "old", "undated"]);
  });

  it("asks the index for extra candidates", async () => {
    const { index, retriever } = retrieverFor([], [], 20);
    await retriever.retrieve(enhanced("super cap"), 2, 0);
    await retriever.retrieve(enhanced("super cap"), 10, 0);
    expect(index.searches).toEqual([
      { text: "super cap", topK: 20 },
      { text: "super cap", topK: 40 },
    ]);
  });

  it("skips hits whose passage cannot be fetched", async () => {
    const { retriever } = retrieverFor(
      [passage("a")],
      [
        { passageId: "ghost", score: 0.9 },
        { passageId: "a", score: 0.5 },
      ]
    );
    expect(ids((await retriever.retrieve(enhanced("q"), 5, 0)).hits)).toEqual(["a"]);
  });

  it("rejects a non-positive topK", async () => {
    const { retriever } = retrieverFor([], []);
    await expect(retriever.retrieve(enhanced("q"), 0, 0)).rejects.toBeInstanceOf(ValidationError);
  });

  it("wraps index failures as IndexUnavailableError", async () => {
    const broken: VectorIndex = {
      name: "broken",
      search: async () => {
        throw new Error("connection refused");
      },
      fetch: async () => null,
    };
    const retriever = new Retriever(broken, { timeoutMs: 1000 });
    await expect(retriever.retrieve(enhanced("q"), 5, 0)).rejects.toThrow(
      "Vector index search failed: connection refused"
    );
  });

  it("gives up on a hung index after the timeout", async () => {
    const hung: VectorIndex = {
      name: "hung",
      search: () => new Promise<IndexHit[]>(() => undefined),
      fetch: async () => null,
    };
    const retriever = new Retriever(hung, { timeoutMs: 20 });

    const error = await retriever.retrieve(enhanced("q"), 5, 0).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(IndexUnavailableError);
    expect(error).toMatchObject({ cause: expect.any(TimeoutError) });
  });
});
