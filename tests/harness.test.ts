import { describe, expect, it } from "vitest";
import { BackendFailureError, IndexUnavailableError } from "../src/core/errors.js";
import { EvaluationHarness } from "../src/evaluation/harness.js";
import { formatMetricReport } from "../src/evaluation/report.js";
import type { AskOptions, PipelineResult } from "../src/pipeline/answer-pipeline.js";
import { HashingEmbeddingBackend } from "../src/retrieval/hashing-embedder.js";
import type { EmbeddingBackend } from "../src/retrieval/types.js";
import type { Confidence } from "../src/schemas/answer.js";
import { parseBenchmarkSuite, type BenchmarkSuite } from "../src/schemas/benchmark.js";
import { enhanced, passage, retrieval } from "./helpers.js";

interface Scripted {
  text: string;
  confidence: Confidence;
  retrieved: string[];
  delayMs?: number;
}

/**
 * Stands in for AnswerPipeline.ask, keyed by case id
 */
class FakePipeline {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, Scripted | Error>) {}

  async ask(query: string, options: AskOptions = {}): Promise<PipelineResult> {
    const caseId = options.caseId ?? "";
    this.calls.push(caseId);
    const entry = this.script[caseId];
    if (entry instanceof Error) throw entry;
    if (entry.delayMs) await new Promise((resolve) => setTimeout(resolve, entry.delayMs));

    return {
      requestId: `req-${caseId}`,
      enhanced: enhanced(query),
      retrieval: retrieval(entry.retrieved.map((id) => ({ passage: passage(id), score: 0.9 }))),
      answer: {
        text: entry.text,
        citations: [],
        confidence: entry.confidence,
        contextPassageIds: entry.retrieved,
        rejectedCitations: [],
        attempts: entry.confidence === "answerable" ? 1 : 0,
      },
      timings: { enhanceMs: 0, retrieveMs: 0, synthesizeMs: 0, totalMs: 0 },
    };
  }
}

function suite(cases: Array<{ id: string; relevant?: string[]; tags?: string[] }>): BenchmarkSuite {
  return parseBenchmarkSuite({
    id: "test-suite",
    name: "Test suite",
    version: "1",
    cases: cases.map((c) => ({
      id: c.id,
      query: `question ${c.id}`,
      relevant: (c.relevant ?? []).map((passageId) => ({ passageId, grade: 2 })),
      referenceAnswer: "keep six months of expenses",
      tags: c.tags,
    })),
  });
}

const embedder = new HashingEmbeddingBackend();
const answered = (retrieved: string[] = []): Scripted => ({
  text: "keep six months of expenses",
  confidence: "answerable",
  retrieved,
});
const unanswered: Scripted = { text: "no idea", confidence: "unanswerable", retrieved: [] };

describe("EvaluationHarness", () => {
  it("reports an unanswered rate of 0 when every case is answered", async () => {
    const harness = new EvaluationHarness(new FakePipeline({ a: answered(["p1"]), b: answered(["p2"]) }), embedder);
    const report = await harness.run(suite([{ id: "a", relevant: ["p1"] }, { id: "b", relevant: ["p2"] }]));

    expect(report.aggregate.unanswered).toBe(0);
    expect(report.aggregate["ndcg@5"]).toBe(1);
    expect(report.aggregate.mrr).toBe(1);
    expect(report.aggregate.rouge1).toBe(1);
    expect(report.aggregate.semantic).toBeCloseTo(1, 10);
  });

  it("reports an unanswered rate of 1 when nothing is answered", async () => {
    const harness = new EvaluationHarness(new FakePipeline({ a: unanswered, b: unanswered }), embedder);
    const report = await harness.run(suite([{ id: "a" }, { id: "b" }]));

    expect(report.aggregate.unanswered).toBe(1);
  });

  it("keeps benchmark order whatever order cases finish in", async () => {
    const pipeline = new FakePipeline({
      slow: { ...answered(), delayMs: 30 },
      fast: answered(),
      last: answered(),
    });
    const harness = new EvaluationHarness(pipeline, embedder, { concurrency: 2 });
    const report = await harness.run(suite([{ id: "slow" }, { id: "fast" }, { id: "last" }]));

    expect(report.cases.map((c) => c.case.id)).toEqual(["slow", "fast", "last"]);
  });

  it("excludes cases without relevant passages from ranking metrics", async () => {
    const harness = new EvaluationHarness(
      new FakePipeline({ judged: answered(["x", "p1"]), open: answered(["p1"]) }),
      embedder
    );
    const report = await harness.run(suite([{ id: "judged", relevant: ["p1"] }, { id: "open" }]));

    expect(report.exclusions["ndcg@5"]).toEqual(["open"]);
    expect(report.exclusions.mrr).toEqual(["open"]);
    expect(report.aggregate.mrr).toBe(0.5);
    expect(report.cases[1].scores["ndcg@5"]).toBe(0);
    expect(report.aggregate["ndcg@5"]).toBeCloseTo(1 / Math.log2(3), 10);
  });

  it("records pipeline failures and keeps going", async () => {
    const harness = new EvaluationHarness(
      new FakePipeline({
        broken: new IndexUnavailableError("index down"),
        fine: answered(["p1"]),
      }),
      embedder
    );
    const report = await harness.run(suite([{ id: "broken", relevant: ["p1"] }, { id: "fine", relevant: ["p1"] }]));

    const [broken, fine] = report.cases;
    expect(broken.status).toBe("failed");
    expect(broken.error).toEqual({ code: "INDEX_UNAVAILABLE", message: "index down" });
    expect(broken.scores).toMatchObject({ "ndcg@5": 0, unanswered: 1, rouge1: 0 });
    expect(fine.status).toBe("completed");
    expect(report.stats).toMatchObject({ totalCases: 2, completed: 1, failed: 1 });
    expect(report.aggregate.unanswered).toBe(0.5);
  });

  it("scores semantic similarity as 0 when embedding fails", async () => {
    const failing: EmbeddingBackend = {
      name: "failing",
      embed: async () => {
        throw new BackendFailureError("embedding server unreachable", "failing");
      },
    };
    const harness = new EvaluationHarness(new FakePipeline({ a: answered() }), failing);
    const report = await harness.run(suite([{ id: "a" }]));

    expect(report.cases[0].scores.semantic).toBe(0);
    expect(report.cases[0].warnings).toEqual(["semantic similarity unavailable: embedding server unreachable"]);
  });

  it("gives up on an embedding call that never settles", async () => {
    const hung: EmbeddingBackend = {
      name: "hung",
      embed: () => new Promise<number[]>(() => undefined),
    };
    const harness = new EvaluationHarness(new FakePipeline({ a: answered(["p1"]) }), hung, { embeddingTimeoutMs: 20 });
    const report = await harness.run(suite([{ id: "a", relevant: ["p1"] }]));

    expect(report.cases[0].status).toBe("completed");
    expect(report.cases[0].scores.semantic).toBe(0);
    expect(report.cases[0].scores.mrr).toBe(1);
    expect(report.cases[0].warnings).toEqual([
      "semantic similarity unavailable: semantic embedding timed out after 20ms",
    ]);
  });

  it("runs only the selected cases", async () => {
    const pipeline = new FakePipeline({ a: answered(), b: answered(), c: answered() });
    const harness = new EvaluationHarness(pipeline, embedder);
    const s = suite([{ id: "a", tags: ["super"] }, { id: "b", tags: ["metals"] }, { id: "c" }]);

    const byTag = await harness.run(s, { tags: ["super"] });
    expect(byTag.cases.map((c) => c.case.id)).toEqual(["a"]);

    const byId = await harness.run(s, { caseIds: ["b", "c"], runId: "run_fixed" });
    expect(byId.runId).toBe("run_fixed");
    expect(byId.cases.map((c) => c.case.id)).toEqual(["b", "c"]);
  });

  it("formats a readable summary", async () => {
    const harness = new EvaluationHarness(new FakePipeline({ a: answered(["p1"]) }), embedder);
    const report = await harness.run(suite([{ id: "a", relevant: ["p1"] }]), { runId: "run_1" });
    const text = formatMetricReport(report);

    expect(text).toContain("Evaluation Run: run_1");
    expect(text).toContain("- ndcg@5     1.000");
    expect(text).toContain("- unanswered 0.000");
  });
});
