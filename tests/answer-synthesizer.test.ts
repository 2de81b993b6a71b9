import { beforeAll, describe, expect, it } from "vitest";
import { FinancialCalculator } from "../src/calculator/financial-calculator.js";
import { ValidationError } from "../src/core/errors.js";
import { fieldValue } from "../src/schemas/calculation.js";
import type { UserProfile } from "../src/schemas/profile.js";
import { loadRuleTable } from "../src/schemas/rules.js";
import { AnswerSynthesizer } from "../src/synthesis/answer-synthesizer.js";
import { UNANSWERABLE_MESSAGE } from "../src/synthesis/prompts.js";
import type { GenerationBackend } from "../src/synthesis/types.js";
import { ScriptedBackend, enhanced, passage, retrieval } from "./helpers.js";

const options = { maxContextChars: 6000, answerabilityThreshold: 0.3, backendTimeoutMs: 1000 };

const profile: UserProfile = {
  age: 35,
  annualIncome: 75000,
  monthlyExpenses: 3000,
  riskTolerance: "balanced",
  superBalance: 60000,
  incomeVariable: false,
  dependents: 0,
};

const hits = (...scores: number[]) => scores.map((score, i) => ({ passage: passage(`p${i + 1}`), score }));

let calculator: FinancialCalculator;

beforeAll(async () => {
  calculator = new FinancialCalculator(await loadRuleTable("config/rules", "2025-26"));
});

describe("AnswerSynthesizer", () => {
  it("answers unanswerable without calling the backend when nothing was retrieved", async () => {
    const backend = new ScriptedBackend(["should not be used"]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("pizza?"), "general", retrieval([]));

    expect(answer.confidence).toBe("unanswerable");
    expect(answer.text).toBe(UNANSWERABLE_MESSAGE);
    expect(answer.attempts).toBe(0);
    expect(answer.note).toBe("No relevant passages were retrieved");
    expect(backend.requests).toHaveLength(0);
  });

  it("answers unanswerable when the best passage is below the threshold", async () => {
    const backend = new ScriptedBackend(["unused"]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("q"), "general", retrieval(hits(0.1)));

    expect(answer.confidence).toBe("unanswerable");
    expect(answer.note).toBe("Best passage score 0.100 is below the answerability threshold 0.3");
    expect(backend.requests).toHaveLength(0);
  });

  it("answers from the calculator alone when retrieval is empty", async () => {
    const backend = new ScriptedBackend(["Keep $18,000.00 aside."]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("emergency fund?"), "emergency-fund", retrieval([]), profile);

    expect(answer.confidence).toBe("answerable");
    expect(answer.text).toBe("Keep $18,000.00 aside.");
    expect(answer.calculation?.kind).toBe("emergency-fund");
    expect(answer.attempts).toBe(1);
    expect(backend.requests[0].context).toContain("- Recommended emergency fund: $18,000.00");
  });

  it("appends key figures the completion left out", async () => {
    const backend = new ScriptedBackend(["Keep some cash aside."]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("emergency fund?"), "emergency-fund", retrieval([]), profile);

    expect(answer.text).toBe("Keep some cash aside.\n\nKey figures:\n- Recommended emergency fund: $18,000.00");
  });

  it("strips citations to passages outside the context", async () => {
    const backend = new ScriptedBackend(["Fact [source:p9]. Other [source:p1]."]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("q"), "general", retrieval(hits(0.8)));

    expect(answer.text).toBe("Fact. Other [source:p1].");
    expect(answer.citations).toEqual(["p1"]);
    expect(answer.rejectedCitations).toEqual(["[source:p9]"]);
    expect(answer.contextPassageIds).toEqual(["p1"]);
  });

  it("retries once with half the passages", async () => {
    const backend = new ScriptedBackend([new Error("overloaded"), "Answer [source:p2]"]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("q"), "general", retrieval(hits(0.9, 0.8, 0.7, 0.6)));

    expect(answer.confidence).toBe("answerable");
    expect(answer.attempts).toBe(2);
    expect(answer.citations).toEqual(["p2"]);
    expect(backend.requests.map((r) => r.sources?.map((s) => s.id))).toEqual([
      ["p1", "p2", "p3", "p4"],
      ["p1", "p2"],
    ]);
  });

  it("treats an empty completion as a failure", async () => {
    const backend = new ScriptedBackend(["   ", "Second try [source:p1]"]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("q"), "general", retrieval(hits(0.9)));

    expect(answer.attempts).toBe(2);
    expect(answer.text).toBe("Second try [source:p1]");
  });

  it("falls back to unanswerable after the retry fails, keeping the calculation", async () => {
    const backend = new ScriptedBackend([new Error("boom")]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(
      enhanced("emergency fund?"),
      "emergency-fund",
      retrieval(hits(0.9)),
      profile
    );

    expect(answer.confidence).toBe("unanswerable");
    expect(answer.attempts).toBe(2);
    expect(answer.note).toBe("Generation backend failed: boom");
    expect(answer.calculation?.kind).toBe("emergency-fund");
  });

  it("does not retry a failure that is not retryable", async () => {
    const backend = new ScriptedBackend([
      new ValidationError("completion payload is malformed"),
      "Answer [source:p1]",
    ]);
    const synthesizer = new AnswerSynthesizer(calculator, backend, options);

    const answer = await synthesizer.synthesize(enhanced("q"), "general", retrieval(hits(0.9, 0.8)));

    expect(answer.confidence).toBe("unanswerable");
    expect(answer.attempts).toBe(1);
    expect(answer.note).toBe("Generation backend failed: completion payload is malformed");
    expect(backend.requests).toHaveLength(1);
  });

  it("gives up on a backend that never answers", async () => {
    const hung: GenerationBackend = { name: "hung", complete: () => new Promise<string>(() => undefined) };
    const synthesizer = new AnswerSynthesizer(calculator, hung, { ...options, backendTimeoutMs: 20 });

    const answer = await synthesizer.synthesize(enhanced("q"), "general", retrieval(hits(0.9)));

    expect(answer.confidence).toBe("unanswerable");
    expect(answer.note).toBe("Generation backend failed: hung generation timed out after 20ms");
  });

  it("uses the amount in the question as the salary sacrifice", () => {
    const synthesizer = new AnswerSynthesizer(calculator, new ScriptedBackend(["x"]), options);
    const query = enhanced("sacrifice $5,000?", "super", [
      { kind: "amount", value: 5000, text: "$5,000", role: "sacrifice" },
    ]);

    const calculation = synthesizer.calculate("super", profile, query);
    expect(calculation && fieldValue(calculation, "netTaxBenefit")).toBe(850);

    const fallback = synthesizer.calculate("super", profile, enhanced("sacrifice?", "super"));
    expect(fallback && fieldValue(fallback, "desiredSacrifice")).toBe(7500);
  });

  it("falls back to the default sacrifice when the only amount is income", () => {
    const synthesizer = new AnswerSynthesizer(calculator, new ScriptedBackend(["x"]), options);
    const query = enhanced("I earn $75,000, how much should I sacrifice?", "super", [
      { kind: "amount", value: 75000, text: "$75,000", role: "income" },
    ]);

    const calculation = synthesizer.calculate("super", profile, query);
    expect(calculation && fieldValue(calculation, "desiredSacrifice")).toBe(7500);
    expect(calculation && fieldValue(calculation, "excessContribution")).toBe(0);
    expect(calculation?.warnings).toEqual([]);
  });

  it("runs no calculation without a profile or for intents with no calculator", () => {
    const synthesizer = new AnswerSynthesizer(calculator, new ScriptedBackend(["x"]), options);
    expect(synthesizer.calculate("emergency-fund", undefined, enhanced("q"))).toBeUndefined();
    expect(synthesizer.calculate("metals", profile, enhanced("q"))).toBeUndefined();
  });
});
