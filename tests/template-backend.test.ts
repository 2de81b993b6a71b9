import { describe, expect, it } from "vitest";
import type { CalculationResult } from "../src/schemas/calculation.js";
import { GENERAL_ADVICE_DISCLAIMER } from "../src/synthesis/prompts.js";
import { TemplateGenerationBackend, leadSentence } from "../src/tools/template/template-backend.js";

const calculation: CalculationResult = {
  kind: "emergency-fund",
  ruleVersion: "2025-26",
  fields: [
    { name: "recommendedEmergencyFund", label: "Recommended emergency fund", value: 18000, unit: "currency" },
    { name: "monthsCovered", label: "Months of expenses covered", value: 6, unit: "count" },
  ],
  warnings: [],
};

describe("leadSentence", () => {
  it("takes the first sentence", () => {
    expect(leadSentence("Hold six months.  Then invest\nthe rest.")).toBe("Hold six months.");
  });

  it("keeps decimals inside the sentence", () => {
    expect(leadSentence("The rate is 11.5% this year. More.")).toBe("The rate is 11.5% this year.");
  });

  it("shortens long sentences", () => {
    const sentence = leadSentence("word ".repeat(100));
    expect(sentence.length).toBeLessThanOrEqual(240);
    expect(sentence.endsWith("...")).toBe(true);
  });
});

describe("TemplateGenerationBackend", () => {
  const backend = new TemplateGenerationBackend();

  it("states headline figures and cites sources", async () => {
    const text = await backend.complete({
      context: "",
      query: "How much?",
      calculation,
      sources: [{ id: "p1", text: "Hold three to six months. Keep it liquid.", authority: "ASIC Moneysmart" }],
    });

    expect(text).toBe(
      [
        "Emergency fund guidance:",
        "- Recommended emergency fund: $18,000.00",
        "",
        "From the knowledge base:",
        "- Hold three to six months. [source:p1]",
        "",
        GENERAL_ADVICE_DISCLAIMER,
      ].join("\n")
    );
  });

  it("cites at most three sources", async () => {
    const sources = ["a", "b", "c", "d"].map((id) => ({ id, text: `Passage ${id}.`, authority: "ATO" }));
    const text = await backend.complete({ context: "", query: "q", sources });

    expect(text.startsWith("From the knowledge base:\n- Passage a. [source:a]")).toBe(true);
    expect(text).not.toContain("[source:d]");
  });
});
