import { describe, expect, it } from "vitest";
import { citationMarker, validateCitations } from "../src/synthesis/citations.js";

const allowed = new Set(["ato-concessional-cap", "moneysmart-emergency-fund"]);

describe("validateCitations", () => {
  it("keeps markers for passages in the context", () => {
    const result = validateCitations(
      "The cap is $30,000 [source:ato-concessional-cap]. Hold six months [source:moneysmart-emergency-fund].",
      allowed
    );
    expect(result.text).toBe(
      "The cap is $30,000 [source:ato-concessional-cap]. Hold six months [source:moneysmart-emergency-fund]."
    );
    expect(result.citations).toEqual(["ato-concessional-cap", "moneysmart-emergency-fund"]);
    expect(result.rejected).toEqual([]);
  });

  it("strips markers naming passages outside the context", () => {
    const result = validateCitations("Rates rose [source:made-up-report] last year.", allowed);
    expect(result.text).toBe("Rates rose last year.");
    expect(result.citations).toEqual([]);
    expect(result.rejected).toEqual(["[source:made-up-report]"]);
  });

  it("normalises spacing and case in markers", () => {
    const result = validateCitations("Fact [ Source : ato-concessional-cap ]", allowed);
    expect(result.text).toBe("Fact [source:ato-concessional-cap]");
  });

  it("lists each citation once in first-use order", () => {
    const result = validateCitations(
      "A [source:moneysmart-emergency-fund] B [source:ato-concessional-cap] C [source:moneysmart-emergency-fund]",
      allowed
    );
    expect(result.citations).toEqual(["moneysmart-emergency-fund", "ato-concessional-cap"]);
  });

  it("removes unterminated and empty markers", () => {
    expect(validateCitations("Trailing [source:", allowed)).toEqual({
      text: "Trailing",
      citations: [],
      rejected: ["[source:"],
    });
    expect(validateCitations("Empty [source: ] marker", allowed).text).toBe("Empty marker");
  });

  it("ignores placeholder characters smuggled into the completion", () => {
    const result = validateCitations("Odd \u00000\u0000 text [source:ato-concessional-cap]", allowed);
    expect(result.text).toBe("Odd 0 text [source:ato-concessional-cap]");
  });

  it("never lets a near-miss id through", () => {
    const result = validateCitations("See [source:ato-concessional-cap-2025]", allowed);
    expect(result.citations).toEqual([]);
    expect(result.text).toBe("See");
  });

  it("formats markers", () => {
    expect(citationMarker("abc")).toBe("[source:abc]");
  });
});
