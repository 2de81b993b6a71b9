/**
 * Template Generation Backend
 * Deterministic, offline answers assembled from the structured context.
 * Used when no LLM is configured and by evaluation runs that must be reproducible.
 */

import { formatField } from "../../calculator/fields.js";
import type { CalculationKind } from "../../schemas/calculation.js";
import { citationMarker } from "../../synthesis/citations.js";
import { headlineFields } from "../../synthesis/key-figures.js";
import { GENERAL_ADVICE_DISCLAIMER } from "../../synthesis/prompts.js";
import type { GenerationBackend, GenerationRequest } from "../../synthesis/types.js";

const HEADINGS: Record<CalculationKind, string> = {
  "emergency-fund": "Emergency fund guidance:",
  "super-optimisation": "Salary sacrifice guidance:",
  "allocation-strategy": "Suggested asset allocation:",
  "income-tax": "Income tax estimate:",
  "super-guarantee": "Employer super contributions:",
  "retirement-projection": "Retirement projection:",
  "risk-assessment": "Risk profile:",
};

const MAX_SOURCES = 3;
const MAX_SENTENCE_CHARS = 240;

export function leadSentence(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  const end = flat.search(/[.!?](\s|$)/);
  const sentence = end === -1 ? flat : flat.slice(0, end + 1);
  return sentence.length > MAX_SENTENCE_CHARS ? `${sentence.slice(0, MAX_SENTENCE_CHARS - 3).trimEnd()}...` : sentence;
}

export class TemplateGenerationBackend implements GenerationBackend {
  readonly name = "template";

  async complete(request: GenerationRequest): Promise<string> {
    const lines: string[] = [];
    const { calculation } = request;
    const sources = (request.sources ?? []).slice(0, MAX_SOURCES);

    if (calculation) {
      lines.push(HEADINGS[calculation.kind]);
      for (const f of headlineFields(calculation)) {
        lines.push(`- ${f.label}: ${formatField(f)}`);
      }
      for (const w of calculation.warnings) {
        lines.push(`- Note: ${w.message}`);
      }
    }

    if (sources.length > 0) {
      if (lines.length > 0) lines.push("");
      lines.push("From the knowledge base:");
      for (const source of sources) {
        lines.push(`- ${leadSentence(source.text)} ${citationMarker(source.id)}`);
      }
    }

    lines.push("", GENERAL_ADVICE_DISCLAIMER);
    return lines.join("\n");
  }
}
