/**
 * Headline figures per calculation, and the footer appended when a completion leaves them out
 */

import type { CalculationField, CalculationKind, CalculationResult } from "../schemas/calculation.js";
import { formatField, roundTo } from "../calculator/fields.js";

const HEADLINE_FIELDS: Record<CalculationKind, string[]> = {
  "emergency-fund": ["recommendedEmergencyFund"],
  "super-optimisation": ["netTaxBenefit", "excessContribution"],
  "allocation-strategy": [
    "australianEquities",
    "internationalEquities",
    "fixedIncome",
    "cash",
    "preciousMetals",
  ],
  "income-tax": ["totalTax"],
  "super-guarantee": ["annualEmployerContribution"],
  "retirement-projection": ["projectedSuperBalance"],
  "risk-assessment": ["riskScore"],
};

export function headlineFields(calculation: CalculationResult): CalculationField[] {
  const names = HEADLINE_FIELDS[calculation.kind];
  return calculation.fields.filter(
    // An excess or metals sleeve of zero is not worth restating
    (f) => names.includes(f.name) && !(f.value === 0 && (f.name === "excessContribution" || f.name === "preciousMetals"))
  );
}

/**
 * Every number written in the text, with thousands separators removed
 */
export function numbersIn(text: string): number[] {
  return (text.match(/-?\d[\d,]*(?:\.\d+)?/g) ?? [])
    .map((n) => Number(n.replace(/,/g, "")))
    .filter((n) => Number.isFinite(n));
}

function isStated(f: CalculationField, numbers: number[]): boolean {
  const targets = f.unit === "rate" ? [f.value, roundTo(f.value * 100, 2)] : [f.value];
  return numbers.some((n) => targets.some((t) => Math.abs(n - t) < 0.005));
}

/**
 * Headline fields whose value does not appear anywhere in the text
 */
export function missingFigures(text: string, calculation: CalculationResult): CalculationField[] {
  const numbers = numbersIn(text);
  return headlineFields(calculation).filter((f) => !isStated(f, numbers));
}

export function keyFiguresFooter(fields: CalculationField[]): string {
  return ["Key figures:", ...fields.map((f) => `- ${f.label}: ${formatField(f)}`)].join("\n");
}
