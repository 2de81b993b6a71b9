/**
 * Calculation Result Types
 * Output records of the financial calculator
 */

export type CalculationKind =
  | "emergency-fund"
  | "super-optimisation"
  | "allocation-strategy"
  | "income-tax"
  | "super-guarantee"
  | "retirement-projection"
  | "risk-assessment";

/**
 * Drives rounding: currency to cents, rates to 4 dp, percent weights to 2 dp
 */
export type FieldUnit = "currency" | "rate" | "percent" | "years" | "count";

export interface CalculationField {
  /** Stable machine name, e.g. "recommendedEmergencyFund" */
  name: string;
  /** Human label used when serialising into the prompt context */
  label: string;
  value: number;
  unit: FieldUnit;
}

export type WarningCode =
  | "excess-concessional"
  | "sacrifice-exceeds-income"
  | "no-tax-benefit"
  | "past-retirement-age"
  | "before-preservation-age";

export interface CalculationWarning {
  code: WarningCode;
  message: string;
  amount?: number;
}

export interface CalculationResult {
  kind: CalculationKind;
  /** Rule table version the figures were computed with */
  ruleVersion: string;
  fields: CalculationField[];
  warnings: CalculationWarning[];
  /** Qualitative outputs that are not numbers (risk band, time horizon) */
  notes?: Record<string, string>;
}

/**
 * Look up a field value by name
 */
export function fieldValue(result: CalculationResult, name: string): number | undefined {
  return result.fields.find((f) => f.name === name)?.value;
}
