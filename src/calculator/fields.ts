/**
 * Field builders and rounding rules for calculation output
 */

import type { CalculationField, FieldUnit } from "../schemas/calculation.js";

const DECIMALS: Record<FieldUnit, number> = {
  currency: 2,
  rate: 4,
  percent: 2,
  years: 0,
  count: 0,
};

/**
 * Half-up rounding that survives binary representation (1.005 → 1.01)
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export const roundCurrency = (value: number): number => roundTo(value, DECIMALS.currency);
export const roundRate = (value: number): number => roundTo(value, DECIMALS.rate);

export function field(name: string, label: string, value: number, unit: FieldUnit): CalculationField {
  return { name, label, value: roundTo(value, DECIMALS[unit]), unit };
}

/**
 * Currency field that must not go below zero
 */
export function nonNegative(name: string, label: string, value: number): CalculationField {
  return field(name, label, Math.max(0, value), "currency");
}

export function formatAud(value: number): string {
  return `$${value.toLocaleString("en-AU", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

/**
 * Render a field the way it appears in prompts and answer footers
 */
export function formatField(f: CalculationField): string {
  switch (f.unit) {
    case "currency":
      return formatAud(f.value);
    case "rate":
      return `${roundTo(f.value * 100, 2)}%`;
    case "percent":
      return `${f.value}%`;
    case "years":
      return `${f.value} years`;
    case "count":
      return String(f.value);
  }
}
