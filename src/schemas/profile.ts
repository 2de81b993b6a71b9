/**
 * User Profile Schema
 * Immutable per-request snapshot of the person asking the question
 */

import { z } from "zod";
import { InvalidProfileError } from "../core/errors.js";

export const RiskToleranceSchema = z.enum(["conservative", "balanced", "growth"]);

const money = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number` })
    .finite(`${label} must be finite`)
    .nonnegative(`${label} must not be negative`);

/**
 * Profile as written in files and requests; optional flags stay absent
 */
export const ProfileRecordSchema = z.object({
  age: z
    .number({ invalid_type_error: "age must be a number" })
    .int("age must be a whole number")
    .positive("age must be greater than 0")
    .max(120, "age must be 120 or less"),
  annualIncome: money("annualIncome"),
  monthlyExpenses: money("monthlyExpenses"),
  riskTolerance: RiskToleranceSchema,
  superBalance: money("superBalance"),
  /** Irregular income (contracting, commission); lifts the conservative emergency buffer */
  incomeVariable: z.boolean().optional(),
  dependents: z.number().int().nonnegative().optional(),
});

export const UserProfileSchema = ProfileRecordSchema.extend({
  incomeVariable: z.boolean().default(false),
  dependents: z.number().int().nonnegative().default(0),
});

export type RiskTolerance = z.infer<typeof RiskToleranceSchema>;
export type UserProfile = Readonly<z.infer<typeof UserProfileSchema>>;
export type ProfileRecord = z.infer<typeof ProfileRecordSchema>;

function readField(input: unknown, field: string): unknown {
  if (typeof input !== "object" || input === null) return undefined;
  return Object.entries(input).find(([key]) => key === field)?.[1];
}

/**
 * Validate caller input into a frozen UserProfile.
 * Never coerces: the first failing field is reported as InvalidProfileError.
 */
export function parseProfile(input: unknown): UserProfile {
  const result = UserProfileSchema.safeParse(input);

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".") || "profile";
    throw new InvalidProfileError(`Invalid profile: ${issue.message}`, field, readField(input, field));
  }

  return Object.freeze(result.data);
}
