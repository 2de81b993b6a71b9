/**
 * Rule Table Schema
 * Versioned Australian tax and superannuation parameters, loaded once at startup
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

export const TaxBracketSchema = z.object({
  /** Inclusive lower bound of taxable income for this rate */
  lowerBound: z.number().nonnegative(),
  rate: z.number().min(0).max(1),
});

export const RuleTableSchema = z
  .object({
    version: z.string().min(1),
    financialYear: z.string().regex(/^\d{4}-\d{2}$/, "financialYear must look like 2025-26"),
    taxBrackets: z.array(TaxBracketSchema).min(1),
    medicareLevyRate: z.number().min(0).max(1),
    /** Levy applies to incomes above this amount */
    medicareLevyThreshold: z.number().nonnegative(),
    superGuaranteeRate: z.number().min(0).max(1),
    contributionsTaxRate: z.number().min(0).max(1),
    concessionalCap: z.number().positive(),
    preservationAge: z.number().int().positive(),
    agePensionAnnual: z.number().nonnegative(),
  })
  .superRefine((table, ctx) => {
    if (table.taxBrackets[0].lowerBound !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["taxBrackets", 0, "lowerBound"],
        message: "first tax bracket must start at 0",
      });
    }
    for (let i = 1; i < table.taxBrackets.length; i++) {
      if (table.taxBrackets[i].lowerBound <= table.taxBrackets[i - 1].lowerBound) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["taxBrackets", i, "lowerBound"],
          message: "tax brackets must be strictly ascending",
        });
      }
    }
  });

export type TaxBracket = Readonly<z.infer<typeof TaxBracketSchema>>;

export interface RuleTable {
  readonly version: string;
  readonly financialYear: string;
  readonly taxBrackets: readonly TaxBracket[];
  readonly medicareLevyRate: number;
  readonly medicareLevyThreshold: number;
  readonly superGuaranteeRate: number;
  readonly contributionsTaxRate: number;
  readonly concessionalCap: number;
  readonly preservationAge: number;
  readonly agePensionAnnual: number;
}

/**
 * Validate a parsed rule table and deep-freeze it.
 * Throws ConfigError listing every issue; no partially valid table is ever returned.
 */
export function parseRuleTable(data: unknown, source = "rule table"): RuleTable {
  const result = RuleTableSchema.safeParse(data);

  if (!result.success) {
    throw new ConfigError(`Invalid rule table:\n${formatIssues(result.error)}`, { source });
  }

  const table = result.data;
  return Object.freeze({
    ...table,
    taxBrackets: Object.freeze(table.taxBrackets.map((b) => Object.freeze({ ...b }))),
  });
}

/**
 * Load `<rulesDir>/<version>.json`
 */
export async function loadRuleTable(rulesDir: string, version: string): Promise<RuleTable> {
  const filePath = path.join(rulesDir, `${version}.json`);
  const data = await readJsonFile(filePath);
  const table = parseRuleTable(data, filePath);

  if (table.version !== version) {
    throw new ConfigError(`Rule table ${filePath} declares version ${table.version}, expected ${version}`, {
      source: filePath,
    });
  }

  return table;
}

/**
 * Read and JSON-parse a config file, mapping every failure to ConfigError
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read ${filePath}`, { source: filePath, cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Malformed JSON in ${filePath}`, { source: filePath, cause: error });
  }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((e) => `  - ${e.path.join(".") || "(root)"}: ${e.message}`).join("\n");
}
