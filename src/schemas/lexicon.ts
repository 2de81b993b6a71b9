/**
 * Domain Lexicon Schema
 * Abbreviations, intent keywords and ticker symbols used by the query enhancer
 */

import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { formatIssues, readJsonFile } from "./rules.js";

export const INTENTS = ["emergency-fund", "super", "allocation", "metals", "stocks", "general"] as const;

export const IntentSchema = z.enum(INTENTS);

export type Intent = z.infer<typeof IntentSchema>;

const lowerTerm = z
  .string()
  .min(1)
  .transform((s) => s.toLowerCase().trim());

export const LexiconSchema = z.object({
  version: z.string(),
  /** abbreviation or colloquial term → retrieval-friendly expansion */
  abbreviations: z.record(z.string(), z.string().min(1)),
  /** keywords that vote for an intent; multi-word phrases allowed */
  intentKeywords: z.object({
    "emergency-fund": z.array(lowerTerm),
    super: z.array(lowerTerm),
    allocation: z.array(lowerTerm),
    metals: z.array(lowerTerm),
    stocks: z.array(lowerTerm),
  }),
  /** extra retrieval context appended per detected intent */
  intentContext: z.record(IntentSchema, z.string()).default({}),
  /** ASX code → company or fund name */
  tickers: z.record(z.string().regex(/^[A-Z0-9]{2,5}$/), z.string()),
});

export type Lexicon = Readonly<z.infer<typeof LexiconSchema>>;

export function parseLexicon(data: unknown, source = "lexicon"): Lexicon {
  const result = LexiconSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid lexicon:\n${formatIssues(result.error)}`, { source });
  }
  return Object.freeze(result.data);
}

export async function loadLexicon(filePath: string): Promise<Lexicon> {
  return parseLexicon(await readJsonFile(filePath), filePath);
}
