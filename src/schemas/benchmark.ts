/**
 * Benchmark Schema
 * Fixed evaluation cases replayed through the pipeline
 */

import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { PassageIdSchema } from "./passage.js";
import { ProfileRecordSchema } from "./profile.js";
import { formatIssues, readJsonFile } from "./rules.js";

export const RelevanceJudgementSchema = z.object({
  passageId: PassageIdSchema,
  /** 0 = irrelevant, 3 = perfectly relevant */
  grade: z.number().int().min(0).max(3),
});

export const BenchmarkCaseSchema = z.object({
  id: z.string().min(1),
  query: z.string().min(1),
  relevant: z.array(RelevanceJudgementSchema),
  referenceAnswer: z.string(),
  /** Lets a case exercise the calculator path */
  profile: ProfileRecordSchema.optional(),
  tags: z.array(z.string()).optional(),
});

export const BenchmarkSuiteSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    version: z.string(),
    description: z.string().optional(),
    cases: z.array(BenchmarkCaseSchema).min(1),
  })
  .superRefine((suite, ctx) => {
    const seen = new Set<string>();
    suite.cases.forEach((c, i) => {
      if (seen.has(c.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["cases", i, "id"],
          message: `duplicate case id "${c.id}"`,
        });
      }
      seen.add(c.id);
    });
  });

export type RelevanceJudgement = z.infer<typeof RelevanceJudgementSchema>;
export type BenchmarkCase = z.infer<typeof BenchmarkCaseSchema>;
export type BenchmarkSuite = z.infer<typeof BenchmarkSuiteSchema>;

export function parseBenchmarkSuite(data: unknown, source = "benchmark"): BenchmarkSuite {
  const result = BenchmarkSuiteSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid benchmark suite:\n${formatIssues(result.error)}`, { source });
  }
  return Object.freeze(result.data);
}

export async function loadBenchmarkSuite(filePath: string): Promise<BenchmarkSuite> {
  return parseBenchmarkSuite(await readJsonFile(filePath), filePath);
}
