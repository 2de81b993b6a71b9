#!/usr/bin/env node
/**
 * FinRAG CLI - Entry Point
 * Australian personal-finance question answering over a passage index
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Validate configuration (loadAppConfig)
 * 4. Branch based on command:
 *    - "ask"      → AnswerPipeline.ask() - enhance, retrieve, synthesize
 *    - "calc"     → FinancialCalculator only, no retrieval or generation
 *    - "evaluate" → EvaluationHarness.run() over a benchmark suite
 * 5. Display results to console
 *
 * USAGE:
 *   npm run ask -- "How big should my emergency fund be?" --age 35 --income 85000 --expenses 3000
 *   npm run calc -- super --age 35 --income 75000 --expenses 3000 --sacrifice 5000
 *   npm run evaluate -- data/benchmarks/sample.json --backend template
 */

import "dotenv/config";

import path from "path";
import { logger } from "./core/logger.js";
import { loadAppConfig, type AppConfig } from "./core/config.js";
import { errorMessage, ValidationError, wrapError } from "./core/errors.js";
import { formatField } from "./calculator/fields.js";
import type { FinancialCalculator } from "./calculator/financial-calculator.js";
import { optionList, optionNumber, optionValue, parseArgs, type ParsedArgs } from "./cli/args.js";
import { EvaluationHarness } from "./evaluation/harness.js";
import { formatMetricReport, writeMetricReport } from "./evaluation/report.js";
import { buildPipeline, loadCalculator, type BackendChoice, type IndexChoice } from "./pipeline/factory.js";
import type { PipelineResult } from "./pipeline/answer-pipeline.js";
import type { RetrievalFilter } from "./retrieval/types.js";
import { loadBenchmarkSuite } from "./schemas/benchmark.js";
import type { CalculationResult } from "./schemas/calculation.js";
import { DocumentTypeSchema } from "./schemas/passage.js";
import { parseProfile, type UserProfile } from "./schemas/profile.js";
import { readJsonFile } from "./schemas/rules.js";

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
FinRAG AU - Australian personal-finance answers with citations

USAGE:
  npx tsx src/index.ts <command> [options]

COMMANDS:
  ask <question>        Answer a question from the knowledge base
  calc <calculation>    Run a calculation: emergency-fund, super, allocation,
                        tax, sg, retirement, risk
  evaluate [suite]      Score a benchmark suite (default: data/benchmarks/sample.json)
  help                  Show this help message

PROFILE OPTIONS (ask, calc):
  -p, --profile <file>    Profile JSON file; the options below override it
      --age <years>
      --income <aud>      Annual income
      --expenses <aud>    Monthly essential expenses
      --risk <level>      conservative, balanced or growth (default: balanced)
      --super <aud>       Current super balance (default: 0)
      --dependents <n>
      --variable-income   Income is irregular

ASK OPTIONS:
  -k, --top-k <n>         Passages to retrieve
      --doc-type <types>  Only these document types (comma-separated)
      --authority <names> Only these authorities (comma-separated)
      --after <date>      Only passages published on or after YYYY-MM-DD

CALC OPTIONS:
      --sacrifice <aud>       Salary sacrifice amount (super)
      --retirement-age <n>    Retirement age (retirement, default 67)
      --return <rate>         Expected annual return (retirement, default 0.07)
      --contribution <aud>    Net annual contribution (retirement)
      --rules <version>       Rule table version (default: RULES_VERSION)

EVALUATE OPTIONS:
  -o, --output <dir>      Report directory (default: <DATA_DIR>/reports)
      --case <id>         Only these cases (repeatable or comma-separated)
      --tag <tag>         Only cases with these tags
      --concurrency <n>   Cases run in parallel

COMMON OPTIONS:
      --backend <name>    auto, claude or template (default: auto)
      --index <name>      auto, supabase or memory (default: auto)
      --json              Print machine-readable JSON
  -v, --verbose           Enable debug logging

EXAMPLES:
  npx tsx src/index.ts ask "Should I salary sacrifice $5,000 into super?" --age 35 --income 75000 --expenses 3000
  npx tsx src/index.ts calc allocation --age 35 --income 90000 --expenses 3500 --risk growth
  npx tsx src/index.ts evaluate --backend template --output data/reports
`);
}

// ============================================================
// PROFILE
// ============================================================

/**
 * Profile from --profile and the individual options; undefined when none were given
 */
async function profileFromArgs(args: ParsedArgs): Promise<unknown> {
  const file = optionValue(args, "profile");
  const base = file ? await readJsonFile(file) : undefined;

  const overrides: Record<string, unknown> = {};
  const set = (key: string, value: unknown) => {
    if (value !== undefined) overrides[key] = value;
  };
  set("age", optionNumber(args, "age"));
  set("annualIncome", optionNumber(args, "income"));
  set("monthlyExpenses", optionNumber(args, "expenses"));
  set("riskTolerance", optionValue(args, "risk"));
  set("superBalance", optionNumber(args, "super"));
  set("dependents", optionNumber(args, "dependents"));
  if (args.flags.has("variableIncome")) overrides.incomeVariable = true;

  if (base === undefined && Object.keys(overrides).length === 0) return undefined;

  const merged: Record<string, unknown> = {
    riskTolerance: "balanced",
    superBalance: 0,
    ...(typeof base === "object" && base !== null ? base : {}),
    ...overrides,
  };
  return merged;
}

function choice<T extends string>(args: ParsedArgs, name: string, allowed: readonly T[], fallback: T): T {
  const raw = optionValue(args, name);
  if (raw === undefined) return fallback;
  const match = allowed.find((a) => a === raw);
  if (!match) {
    throw new ValidationError(`--${name} must be one of ${allowed.join(", ")}`, { field: name });
  }
  return match;
}

// ============================================================
// CALC
// ============================================================

type CalcHandler = (calculator: FinancialCalculator, profile: UserProfile, args: ParsedArgs) => CalculationResult;

const CALC_COMMANDS = {
  "emergency-fund": (calculator, profile) => calculator.emergencyFund(profile),
  super: (calculator, profile, args) =>
    calculator.superOptimisation(profile, optionNumber(args, "sacrifice") ?? calculator.defaultSacrifice(profile)),
  allocation: (calculator, profile) => calculator.allocationStrategy(profile),
  tax: (calculator, profile) => calculator.incomeTax(profile),
  sg: (calculator, profile) => calculator.superGuarantee(profile),
  retirement: (calculator, profile, args) =>
    calculator.retirementProjection(profile, {
      retirementAge: optionNumber(args, "retirement-age"),
      expectedReturn: optionNumber(args, "return"),
      annualContribution: optionNumber(args, "contribution"),
    }),
  risk: (calculator, profile) => calculator.riskAssessment(profile),
} satisfies Record<string, CalcHandler>;

type CalcName = keyof typeof CALC_COMMANDS;
const CALC_NAMES = Object.keys(CALC_COMMANDS).filter((k): k is CalcName => k in CALC_COMMANDS);

function displayCalculation(result: CalculationResult): void {
  console.log(`\n${result.kind} (rules ${result.ruleVersion})\n`);
  const width = Math.max(...result.fields.map((f) => f.label.length));
  for (const f of result.fields) {
    console.log(`  ${f.label.padEnd(width)}  ${formatField(f)}`);
  }
  for (const [key, value] of Object.entries(result.notes ?? {})) {
    console.log(`  ${key.padEnd(width)}  ${value}`);
  }
  for (const w of result.warnings) {
    console.log(`\n  ! ${w.message}`);
  }
  console.log();
}

async function runCalc(config: AppConfig, args: ParsedArgs): Promise<void> {
  const name = args.positionals[0];
  const kind = CALC_NAMES.find((n) => n === name);
  if (!kind) {
    throw new ValidationError(`Unknown calculation "${name ?? ""}". Use one of: ${CALC_NAMES.join(", ")}`, {
      field: "calculation",
    });
  }

  const calculator = await loadCalculator(config, optionValue(args, "rules"));
  const profile = parseProfile((await profileFromArgs(args)) ?? {});
  const handler: CalcHandler = CALC_COMMANDS[kind];
  const result = handler(calculator, profile, args);

  if (args.flags.has("json")) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    displayCalculation(result);
  }
}

// ============================================================
// ASK
// ============================================================

function filterFromArgs(args: ParsedArgs): RetrievalFilter | undefined {
  const documentTypes = optionList(args, "doc-type").map((t) => {
    const parsed = DocumentTypeSchema.safeParse(t);
    if (!parsed.success) {
      throw new ValidationError(`--doc-type must be one of ${DocumentTypeSchema.options.join(", ")}`, {
        field: "doc-type",
      });
    }
    return parsed.data;
  });
  const authorities = optionList(args, "authority");
  const publishedAfter = optionValue(args, "after");

  if (documentTypes.length === 0 && authorities.length === 0 && !publishedAfter) return undefined;
  return {
    documentTypes: documentTypes.length > 0 ? documentTypes : undefined,
    authorities: authorities.length > 0 ? authorities : undefined,
    publishedAfter,
  };
}

function displayAnswer(result: PipelineResult): void {
  const { answer, enhanced, retrieval } = result;

  console.log("\n" + "=".repeat(60));
  console.log(answer.text);
  console.log("=".repeat(60));

  if (answer.citations.length > 0) {
    console.log("\n--- Sources ---");
    for (const id of answer.citations) {
      const hit = retrieval.hits.find((h) => h.passage.id === id);
      const meta = hit?.passage.metadata;
      const title = meta?.title ?? id;
      console.log(`  [${id}] ${title}${meta ? ` (${meta.authority})` : ""}`);
      if (meta?.url) console.log(`    ${meta.url}`);
    }
  }

  console.log("\n--- Details ---");
  console.log(`Request ID: ${result.requestId}`);
  console.log(`Intent:     ${enhanced.intent}`);
  console.log(`Confidence: ${answer.confidence}`);
  console.log(`Passages:   ${retrieval.hits.length} retrieved, ${answer.contextPassageIds.length} in context`);
  if (answer.note) console.log(`Note:       ${answer.note}`);
  if (answer.rejectedCitations.length > 0) {
    console.log(`Removed:    ${answer.rejectedCitations.length} invalid citation marker(s)`);
  }
  console.log(`Duration:   ${(result.timings.totalMs / 1000).toFixed(2)}s`);
  console.log();
}

async function runAsk(config: AppConfig, args: ParsedArgs): Promise<void> {
  const question = args.positionals.join(" ").trim();
  if (!question) {
    throw new ValidationError("ask needs a question", { field: "question" });
  }

  const profile = await profileFromArgs(args);
  const topK = optionNumber(args, "top-k");
  const runtime: AppConfig =
    topK === undefined ? config : { ...config, retrieval: { ...config.retrieval, topK } };

  const { pipeline } = await buildPipeline(runtime, {
    backend: choice<BackendChoice>(args, "backend", ["auto", "claude", "template"], "auto"),
    index: choice<IndexChoice>(args, "index", ["auto", "supabase", "memory"], "auto"),
  });

  const result = await pipeline.ask(question, { profile, filter: filterFromArgs(args) });

  if (args.flags.has("json")) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    displayAnswer(result);
  }
}

// ============================================================
// EVALUATE
// ============================================================

async function runEvaluate(config: AppConfig, args: ParsedArgs): Promise<void> {
  const suitePath = args.positionals[0] ?? path.join(config.benchmarkDir, "sample.json");
  const outputDir = optionValue(args, "output") ?? path.join(config.dataDir, "reports");

  const suite = await loadBenchmarkSuite(suitePath);
  const { pipeline, embedder } = await buildPipeline(config, {
    backend: choice<BackendChoice>(args, "backend", ["auto", "claude", "template"], "auto"),
    index: choice<IndexChoice>(args, "index", ["auto", "supabase", "memory"], "auto"),
  });

  const harness = new EvaluationHarness(pipeline, embedder, {
    concurrency: config.evaluation.concurrency,
    embeddingTimeoutMs: config.evaluation.embeddingTimeoutMs,
  });
  const report = await harness.run(suite, {
    caseIds: optionList(args, "case"),
    tags: optionList(args, "tag"),
    concurrency: optionNumber(args, "concurrency"),
  });

  const reportPath = await writeMetricReport(report, outputDir);

  if (args.flags.has("json")) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatMetricReport(report));
    console.log(`\nReport written to ${reportPath}`);
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === "help") {
    printHelp();
    // An unknown command lands here with positionals left over
    process.exit(args.flags.has("help") || args.positionals.length === 0 ? 0 : 1);
  }

  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (error) {
    console.error("Configuration error:", errorMessage(error));
    console.error("\nSee .env.example for the supported variables.");
    process.exit(1);
  }

  logger.setLevel(args.flags.has("verbose") ? "debug" : config.logLevel);

  try {
    if (args.command === "ask") {
      await runAsk(config, args);
    } else if (args.command === "calc") {
      await runCalc(config, args);
    } else {
      await runEvaluate(config, args);
    }
  } catch (error) {
    const failure = wrapError(error, `${args.command} failed`);
    console.error(`\n${args.command} failed [${failure.code}]:`, failure.message);
    if (args.flags.has("verbose") && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

// Run
main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
