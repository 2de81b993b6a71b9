import { z } from "zod";
import path from "path";
import { ConfigError } from "./errors.js";

/**
 * Configuration Management
 * Loads and validates runtime settings from environment variables.
 *
 * `dotenv/config` is imported by the CLI entry point only; library callers pass
 * their own env record so several configurations can coexist in one process.
 */

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const unitInterval = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v : undefined));

// Schema for environment validation
const envSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("./data"),

  // Rules and lexicon
  RULES_VERSION: z.string().regex(/^\d{4}-\d{2}$/, "RULES_VERSION must look like 2025-26").default("2025-26"),
  RULES_DIR: z.string().default("./config/rules"),
  LEXICON_PATH: optionalString,

  // Retrieval and synthesis
  TOP_K: intFromEnv(5),
  FETCH_K: intFromEnv(20),
  MIN_SCORE: unitInterval(0.2),
  ANSWERABILITY_THRESHOLD: unitInterval(0.3),
  MAX_CONTEXT_CHARS: intFromEnv(6000),
  INDEX_TIMEOUT_MS: intFromEnv(10_000),
  BACKEND_TIMEOUT_MS: intFromEnv(60_000),
  EVAL_CONCURRENCY: intFromEnv(2),
  EMBEDDING_TIMEOUT_MS: intFromEnv(10_000),

  // Anthropic
  ANTHROPIC_API_KEY: optionalString,
  GENERATION_MODEL: z.string().min(1).default("claude-sonnet-4-20250514"),

  // Supabase (pgvector)
  SUPABASE_URL: optionalString.pipe(z.string().url("SUPABASE_URL must be a valid URL").optional()),
  SUPABASE_KEY: optionalString,

  // Ollama embeddings
  OLLAMA_BASE_URL: optionalString.pipe(z.string().url("OLLAMA_BASE_URL must be a valid URL").optional()),
  EMBEDDING_MODEL: z.string().min(1).default("all-minilm"),
});

export type LogLevelSetting = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface AppConfig {
  readonly logLevel: LogLevelSetting;
  readonly dataDir: string;

  readonly rules: {
    readonly version: string;
    readonly dir: string;
  };
  readonly lexiconPath: string;
  readonly passagesPath: string;
  readonly benchmarkDir: string;

  readonly retrieval: {
    readonly topK: number;
    /** Candidates requested from the index before filtering */
    readonly fetchK: number;
    readonly minScore: number;
    readonly indexTimeoutMs: number;
  };

  readonly synthesis: {
    readonly answerabilityThreshold: number;
    readonly maxContextChars: number;
    readonly backendTimeoutMs: number;
  };

  readonly evaluation: {
    readonly concurrency: number;
    /** Deadline for each embedding call made while scoring semantic similarity */
    readonly embeddingTimeoutMs: number;
  };

  readonly anthropic: {
    readonly apiKey?: string;
    readonly model: string;
  };

  readonly supabase?: {
    readonly url: string;
    readonly key: string;
  };

  readonly ollama?: {
    readonly baseUrl: string;
    readonly model: string;
  };
}

/**
 * Validate an environment record into a frozen AppConfig
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, { source: "environment" });
  }

  const parsed = parseResult.data;

  if (parsed.SUPABASE_URL && !parsed.SUPABASE_KEY) {
    throw new ConfigError("SUPABASE_KEY is required when SUPABASE_URL is set", { source: "environment" });
  }

  const config: AppConfig = {
    logLevel: parsed.LOG_LEVEL,
    dataDir: parsed.DATA_DIR,

    rules: {
      version: parsed.RULES_VERSION,
      dir: parsed.RULES_DIR,
    },
    lexiconPath: parsed.LEXICON_PATH ?? path.join(parsed.DATA_DIR, "lexicon.json"),
    passagesPath: path.join(parsed.DATA_DIR, "knowledge", "passages.json"),
    benchmarkDir: path.join(parsed.DATA_DIR, "benchmarks"),

    retrieval: {
      topK: parsed.TOP_K,
      fetchK: parsed.FETCH_K,
      minScore: parsed.MIN_SCORE,
      indexTimeoutMs: parsed.INDEX_TIMEOUT_MS,
    },

    synthesis: {
      answerabilityThreshold: parsed.ANSWERABILITY_THRESHOLD,
      maxContextChars: parsed.MAX_CONTEXT_CHARS,
      backendTimeoutMs: parsed.BACKEND_TIMEOUT_MS,
    },

    evaluation: {
      concurrency: parsed.EVAL_CONCURRENCY,
      embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    },

    anthropic: {
      apiKey: parsed.ANTHROPIC_API_KEY,
      model: parsed.GENERATION_MODEL,
    },

    supabase:
      parsed.SUPABASE_URL && parsed.SUPABASE_KEY
        ? { url: parsed.SUPABASE_URL, key: parsed.SUPABASE_KEY }
        : undefined,

    ollama: parsed.OLLAMA_BASE_URL
      ? { baseUrl: parsed.OLLAMA_BASE_URL, model: parsed.EMBEDDING_MODEL }
      : undefined,
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
