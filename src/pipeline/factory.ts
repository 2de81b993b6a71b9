/**
 * Pipeline wiring
 * Builds every component from a validated AppConfig. Rule table and lexicon are loaded
 * once here and shared read-only by all requests.
 */

import { ConfigError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import type { AppConfig } from "../core/config.js";
import { FinancialCalculator } from "../calculator/financial-calculator.js";
import { QueryEnhancer } from "../query/query-enhancer.js";
import { HashingEmbeddingBackend } from "../retrieval/hashing-embedder.js";
import { InMemoryVectorIndex } from "../retrieval/in-memory-index.js";
import { Retriever } from "../retrieval/retriever.js";
import type { EmbeddingBackend, VectorIndex } from "../retrieval/types.js";
import { loadLexicon, type Lexicon } from "../schemas/lexicon.js";
import { loadRuleTable, type RuleTable } from "../schemas/rules.js";
import { AnswerSynthesizer } from "../synthesis/answer-synthesizer.js";
import type { GenerationBackend } from "../synthesis/types.js";
import { ClaudeGenerationBackend } from "../tools/claude/generation-backend.js";
import { OllamaEmbeddingBackend } from "../tools/ollama/embedding-backend.js";
import { createSupabase } from "../tools/supabase/client.js";
import { SupabaseVectorIndex } from "../tools/supabase/vector-index.js";
import { TemplateGenerationBackend } from "../tools/template/template-backend.js";
import { AnswerPipeline } from "./answer-pipeline.js";

export type BackendChoice = "auto" | "claude" | "template";
export type IndexChoice = "auto" | "supabase" | "memory";

export interface BuildOptions {
  backend?: BackendChoice;
  index?: IndexChoice;
  /** Overrides RULES_VERSION */
  rulesVersion?: string;
}

export interface PipelineComponents {
  rules: RuleTable;
  lexicon: Lexicon;
  calculator: FinancialCalculator;
  embedder: EmbeddingBackend;
  index: VectorIndex;
  backend: GenerationBackend;
  pipeline: AnswerPipeline;
}

const log = logger.child({ component: "factory" });

export async function loadCalculator(config: AppConfig, rulesVersion?: string): Promise<FinancialCalculator> {
  const rules = await loadRuleTable(config.rules.dir, rulesVersion ?? config.rules.version);
  return new FinancialCalculator(rules);
}

export function createEmbedder(config: AppConfig): EmbeddingBackend {
  return config.ollama ? new OllamaEmbeddingBackend(config.ollama) : new HashingEmbeddingBackend();
}

async function createIndex(config: AppConfig, choice: IndexChoice, embedder: EmbeddingBackend): Promise<VectorIndex> {
  const useSupabase = choice === "supabase" || (choice === "auto" && config.supabase !== undefined);

  if (!useSupabase) {
    return InMemoryVectorIndex.fromFile(config.passagesPath, embedder);
  }
  if (!config.supabase) {
    throw new ConfigError("Supabase index requested but SUPABASE_URL and SUPABASE_KEY are not set", {
      source: "environment",
    });
  }
  if (!config.ollama) {
    throw new ConfigError("Supabase index needs OLLAMA_BASE_URL for query embeddings", { source: "environment" });
  }
  return new SupabaseVectorIndex(createSupabase(config.supabase), embedder);
}

function createBackend(config: AppConfig, choice: BackendChoice): GenerationBackend {
  const claude = new ClaudeGenerationBackend(config.anthropic);
  if (choice === "claude") return claude;
  if (choice === "auto" && claude.isReady()) return claude;
  return new TemplateGenerationBackend();
}

export async function buildPipeline(config: AppConfig, options: BuildOptions = {}): Promise<PipelineComponents> {
  const [calculator, lexicon] = await Promise.all([
    loadCalculator(config, options.rulesVersion),
    loadLexicon(config.lexiconPath),
  ]);

  const embedder = createEmbedder(config);
  const index = await createIndex(config, options.index ?? "auto", embedder);
  const backend = createBackend(config, options.backend ?? "auto");

  const retriever = new Retriever(index, {
    fetchK: config.retrieval.fetchK,
    timeoutMs: config.retrieval.indexTimeoutMs,
  });
  const synthesizer = new AnswerSynthesizer(calculator, backend, config.synthesis);
  const pipeline = new AnswerPipeline(new QueryEnhancer(lexicon), retriever, synthesizer, {
    topK: config.retrieval.topK,
    minScore: config.retrieval.minScore,
  });

  log.info("Pipeline ready", {
    rules: calculator.ruleVersion,
    lexicon: lexicon.version,
    index: index.name,
    embedder: embedder.name,
    backend: backend.name,
  });

  return { rules: calculator.rules, lexicon, calculator, embedder, index, backend, pipeline };
}
