import { describe, expect, it } from "vitest";
import { loadAppConfig } from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";

describe("loadAppConfig", () => {
  it("applies defaults", () => {
    const config = loadAppConfig({});
    expect(config.retrieval).toEqual({ topK: 5, fetchK: 20, minScore: 0.2, indexTimeoutMs: 10000 });
    expect(config.synthesis.answerabilityThreshold).toBe(0.3);
    expect(config.evaluation).toEqual({ concurrency: 2, embeddingTimeoutMs: 10000 });
    expect(config.rules.version).toBe("2025-26");
    expect(config.passagesPath).toBe("data/knowledge/passages.json");
    expect(config.supabase).toBeUndefined();
    expect(config.ollama).toBeUndefined();
  });

  it("is frozen", () => {
    const config = loadAppConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retrieval)).toBe(true);
  });

  it("coerces numeric variables", () => {
    const config = loadAppConfig({ TOP_K: "8", MIN_SCORE: "0.35", EVAL_CONCURRENCY: "4" });
    expect(config.retrieval.topK).toBe(8);
    expect(config.retrieval.minScore).toBe(0.35);
    expect(config.evaluation.concurrency).toBe(4);
  });

  it("treats blank optional values as unset", () => {
    const config = loadAppConfig({ SUPABASE_URL: "", OLLAMA_BASE_URL: "  ", ANTHROPIC_API_KEY: "" });
    expect(config.supabase).toBeUndefined();
    expect(config.ollama).toBeUndefined();
    expect(config.anthropic.apiKey).toBeUndefined();
  });

  it("builds remote settings when configured", () => {
    const config = loadAppConfig({
      SUPABASE_URL: "http://localhost:54321",
      SUPABASE_KEY: "test-secret",
      OLLAMA_BASE_URL: "http://localhost:11434",
    });
    expect(config.supabase).toEqual({ url: "http://localhost:54321", key: "test-secret" });
    expect(config.ollama).toEqual({ baseUrl: "http://localhost:11434", model: "all-minilm" });
  });

  it("lists every invalid variable", () => {
    expect(() => loadAppConfig({ TOP_K: "0", MIN_SCORE: "2" })).toThrow(/TOP_K[\s\S]*MIN_SCORE/);
  });

  it("requires a key alongside the Supabase URL", () => {
    expect(() => loadAppConfig({ SUPABASE_URL: "http://localhost:54321" })).toThrow(ConfigError);
  });

  it("rejects a malformed rules version", () => {
    expect(() => loadAppConfig({ RULES_VERSION: "2025" })).toThrow(/RULES_VERSION must look like 2025-26/);
  });
});
