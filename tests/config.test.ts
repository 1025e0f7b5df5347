import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const BASE = {
  OPENROUTER_API_KEY: "test-openrouter-key",
  PINECONE_API_KEY: "test-pinecone-key",
  KNOWLEDGE_BASE_PATH: "knowledge_base/company_kb.json",
};

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("loadConfig", () => {
  // ── Required values ────────────────────────────────────

  it("names every missing required variable at once", () => {
    const err = configError(() => loadConfig({}));
    expect(err.missing).toEqual([
      "OPENROUTER_API_KEY",
      "PINECONE_API_KEY",
      "KNOWLEDGE_BASE_PATH",
    ]);
    expect(err.message).toBe(
      "Missing required environment variables: OPENROUTER_API_KEY, PINECONE_API_KEY, KNOWLEDGE_BASE_PATH",
    );
  });

  it("treats blank values as missing", () => {
    const err = configError(() => loadConfig({ ...BASE, PINECONE_API_KEY: "   " }));
    expect(err.missing).toEqual(["PINECONE_API_KEY"]);
  });

  it("requires an index name for the pinecone backend", () => {
    const err = configError(() => loadConfig({ ...BASE, VECTOR_BACKEND: "pinecone" }));
    expect(err.missing).toEqual(["PINECONE_INDEX"]);

    const config = loadConfig({ ...BASE, VECTOR_BACKEND: "Pinecone", PINECONE_INDEX: "kb" });
    expect(config.vectorBackend).toBe("pinecone");
    expect(config.pineconeIndex).toBe("kb");
  });

  it("rejects an unknown vector backend", () => {
    const err = configError(() => loadConfig({ ...BASE, VECTOR_BACKEND: "redis" }));
    expect(err.missing).toEqual(["VECTOR_BACKEND"]);
    expect(err.message).toBe('VECTOR_BACKEND must be "file" or "pinecone", got "redis"');
  });

  // ── Defaults ───────────────────────────────────────────

  it("fills in defaults", () => {
    const config = loadConfig(BASE);
    expect(config).toMatchObject({
      llmModel: "google/gemini-2.0-flash-exp:free",
      fallbackModel: "",
      llmTemperature: 0.3,
      embeddingModel: "multilingual-e5-large",
      vectorBackend: "file",
      vectorStorePath: "data/vector-store",
      vectorCollection: "company_knowledge_base",
      forceRebuild: false,
      retrievalTopK: 3,
      sessionTtlMs: 30 * 60_000,
      sessionWindow: 10,
      sessionContextTurns: 6,
      cacheTtlMs: 3_600_000,
      analyticsCapacity: 1000,
      systemPromptPath: "persona.md",
      port: 8000,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  // ── Overrides ──────────────────────────────────────────

  it("parses overrides", () => {
    const config = loadConfig({
      ...BASE,
      RETRIEVAL_TOP_K: "5",
      SESSION_TTL_MINUTES: "2",
      CACHE_TTL_SECONDS: "0",
      FORCE_REBUILD: "yes",
      LLM_TEMPERATURE: "0.7",
      PORT: "9000",
    });
    expect(config.retrievalTopK).toBe(5);
    expect(config.sessionTtlMs).toBe(120_000);
    expect(config.cacheTtlMs).toBe(0);
    expect(config.forceRebuild).toBe(true);
    expect(config.llmTemperature).toBe(0.7);
    expect(config.port).toBe(9000);
  });

  it("falls back on unparseable or out-of-range numbers", () => {
    const config = loadConfig({
      ...BASE,
      RETRIEVAL_TOP_K: "0",
      SESSION_WINDOW: "abc",
      ANALYTICS_CAPACITY: "-4",
    });
    expect(config.retrievalTopK).toBe(3);
    expect(config.sessionWindow).toBe(10);
    expect(config.analyticsCapacity).toBe(1000);
  });

  it("never renders more context turns than the window holds", () => {
    const config = loadConfig({ ...BASE, SESSION_WINDOW: "4", SESSION_CONTEXT_TURNS: "8" });
    expect(config.sessionWindow).toBe(4);
    expect(config.sessionContextTurns).toBe(4);
  });
});
