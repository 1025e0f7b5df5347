import { describe, it, expect } from "vitest";
import { IndexUnavailableError } from "../src/errors.js";
import type { Chunk } from "../src/knowledge/schema.js";
import { EmbeddingIndex } from "../src/retrieval/embedding-index.js";
import { Retriever } from "../src/retrieval/retriever.js";
import { MemoryVectorStore } from "../src/retrieval/vector-store.js";
import { FailingEmbedder, KeywordEmbedder } from "./helpers/fakes.js";

const FAQ: Chunk = {
  id: "faq_0",
  category: "faq",
  content: "Q: How fast? A: 60-70% faster",
  metadata: { type: "faq" },
};
const PRICING: Chunk = {
  id: "pricing_rpo",
  category: "pricing",
  content: "Pricing - rpo: fee: 12% of salary",
  metadata: { type: "pricing" },
};
const CHUNKS = [FAQ, PRICING];

describe("Retriever", () => {
  it("embeds the query with the index's embedder and returns ranked chunks", async () => {
    const embedder = new KeywordEmbedder(["fast", "fee"]);
    const index = new EmbeddingIndex(new MemoryVectorStore(), embedder);
    await index.build(CHUNKS);

    const result = await new Retriever(index).retrieve("what is the fee", 1);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((r) => r.chunkId)).toEqual(["pricing_rpo"]);
      expect(result.value[0]?.metadata).toEqual({ type: "pricing" });
    }
    expect(embedder.embedCalls).toBe(1);
  });

  it("returns an empty list, not an error, for an empty index", async () => {
    const embedder = new KeywordEmbedder(["fast"]);
    const retriever = new Retriever(new EmbeddingIndex(new MemoryVectorStore(), embedder));
    const result = await retriever.retrieve("anything", 3);
    expect(result).toEqual({ ok: true, value: [] });
    expect(embedder.embedCalls).toBe(0);
  });

  it("reports IndexUnavailableError when embedding fails", async () => {
    const store = new MemoryVectorStore();
    await store.replaceAll([{ chunk: FAQ, vector: [1, 0] }]);
    const retriever = new Retriever(new EmbeddingIndex(store, new FailingEmbedder()));

    const result = await retriever.retrieve("how fast", 3);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(IndexUnavailableError);
      expect(result.error.message).toBe("Retrieval failed: inference unavailable");
    }
  });
});
