import type { Pinecone } from "@pinecone-database/pinecone";
import { moduleLogger } from "../logger.js";

const log = moduleLogger("embedder");

// ── Embedder contract ─────────────────────────────────────

/**
 * Text → vector. Must be deterministic for equal input and keep a fixed
 * dimensionality: the corpus and every query go through the same instance.
 */
export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

// ── Pinecone Inference ────────────────────────────────────

/** Pinecone Inference caps a single embed request at 96 inputs. */
export const PINECONE_EMBED_BATCH = 96;

/** Pinecone truncates long inputs itself; this keeps requests small. */
const MAX_INPUT_CHARS = 2000;

/**
 * Embeddings from Pinecone's hosted inference API
 * (multilingual-e5-large by default, 1024 dimensions).
 */
export class PineconeEmbedder implements Embedder {
  constructor(
    private readonly pc: Pinecone,
    readonly model = "multilingual-e5-large",
  ) {}

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.request([text]);
    if (!vector) throw new Error("Pinecone inference returned no embedding");
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += PINECONE_EMBED_BATCH) {
      const batch = texts.slice(start, start + PINECONE_EMBED_BATCH);
      vectors.push(...(await this.request(batch)));
      log.debug(
        { done: vectors.length, total: texts.length },
        "🧠 Embedded batch",
      );
    }
    return vectors;
  }

  private async request(inputs: string[]): Promise<number[][]> {
    // Same inputType for passages and queries: one embedding function for both sides.
    const result = await this.pc.inference.embed(
      this.model,
      inputs.map((t) => t.slice(0, MAX_INPUT_CHARS)),
      { inputType: "passage", truncate: "END" },
    );

    const vectors = (result.data ?? []).map((embedding) => {
      if (!("values" in embedding) || !Array.isArray(embedding.values)) {
        throw new Error("Pinecone inference returned a non-dense embedding");
      }
      return embedding.values;
    });
    if (vectors.length !== inputs.length) {
      throw new Error(
        `Pinecone inference returned ${vectors.length} embeddings for ${inputs.length} inputs`,
      );
    }
    return vectors;
  }
}
