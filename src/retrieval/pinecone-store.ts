import type { Index, Pinecone } from "@pinecone-database/pinecone";
import { moduleLogger } from "../logger.js";
import type { IndexEntry, RetrievalResult, VectorStore } from "./vector-store.js";

const log = moduleLogger("pinecone-store");

type ChunkRecordMetadata = Record<string, string>;

/** Reserved metadata keys; chunk metadata is stored alongside them. */
const CONTENT_KEY = "_content";
const CATEGORY_KEY = "_category";

const UPSERT_BATCH = 100;

/**
 * Pinecone-backed store. The collection name is the namespace inside the
 * configured index. Scores come back as cosine similarity and are turned
 * into distances (1 − score).
 *
 * Pinecone has no atomic namespace swap: a rebuild deletes then upserts.
 * The embedding index keeps searches out while that runs.
 */
export class PineconeVectorStore implements VectorStore {
  private readonly ns: Index<ChunkRecordMetadata>;

  constructor(
    pc: Pinecone,
    indexName: string,
    readonly name: string,
  ) {
    this.ns = pc.index<ChunkRecordMetadata>(indexName).namespace(name);
  }

  async count(): Promise<number> {
    const stats = await this.ns.describeIndexStats();
    return stats.namespaces?.[this.name]?.recordCount ?? 0;
  }

  async nearest(vector: number[], k: number): Promise<RetrievalResult[]> {
    if (k <= 0) return [];
    const result = await this.ns.query({
      vector,
      topK: k,
      includeMetadata: true,
    });

    return (result.matches ?? []).map((match) => {
      const metadata: ChunkRecordMetadata = { ...match.metadata };
      const content = metadata[CONTENT_KEY] ?? "";
      delete metadata[CONTENT_KEY];
      delete metadata[CATEGORY_KEY];
      return {
        chunkId: match.id,
        content,
        metadata,
        distance: Math.max(0, 1 - (match.score ?? 0)),
      };
    });
  }

  async replaceAll(entries: IndexEntry[]): Promise<void> {
    if ((await this.count()) > 0) {
      await this.ns.deleteAll();
    }
    for (let start = 0; start < entries.length; start += UPSERT_BATCH) {
      const batch = entries.slice(start, start + UPSERT_BATCH);
      await this.ns.upsert(
        batch.map(({ chunk, vector }) => ({
          id: chunk.id,
          values: vector,
          metadata: {
            ...chunk.metadata,
            [CONTENT_KEY]: chunk.content,
            [CATEGORY_KEY]: chunk.category,
          },
        })),
      );
    }
    log.info(
      { namespace: this.name, count: entries.length },
      "🌲 Pinecone namespace rebuilt",
    );
  }
}
