import { IndexUnavailableError, describeError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import { Err, Ok, type Result } from "../result.js";
import type { EmbeddingIndex } from "./embedding-index.js";
import type { RetrievalResult } from "./vector-store.js";

const log = moduleLogger("retriever");

/**
 * Query → ranked chunks. Embeds with the index's own embedder so queries
 * and corpus always live in the same vector space.
 *
 * An empty index yields `Ok([])`. Embedding or store failures come back as
 * `IndexUnavailableError` for the caller to degrade on.
 */
export class Retriever {
  constructor(private readonly index: EmbeddingIndex) {}

  async retrieve(
    query: string,
    topK: number,
  ): Promise<Result<RetrievalResult[], IndexUnavailableError>> {
    try {
      if ((await this.index.count()) === 0) return Ok([]);
      const vector = await this.index.embedder.embed(query);
      const results = await this.index.search(vector, topK);
      log.debug(
        { topK, hits: results.map((r) => r.chunkId) },
        "🔍 Retrieved chunks",
      );
      return Ok(results);
    } catch (err) {
      log.warn({ err }, "⚠️ Retrieval failed");
      return Err(
        new IndexUnavailableError(`Retrieval failed: ${describeError(err)}`, {
          cause: err,
        }),
      );
    }
  }
}
