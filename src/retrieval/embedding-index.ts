import type { Chunk } from "../knowledge/schema.js";
import { moduleLogger } from "../logger.js";
import type { Embedder } from "./embedder.js";
import type { IndexEntry, RetrievalResult, VectorStore } from "./vector-store.js";

const log = moduleLogger("embedding-index");

export interface BuildOptions {
  /** Clear the store and re-embed even when it already holds vectors. */
  force?: boolean;
}

export interface BuildReport {
  status: "built" | "skipped";
  count: number;
  durationMs: number;
}

// ── Embedding Index ──────────────────────────────────────

/**
 * Owns the vector store handle and everything written to it.
 *
 * Embedding the corpus is the expensive step, so `build` is skipped when
 * the store already has vectors (e.g. persisted by an earlier process).
 * A forced rebuild embeds first, then replaces the collection in one step;
 * searches issued while it runs wait for it to finish.
 */
export class EmbeddingIndex {
  private rebuilding: Promise<BuildReport> | null = null;

  constructor(
    private readonly store: VectorStore,
    readonly embedder: Embedder,
  ) {}

  async build(chunks: Chunk[], opts: BuildOptions = {}): Promise<BuildReport> {
    const force = opts.force ?? false;
    // A plain build joins the one in flight; a forced one queues behind it.
    if (this.rebuilding && !force) return this.rebuilding;

    const previous = this.rebuilding?.catch(() => undefined) ?? Promise.resolve();
    const run = previous.then(() => this.runBuild(chunks, force));
    this.rebuilding = run;
    try {
      return await run;
    } finally {
      if (this.rebuilding === run) this.rebuilding = null;
    }
  }

  async search(vector: number[], k: number): Promise<RetrievalResult[]> {
    if (this.rebuilding) await this.rebuilding.catch(() => undefined);
    return this.store.nearest(vector, k);
  }

  async count(): Promise<number> {
    return this.store.count();
  }

  private async runBuild(chunks: Chunk[], force: boolean): Promise<BuildReport> {
    const started = Date.now();
    const existing = await this.store.count();

    if (existing > 0 && !force) {
      log.info(
        { store: this.store.name, count: existing },
        "⏭️  Vectors already present, skipping embedding",
      );
      return { status: "skipped", count: existing, durationMs: Date.now() - started };
    }

    assertUniqueIds(chunks);

    log.info(
      { store: this.store.name, chunks: chunks.length, model: this.embedder.model, force },
      "🧠 Embedding corpus",
    );
    const vectors = await this.embedder.embedBatch(chunks.map((c) => c.content));
    if (vectors.length !== chunks.length) {
      throw new Error(
        `Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`,
      );
    }

    const entries: IndexEntry[] = chunks.map((chunk, i) => ({
      chunk,
      vector: vectors[i] ?? [],
    }));
    await this.store.replaceAll(entries);

    const durationMs = Date.now() - started;
    log.info(
      { store: this.store.name, count: entries.length, durationMs },
      "✅ Embedding index built",
    );
    return { status: "built", count: entries.length, durationMs };
  }
}

function assertUniqueIds(chunks: Chunk[]): void {
  const seen = new Set<string>();
  for (const chunk of chunks) {
    if (seen.has(chunk.id)) {
      throw new Error(`Duplicate chunk id: ${chunk.id}`);
    }
    seen.add(chunk.id);
  }
}
