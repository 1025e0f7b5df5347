import type { Chunk } from "../knowledge/schema.js";

// ── Vector Store contract ────────────────────────────────

/** A chunk plus its embedding. Written at build time, never mutated. */
export interface IndexEntry {
  chunk: Chunk;
  vector: number[];
}

export interface RetrievalResult {
  chunkId: string;
  content: string;
  metadata: Record<string, string>;
  /** Cosine distance, ≥ 0. Lower means more similar. */
  distance: number;
}

/**
 * Backing store for the embedding index.
 *
 * `replaceAll` swaps the whole collection: readers see either the old
 * entries or the new ones, never a mix.
 */
export interface VectorStore {
  readonly name: string;
  count(): Promise<number>;
  nearest(vector: number[], k: number): Promise<RetrievalResult[]>;
  replaceAll(entries: IndexEntry[]): Promise<void>;
}

// ── Vector math ──────────────────────────────────────────

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

/** 1 − cosine similarity, clamped at 0 against float noise. */
export function cosineDistance(a: number[], b: number[]): number {
  return Math.max(0, 1 - cosineSimilarity(a, b));
}

// ── In-memory store ──────────────────────────────────────

/** Brute-force cosine search over an in-process array. */
export class MemoryVectorStore implements VectorStore {
  protected entries: readonly IndexEntry[] = [];

  constructor(readonly name = "memory") {}

  async count(): Promise<number> {
    return this.entries.length;
  }

  async nearest(vector: number[], k: number): Promise<RetrievalResult[]> {
    if (k <= 0) return [];
    // Capture the current array; a concurrent replaceAll publishes a new one.
    const snapshot = this.entries;
    return snapshot
      .map(({ chunk, vector: v }) => ({
        chunkId: chunk.id,
        content: chunk.content,
        metadata: { ...chunk.metadata },
        distance: cosineDistance(vector, v),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  async replaceAll(entries: IndexEntry[]): Promise<void> {
    this.entries = Object.freeze([...entries]);
  }
}
