import { Pinecone } from "@pinecone-database/pinecone";

// ── Pinecone Client ───────────────────────────────────────

let _pc: Pinecone | null = null;

/** Shared Pinecone client. Used for inference (embeddings) and, optionally, as the vector store. */
export function getPineconeClient(apiKey: string): Pinecone {
  if (!_pc) {
    _pc = new Pinecone({ apiKey });
  }
  return _pc;
}
