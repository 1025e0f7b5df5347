import type { Persona } from "../knowledge/persona.js";
import type { RetrievalResult } from "../retrieval/vector-store.js";

// ── Prompt Builder ──────────────────────────────────────

export interface PromptInput {
  persona: Persona;
  query: string;
  chunks: readonly RetrievalResult[];
  /** Rendered conversation ("User: …" / "Assistant: …" lines), or "". */
  conversation: string;
}

/**
 * Directive, then retrieved context, then the conversation so far, then
 * the question. Blocks with nothing in them are left out.
 */
export function buildPrompt({
  persona,
  query,
  chunks,
  conversation,
}: PromptInput): string {
  const parts: string[] = [persona.directive];

  if (chunks.length > 0) {
    const context = chunks
      .map((c, i) => `[Context ${i + 1}]: ${c.content}`)
      .join("\n\n");
    parts.push(
      `Context from the ${persona.companyName} knowledge base:\n${context}`,
    );
  }

  if (conversation) {
    parts.push(`Conversation so far:\n${conversation}`);
  }

  parts.push(`User question: ${query}`);
  parts.push(
    "Please answer the user's question using the provided context. " +
      "If the context doesn't contain enough information, acknowledge this " +
      `and suggest contacting ${persona.companyName} directly.`,
  );

  return parts.join("\n\n");
}

/** The text embedded for retrieval: the recent conversation plus the new message. */
export function buildRetrievalQuery(conversation: string, query: string): string {
  return conversation ? `${conversation}\nUser: ${query}` : query;
}
